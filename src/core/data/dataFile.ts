// src/core/data/dataFile.ts
import { DataNode } from "@/core/data/dataNode";

/**
 * Splits one line into tokens. Whitespace separates tokens, a token may be
 * wrapped in double quotes or backticks to keep spaces, and `#` at a token
 * boundary starts a comment.
 */
export const tokenizeLine = (
  line: string,
): { tokens: string[]; unterminated: boolean } => {
  const tokens: string[] = [];
  let i = 0;
  while (i < line.length) {
    const ch = line[i];
    if (ch === " " || ch === "\t" || ch === "\r") {
      i++;
      continue;
    }
    if (ch === "#") break;

    if (ch === '"' || ch === "`") {
      const close = line.indexOf(ch, i + 1);
      if (close < 0) {
        tokens.push(line.slice(i + 1).replace(/\r$/, ""));
        return { tokens, unterminated: true };
      }
      tokens.push(line.slice(i + 1, close));
      i = close + 1;
      continue;
    }

    let end = i;
    while (end < line.length && !/[\s]/.test(line[end])) end++;
    tokens.push(line.slice(i, end));
    i = end;
  }
  return { tokens, unterminated: false };
};

const indentOf = (line: string): number => {
  let n = 0;
  while (n < line.length && (line[n] === "\t" || line[n] === " ")) n++;
  return n;
};

/**
 * Parses data-file text into a tree of `DataNode`s.
 * @remarks
 * Nesting follows indentation: a line is a child of the nearest preceding
 * line with less indentation. The returned root has no tokens; the file's
 * top-level lines are its children.
 *
 * @param text The file contents.
 * @param source A name for the text, used in trace messages.
 */
export const parseDataFile = (text: string, source = ""): DataNode => {
  const root = new DataNode([], undefined, source, 0);
  // Open ancestors, with the indentation at which each was declared.
  const stack: { node: DataNode; indent: number }[] = [
    { node: root, indent: -1 },
  ];

  const lines = text.split("\n");
  for (const [index, line] of lines.entries()) {
    const indent = indentOf(line);
    const { tokens, unterminated } = tokenizeLine(line.slice(indent));
    if (tokens.length === 0) continue;

    while (stack[stack.length - 1].indent >= indent) stack.pop();
    const parent = stack[stack.length - 1].node;
    const node = parent.addChild(tokens, index + 1);
    stack.push({ node, indent });

    if (unterminated) {
      node.printTrace("Closing quotation mark is missing:");
    }
  }

  return root;
};
