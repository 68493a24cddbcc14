// src/core/data/dataNode.ts

/**
 * One line of a data file: an ordered list of string tokens plus the lines
 * indented beneath it.
 * @remarks
 * Accessors are tolerant of malformed data. An out-of-range token reads as
 * the empty string and a non-numeric value reads as 0, so callers can check
 * `size()` where it matters and otherwise keep going.
 */
export class DataNode {
  public readonly children: DataNode[] = [];

  constructor(
    public readonly tokens: string[] = [],
    public readonly parent?: DataNode,
    public readonly source = "",
    public readonly lineNumber = 0,
  ) {}

  public size(): number {
    return this.tokens.length;
  }

  public token(index: number): string {
    return this.tokens[index] ?? "";
  }

  public isNumber(index: number): boolean {
    return DataNode.parseNumber(this.token(index)) !== undefined;
  }

  /**
   * Reads a token as a floating-point number, tracing a warning and
   * returning 0 if it cannot be converted.
   */
  public value(index: number): number {
    const parsed = DataNode.parseNumber(this.token(index));
    if (parsed === undefined) {
      this.printTrace(`Cannot convert value "${this.token(index)}" to a number:`);
      return 0;
    }
    return parsed;
  }

  /** Appends a child line and returns it. */
  public addChild(tokens: string[], lineNumber = 0): DataNode {
    const child = new DataNode(tokens, this, this.source, lineNumber);
    this.children.push(child);
    return child;
  }

  /**
   * Prints a non-fatal diagnostic naming this node and its ancestors.
   * @returns The text that was written.
   */
  public printTrace(message: string): string {
    // Ancestors first; the root itself has no tokens and is not printed.
    const chain: DataNode[] = [];
    let node: DataNode = this;
    while (node.parent) {
      chain.unshift(node);
      node = node.parent;
    }
    const lines = chain.map(
      (node, depth) => `${"\t".repeat(depth)}${node.formatLine()}`,
    );

    const location = this.lineNumber
      ? ` (${this.source || "<data>"}:${this.lineNumber})`
      : "";
    const text = [`${message}${location}`, ...lines].join("\n");
    console.warn(`[DataNode] ${text}`);
    return text;
  }

  private formatLine(): string {
    return this.tokens
      .map((token) =>
        /\s/.test(token) || token === ""
          ? token.includes('"')
            ? `\`${token}\``
            : `"${token}"`
          : token,
      )
      .join(" ");
  }

  private static parseNumber(token: string): number | undefined {
    if (token === "" || !/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(token)) {
      return undefined;
    }
    return Number(token);
  }
}
