// src/core/ui/alignment.ts
import type { Vec2d } from "wgpu-matrix";
import { DataNode } from "@/core/data/dataNode";

/**
 * Parses `left`, `top`, `right` and `bottom` tokens into an alignment vector.
 * @remarks
 * Each token is an independent switch on one axis: later tokens win, and an
 * axis no token mentions keeps its previous value (0 = centered). Unknown
 * tokens are traced and skipped.
 *
 * @param node The line holding the tokens.
 * @param alignment Updated in place.
 * @param start Index of the first alignment token.
 * @returns `alignment`, for chaining.
 */
export function parseAlignment(
  node: DataNode,
  alignment: Vec2d,
  start = 1,
): Vec2d {
  for (let i = start; i < node.size(); i++) {
    switch (node.token(i)) {
      case "left":
        alignment[0] = -1;
        break;
      case "top":
        alignment[1] = -1;
        break;
      case "right":
        alignment[0] = 1;
        break;
      case "bottom":
        alignment[1] = 1;
        break;
      default:
        node.printTrace("Unrecognized interface element alignment:");
    }
  }
  return alignment;
}
