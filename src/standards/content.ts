/**
 * Content text generator.
 *
 * Renders one line per level of a node's ancestry, root first and the node
 * itself last:
 *
 *   Depth 0: Geometry
 *   Depth 1 (1.G.A): Reason with shapes and their attributes.
 *   Depth 2 (1.G.A.3): Partition circles and rectangles into equal shares.
 *
 * Each line carries its own node's source depth. No level is given any
 * fixed meaning, so the format holds for hierarchies of any depth.
 */

import type { RawStandardNode } from "./schema.js";

/**
 * Render a single content line for a node.
 */
export function formatContentLine(node: RawStandardNode): string {
  const notation = node.statementNotation;
  return notation
    ? `Depth ${node.depth} (${notation}): ${node.description}`
    : `Depth ${node.depth}: ${node.description}`;
}

/**
 * Build the content block for a node from its ordered ancestor chain.
 * Ancestor identifiers missing from `idToNode` are skipped.
 */
export function buildContent(
  node: RawStandardNode,
  orderedAncestorIds: readonly string[],
  idToNode: ReadonlyMap<string, RawStandardNode>
): string {
  const lines: string[] = [];

  for (const ancestorId of orderedAncestorIds) {
    const ancestor = idToNode.get(ancestorId);
    if (ancestor) {
      lines.push(formatContentLine(ancestor));
    }
  }
  lines.push(formatContentLine(node));

  return lines.join("\n");
}
