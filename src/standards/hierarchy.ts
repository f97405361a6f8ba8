/**
 * Hierarchy resolver.
 *
 * Resolves root identity and ancestor chains by walking `parentId`
 * pointers upward with an explicit visited set. The walk stops at the
 * first of:
 *
 *   - a null `parentId`        → "root"
 *   - a parent missing from the set → "dangling"
 *   - a parent already visited  → "cycle"
 *
 * The node where the walk stopped is the effective root. Broken chains are
 * truncated, never repaired, and never raise. Every step visits a new
 * identifier, so a walk takes at most one step per node in the set.
 */

import type { RawStandardNode } from "./schema.js";
import type { RelationshipMaps } from "./relationships.js";

export type WalkTermination = "root" | "dangling" | "cycle";

export interface HierarchyResolution {
  /** Identifier of the node where the upward walk stopped */
  rootId: string;
  /** Ancestors ordered root first, immediate parent last */
  ancestorIds: string[];
  termination: WalkTermination;
}

/**
 * Walk a node's parent chain once, collecting ancestors and the stop reason.
 */
export function resolveHierarchy(
  node: RawStandardNode,
  idToNode: ReadonlyMap<string, RawStandardNode>
): HierarchyResolution {
  const visited = new Set<string>([node.id]);
  const nearestFirst: string[] = [];
  let current = node;
  let termination: WalkTermination = "root";

  while (current.parentId !== null) {
    const parentId = current.parentId;

    if (visited.has(parentId)) {
      termination = "cycle";
      break;
    }

    const parent = idToNode.get(parentId);
    if (parent === undefined) {
      termination = "dangling";
      break;
    }

    visited.add(parentId);
    nearestFirst.push(parentId);
    current = parent;
  }

  return {
    rootId: current.id,
    ancestorIds: nearestFirst.reverse(),
    termination,
  };
}

/**
 * Identifier of the node's root, or of the node where a broken chain ends.
 */
export function findRootId(
  node: RawStandardNode,
  idToNode: ReadonlyMap<string, RawStandardNode>
): string {
  return resolveHierarchy(node, idToNode).rootId;
}

/**
 * Ancestor identifiers, root first. Empty for roots.
 */
export function buildOrderedAncestors(
  node: RawStandardNode,
  idToNode: ReadonlyMap<string, RawStandardNode>
): string[] {
  return resolveHierarchy(node, idToNode).ancestorIds;
}

/**
 * Number of other nodes sharing this node's parent.
 * Roots count the other roots of the set.
 */
export function computeSiblingCount(
  node: RawStandardNode,
  maps: Pick<RelationshipMaps, "parentToChildren" | "rootIds">
): number {
  const groupSize =
    node.parentId === null
      ? maps.rootIds.size
      : (maps.parentToChildren.get(node.parentId)?.length ?? 0);

  return Math.max(groupSize - 1, 0);
}
