/**
 * Relationship map builder.
 *
 * Derives the lookup structures every later stage reads from. Maps are
 * built once per set and discarded when the set is done.
 */

import type { RawStandardNode } from "./schema.js";

export interface RelationshipMaps {
  /** Node by identifier */
  readonly idToNode: ReadonlyMap<string, RawStandardNode>;
  /** Parent identifier → child identifiers in ascending `position` order */
  readonly parentToChildren: ReadonlyMap<string, readonly string[]>;
  /** Identifiers never referenced as any node's parent */
  readonly leafIds: ReadonlySet<string>;
  /** Identifiers whose `parentId` is null */
  readonly rootIds: ReadonlySet<string>;
}

/**
 * Build relationship maps for a node collection.
 *
 * A `parentId` pointing at a node absent from the collection is kept as
 * a `parentToChildren` key; it is resolved downstream, never rejected here.
 */
export function buildRelationshipMaps(
  nodes: Readonly<Record<string, RawStandardNode>>
): RelationshipMaps {
  const idToNode = new Map<string, RawStandardNode>();
  const childrenByParent = new Map<string, { id: string; position: number }[]>();
  const rootIds = new Set<string>();

  for (const [id, node] of Object.entries(nodes)) {
    idToNode.set(id, node);

    if (node.parentId === null) {
      rootIds.add(id);
      continue;
    }

    const siblings = childrenByParent.get(node.parentId) ?? [];
    siblings.push({ id, position: node.position });
    childrenByParent.set(node.parentId, siblings);
  }

  // Array.prototype.sort is stable, so equal positions keep insertion order
  const parentToChildren = new Map<string, readonly string[]>();
  for (const [parentId, children] of childrenByParent) {
    parentToChildren.set(
      parentId,
      [...children].sort((a, b) => a.position - b.position).map((child) => child.id)
    );
  }

  const leafIds = new Set<string>();
  for (const id of idToNode.keys()) {
    if (!parentToChildren.has(id)) {
      leafIds.add(id);
    }
  }

  return { idToNode, parentToChildren, leafIds, rootIds };
}
