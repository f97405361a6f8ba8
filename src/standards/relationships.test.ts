/**
 * Tests for relationship map building.
 *
 * Run: node --import tsx --test src/standards/relationships.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import type { RawStandardNode } from "./schema.js";
import { buildRelationshipMaps } from "./relationships.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeNode(
  id: string,
  parentId: string | null,
  position: number,
  depth = parentId === null ? 0 : 1
): RawStandardNode {
  return { id, parentId, position, depth, description: `Node ${id}` };
}

function keyed(...nodes: RawStandardNode[]): Record<string, RawStandardNode> {
  return Object.fromEntries(nodes.map((n) => [n.id, n]));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

test("idToNode re-keys every node", () => {
  const maps = buildRelationshipMaps(
    keyed(makeNode("root", null, 1), makeNode("a", "root", 2))
  );

  assert.equal(maps.idToNode.size, 2);
  assert.equal(maps.idToNode.get("a")?.description, "Node a");
});

test("children are sorted by position, not insertion order", () => {
  const maps = buildRelationshipMaps(
    keyed(
      makeNode("root", null, 0),
      makeNode("c", "root", 300),
      makeNode("a", "root", 100),
      makeNode("b", "root", 200)
    )
  );

  assert.deepEqual(maps.parentToChildren.get("root"), ["a", "b", "c"]);
});

test("equal positions keep insertion order", () => {
  const maps = buildRelationshipMaps(
    keyed(
      makeNode("root", null, 0),
      makeNode("second", "root", 5),
      makeNode("first", "root", 1),
      makeNode("third", "root", 5)
    )
  );

  assert.deepEqual(maps.parentToChildren.get("root"), ["first", "second", "third"]);
});

test("leafIds are nodes never referenced as a parent", () => {
  const maps = buildRelationshipMaps(
    keyed(
      makeNode("root", null, 0),
      makeNode("mid", "root", 1),
      makeNode("leaf1", "mid", 2, 2),
      makeNode("leaf2", "mid", 3, 2)
    )
  );

  assert.deepEqual([...maps.leafIds].sort(), ["leaf1", "leaf2"]);
  assert.deepEqual([...maps.rootIds], ["root"]);
});

test("a lone root is both root and leaf", () => {
  const maps = buildRelationshipMaps(keyed(makeNode("only", null, 0)));

  assert.ok(maps.rootIds.has("only"));
  assert.ok(maps.leafIds.has("only"));
  assert.equal(maps.parentToChildren.size, 0);
});

test("dangling parent references are accepted as map keys", () => {
  const maps = buildRelationshipMaps(
    keyed(makeNode("root", null, 0), makeNode("orphan", "missing", 1))
  );

  assert.deepEqual(maps.parentToChildren.get("missing"), ["orphan"]);
  assert.ok(maps.leafIds.has("orphan"));
  assert.equal(maps.rootIds.has("orphan"), false);
});

test("empty node collection yields empty maps", () => {
  const maps = buildRelationshipMaps({});

  assert.equal(maps.idToNode.size, 0);
  assert.equal(maps.parentToChildren.size, 0);
  assert.equal(maps.leafIds.size, 0);
  assert.equal(maps.rootIds.size, 0);
});
