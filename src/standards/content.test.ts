/**
 * Tests for content text rendering.
 *
 * Run: node --import tsx --test src/standards/content.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import type { RawStandardNode } from "./schema.js";
import { buildContent, formatContentLine } from "./content.js";

function makeNode(overrides: Partial<RawStandardNode> & { id: string }): RawStandardNode {
  return {
    parentId: null,
    depth: 0,
    position: 0,
    description: `Description of ${overrides.id}`,
    ...overrides,
  };
}

test("line includes notation in parentheses when present", () => {
  const node = makeNode({ id: "n", depth: 1, statementNotation: "1.G.A", description: "Reason with shapes" });

  assert.equal(formatContentLine(node), "Depth 1 (1.G.A): Reason with shapes");
});

test("line omits parentheses without notation", () => {
  const node = makeNode({ id: "n", depth: 2, description: "Some description" });

  assert.equal(formatContentLine(node), "Depth 2: Some description");
});

test("empty notation is treated as absent", () => {
  const node = makeNode({ id: "n", depth: 2, statementNotation: "", description: "Some description" });

  assert.equal(formatContentLine(node), "Depth 2: Some description");
});

test("root alone renders a single line", () => {
  const root = makeNode({ id: "root", description: "Geometry" });

  assert.equal(buildContent(root, [], new Map([["root", root]])), "Depth 0: Geometry");
});

test("four-level chain renders four lines, root to leaf", () => {
  const root = makeNode({ id: "root", depth: 0, description: "Root" });
  const a = makeNode({ id: "a", parentId: "root", depth: 1, description: "Level A" });
  const b = makeNode({ id: "b", parentId: "a", depth: 2, statementNotation: "B.1", description: "Level B" });
  const c = makeNode({ id: "c", parentId: "b", depth: 3, statementNotation: "B.1.c", description: "Level C" });
  const idToNode = new Map([root, a, b, c].map((n) => [n.id, n]));

  const lines = buildContent(c, ["root", "a", "b"], idToNode).split("\n");

  assert.deepEqual(lines, [
    "Depth 0: Root",
    "Depth 1: Level A",
    "Depth 2 (B.1): Level B",
    "Depth 3 (B.1.c): Level C",
  ]);
});

test("each line uses its own node's depth", () => {
  const top = makeNode({ id: "top", depth: 4, description: "Top" });
  const child = makeNode({ id: "child", parentId: "top", depth: 7, description: "Child" });
  const idToNode = new Map([top, child].map((n) => [n.id, n]));

  assert.equal(buildContent(child, ["top"], idToNode), "Depth 4: Top\nDepth 7: Child");
});

test("unknown ancestor ids are skipped", () => {
  const node = makeNode({ id: "n", depth: 1, description: "Only me" });

  assert.equal(buildContent(node, ["ghost"], new Map([["n", node]])), "Depth 1: Only me");
});
