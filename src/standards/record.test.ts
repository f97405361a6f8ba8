/**
 * Tests for record transformation and set context.
 *
 * Run: node --import tsx --test src/standards/record.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import type { RawStandardNode, RawStandardSet } from "./schema.js";
import { buildRelationshipMaps } from "./relationships.js";
import { normalizeEducationLevels, buildSetContext, transformNode } from "./record.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeSet(nodes: RawStandardNode[], overrides: Partial<RawStandardSet> = {}): RawStandardSet {
  return {
    id: "SET-1",
    title: "Grade 1",
    subject: "Mathematics",
    normalizedSubject: "Math",
    educationLevels: ["01"],
    document: { id: "DOC-1", valid: "2021", publicationStatus: "Published" },
    jurisdiction: { id: "JUR-1", title: "Sample State" },
    nodes: Object.fromEntries(nodes.map((n) => [n.id, n])),
    ...overrides,
  };
}

const root: RawStandardNode = {
  id: "R",
  parentId: null,
  depth: 0,
  position: 1,
  description: "Geometry",
  statementLabel: "Domain",
};

const mid: RawStandardNode = {
  id: "M",
  parentId: "R",
  depth: 1,
  position: 2,
  description: "Reason with shapes",
  statementNotation: "1.G.K",
};

const leaf: RawStandardNode = {
  id: "L",
  parentId: "M",
  depth: 2,
  position: 3,
  description: "Partition shapes",
  statementNotation: "1.G.K.3",
  asnIdentifier: "S0000003",
  statementLabel: "Standard",
};

// ---------------------------------------------------------------------------
// Education levels
// ---------------------------------------------------------------------------

test("comma-packed education levels are split and de-duplicated", () => {
  assert.deepEqual(normalizeEducationLevels(["01,02", "02", "03"]), ["01", "02", "03"]);
});

test("education levels keep first-seen order", () => {
  assert.deepEqual(normalizeEducationLevels(["05", "03,05", "04"]), ["05", "03", "04"]);
});

test("whitespace and empty segments are dropped", () => {
  assert.deepEqual(normalizeEducationLevels([" 09 , 10", ",", ""]), ["09", "10"]);
});

test("empty education levels stay empty", () => {
  assert.deepEqual(normalizeEducationLevels([]), []);
});

// ---------------------------------------------------------------------------
// Set context
// ---------------------------------------------------------------------------

test("set context copies set fields and normalizes levels", () => {
  const context = buildSetContext(makeSet([root], { educationLevels: ["K,01", "01"] }));

  assert.deepEqual(context, {
    standard_set_id: "SET-1",
    standard_set_title: "Grade 1",
    subject: "Mathematics",
    normalized_subject: "Math",
    education_levels: ["K", "01"],
    document_id: "DOC-1",
    document_valid: "2021",
    publication_status: "Published",
    jurisdiction_id: "JUR-1",
    jurisdiction_title: "Sample State",
  });
});

test("absent optional set fields become null", () => {
  const context = buildSetContext(
    makeSet([root], {
      normalizedSubject: undefined,
      document: { id: "DOC-2", valid: "2019" },
    })
  );

  assert.equal(context.normalized_subject, null);
  assert.equal(context.publication_status, null);
});

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

test("leaf record carries its resolved hierarchy", () => {
  const set = makeSet([root, mid, leaf]);
  const maps = buildRelationshipMaps(set.nodes);
  const record = transformNode(leaf, maps, buildSetContext(set));

  assert.equal(record.id, "L");
  assert.equal(
    record.content,
    "Depth 0: Geometry\nDepth 1 (1.G.K): Reason with shapes\nDepth 2 (1.G.K.3): Partition shapes"
  );
  assert.deepEqual(record.ancestor_ids, ["R", "M"]);
  assert.deepEqual(record.child_ids, []);
  assert.equal(record.parent_id, "M");
  assert.equal(record.root_id, "R");
  assert.equal(record.depth, 2);
  assert.equal(record.is_leaf, true);
  assert.equal(record.is_root, false);
  assert.equal(record.sibling_count, 0);
  assert.equal(record.asn_identifier, "S0000003");
  assert.equal(record.statement_notation, "1.G.K.3");
  assert.equal(record.statement_label, "Standard");
});

test("root record has explicit null parent and omits absent fields", () => {
  const set = makeSet([root, mid, leaf]);
  const maps = buildRelationshipMaps(set.nodes);
  const record = transformNode(root, maps, buildSetContext(set));

  assert.equal(record.is_root, true);
  assert.equal(record.root_id, "R");
  assert.ok("parent_id" in record);
  assert.equal(record.parent_id, null);
  assert.deepEqual(record.child_ids, ["M"]);
  assert.equal(record.is_leaf, false);
  assert.equal("statement_notation" in record, false);
  assert.equal("asn_identifier" in record, false);
  assert.equal(record.statement_label, "Domain");
});

test("empty optional source fields are omitted", () => {
  const bare: RawStandardNode = { ...root, statementLabel: "", asnIdentifier: "" };
  const set = makeSet([bare]);
  const record = transformNode(bare, buildRelationshipMaps(set.nodes), buildSetContext(set));

  assert.equal("statement_label" in record, false);
  assert.equal("asn_identifier" in record, false);
});

test("records are frozen", () => {
  const set = makeSet([root, mid]);
  const record = transformNode(mid, buildRelationshipMaps(set.nodes), buildSetContext(set));

  assert.ok(Object.isFrozen(record));
  assert.ok(Object.isFrozen(record.ancestor_ids));
  assert.ok(Object.isFrozen(record.education_levels));
});

test("records of one set do not share education level arrays", () => {
  const set = makeSet([root, mid]);
  const maps = buildRelationshipMaps(set.nodes);
  const context = buildSetContext(set);

  const first = transformNode(root, maps, context);
  const second = transformNode(mid, maps, context);

  assert.deepEqual(first.education_levels, second.education_levels);
  assert.notEqual(first.education_levels, second.education_levels);
});
