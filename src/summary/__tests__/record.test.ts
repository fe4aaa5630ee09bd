import assert from "node:assert/strict";
import test from "node:test";
import { ExperimentRecordValidationError } from "../errors.js";
import { parseExperimentRecord, parseExperimentRecordJson, resolveExperimentRecord } from "../record.js";

const defaults = {
  past_state: "",
  future_constraint: "",
  final_state: "",
  seed: 0,
  iterations: 0,
  notes: ""
};

function issuePaths(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    assert.ok(error instanceof ExperimentRecordValidationError);
    return error.issues.map((issue) => issue.path);
  }
  assert.fail("expected ExperimentRecordValidationError");
}

test("resolveExperimentRecord fills every missing field", () => {
  assert.deepEqual(resolveExperimentRecord({}), defaults);
  assert.deepEqual(resolveExperimentRecord({ seed: 9, notes: "n" }), { ...defaults, seed: 9, notes: "n" });
});

test("parseExperimentRecord applies defaults for missing and null fields", () => {
  assert.deepEqual(parseExperimentRecord({}), defaults);
  assert.deepEqual(parseExperimentRecord({ past_state: null, iterations: null, seed: 3 }), { ...defaults, seed: 3 });
});

test("parseExperimentRecord drops unknown keys", () => {
  assert.deepEqual(parseExperimentRecord({ final_state: "done", operator: "lab-7" }), {
    ...defaults,
    final_state: "done"
  });
});

test("parseExperimentRecord rejects negative and fractional counts", () => {
  assert.deepEqual(
    issuePaths(() => parseExperimentRecord({ iterations: -1 })),
    ["iterations"]
  );
  assert.deepEqual(
    issuePaths(() => parseExperimentRecord({ seed: 1.5, iterations: 2.5 })),
    ["seed", "iterations"]
  );
  assert.deepEqual(
    issuePaths(() => parseExperimentRecord({ notes: 12 })),
    ["notes"]
  );
});

test("parseExperimentRecord reports non-object input at the root", () => {
  assert.deepEqual(
    issuePaths(() => parseExperimentRecord("not a record")),
    ["(root)"]
  );
});

test("validation error message lists each issue", () => {
  assert.throws(
    () => parseExperimentRecord({ iterations: -1 }),
    (error: unknown) => {
      assert.ok(error instanceof ExperimentRecordValidationError);
      const lines = error.message.split("\n");
      assert.equal(lines[0], "Invalid experiment record.");
      assert.ok(lines[1].startsWith("  iterations: "));
      assert.equal(lines.length, 2);
      return true;
    }
  );
});

test("parseExperimentRecordJson decodes JSON text", () => {
  assert.deepEqual(parseExperimentRecordJson('{"past_state":"start","iterations":10}'), {
    ...defaults,
    past_state: "start",
    iterations: 10
  });
  assert.deepEqual(
    issuePaths(() => parseExperimentRecordJson("{not json")),
    ["(root)"]
  );
});
