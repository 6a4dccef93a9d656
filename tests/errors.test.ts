import { test } from "node:test";
import assert from "node:assert/strict";
import { FSMRedirectLimitError } from "../src/errors.ts";

test("FSMRedirectLimitError describes the chain", () => {
	const e = new FSMRedirectLimitError("A", ["A", "B", "A"], 1);

	assert.ok(e instanceof Error);
	assert.equal(e.name, "FSMRedirectLimitError");
	assert.equal(e.from, "A");
	assert.deepEqual(e.chain, ["A", "B", "A"]);
	assert.equal(e.limit, 1);
	assert.equal(
		e.message,
		'Redirect limit (1) exceeded while entering "A": A -> B -> A'
	);
});
