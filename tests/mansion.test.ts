import { test } from "node:test";
import assert from "node:assert/strict";
import { createMansion, isRoom } from "../example/mansion.ts";
import { createCaptureLogger } from "./capture-logger.ts";

test("starts in the hall", () => {
	const m = createMansion();

	assert.equal(m.room, "hall");
	assert.equal(m.lives, 3);
	assert.deepEqual(m.journal, ["Hall"]);
	assert.deepEqual(m.exits(), {
		west: "study",
		south: "stairs",
		east: "lounge",
	});
});

test("walks through doorways and tunnels", () => {
	const m = createMansion();

	assert.equal(m.move("east"), "lounge");
	assert.equal(m.move("tunnel"), "conservatory");
	assert.equal(m.move("east"), "ballroom");
	assert.deepEqual(m.journal, ["Hall", "Lounge", "Conservatory", "Ball Room"]);
});

test("a missing doorway is an error and leaves the room unchanged", () => {
	const m = createMansion();

	assert.throws(() => m.move("north"), {
		message: 'No way north from "Hall"',
	});
	assert.equal(m.room, "hall");
});

test("the landing costs a life and finally redirects to the dungeon", () => {
	const logger = createCaptureLogger();
	const m = createMansion({ logger });

	m.move("south");
	assert.equal(m.move("tunnel"), "landing");
	assert.equal(m.lives, 2);
	m.move("tunnel");
	assert.equal(m.move("tunnel"), "landing");
	assert.equal(m.lives, 1);
	m.move("tunnel");
	assert.equal(m.move("tunnel"), "dungeon");
	assert.equal(m.lives, 0);

	// the refused landing entry is never announced
	assert.deepEqual(m.journal.slice(-2), [
		"Grand Staircase",
		"dungeon (Quiet in here, isn't it)",
	]);
	assert.deepEqual(m.exits(), {});
	assert.deepEqual(
		logger.lines.map((l) => l.line).slice(0, 4),
		[
			"Just entered Hall",
			"Just entered Grand Staircase",
			"Going upstairs just cost you a life. 2 lives left.",
			"Just entered Upstairs (You shouldn't be here)",
		]
	);
});

test("teleport is the only way out of the dungeon", () => {
	const m = createMansion({ lives: 1 });

	m.move("south");
	assert.equal(m.move("tunnel"), "dungeon");
	assert.throws(() => m.move("north"), {
		message: `No way north from "dungeon (Quiet in here, isn't it)"`,
	});

	assert.equal(m.teleport(), "hall");
	assert.equal(m.lives, 1);
	assert.equal(m.fsm.values.name, "Hall");

	assert.throws(() => m.teleport(), {
		message: 'Nothing to teleport with in "Hall"',
	});
});

test("every room in the map is a known room", () => {
	assert.equal(isRoom("library"), true);
	assert.equal(isRoom("dungeon"), true);
	assert.equal(isRoom("attic"), false);
	assert.equal(isRoom("toString"), false);
});
