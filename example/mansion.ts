/**
 * @module
 *
 * A small house you can walk around in, driven by the FSM. Rooms are states,
 * doorways are payload. Two rooms are special: the landing costs a life to
 * enter and redirects to the dungeon once you run out, and the dungeon is not
 * in the map at all, so `defaultProperties` makes it up. The only way out of
 * the dungeon is its teleport action.
 */

import mansion from "./mansion.json" with { type: "json" };
import {
	createFsm,
	type FSM,
	type FSMProperties,
	type Logger,
} from "../src/mod.ts";

export type Room = keyof typeof mansion.rooms | "dungeon";

export type Direction = "north" | "south" | "east" | "west" | "tunnel";

export const DIRECTIONS: readonly Direction[] = [
	"north",
	"south",
	"east",
	"west",
	"tunnel",
];

export type RoomAction = {
	label: string;
	run: () => void;
};

export interface RoomInfo extends FSMProperties<Room> {
	name: string;
	exits: Partial<Record<Direction, Room>>;
	actions: readonly RoomAction[];
}

type RawRoom = { name: string } & Partial<Record<Direction, string>>;

const rawRooms: Record<string, RawRoom> = mansion.rooms;

export function isRoom(value: string): value is Room {
	return value === "dungeon" || Object.hasOwn(rawRooms, value);
}

function toRoomInfo(raw: RawRoom): RoomInfo {
	const exits: Partial<Record<Direction, Room>> = {};
	for (const direction of DIRECTIONS) {
		const target = raw[direction];
		if (target === undefined) continue;
		if (!isRoom(target)) {
			throw new Error(`Unknown room "${target}" ${direction} of "${raw.name}"`);
		}
		exits[direction] = target;
	}
	return { name: raw.name, exits, actions: [] };
}

export type MansionOptions = {
	/** Lives at the start, and after every teleport (default: 3) */
	lives?: number;
	logger?: Logger;
	debug?: boolean;
};

export interface Mansion {
	readonly fsm: FSM<Room, RoomInfo>;
	readonly room: Room;
	readonly lives: number;
	/** Names of every room entered, in order */
	readonly journal: readonly string[];
	exits(): Partial<Record<Direction, Room>>;
	move(direction: Direction): Room;
	teleport(): Room;
}

export function createMansion(options: MansionOptions = {}): Mansion {
	const { lives = 3, logger, debug = false } = options;
	let livesLeft = lives;
	const journal: string[] = [];

	const states = new Map<Room, RoomInfo>();
	for (const [id, raw] of Object.entries(rawRooms)) {
		if (isRoom(id)) states.set(id, toRoomInfo(raw));
	}

	states.set("landing", {
		...toRoomInfo(mansion.rooms.landing),
		onEnter: () => {
			--livesLeft;
			if (livesLeft <= 0) return "dungeon";
			logger?.log(`Going upstairs just cost you a life. ${livesLeft} lives left.`);
			return null;
		},
	});

	const fsm: FSM<Room, RoomInfo> = createFsm<Room, RoomInfo>({
		initial: isRoom(mansion.initial) ? mansion.initial : "hall",
		states,
		defaultProperties: (room) => ({
			name: `${room} (Quiet in here, isn't it)`,
			exits: {},
			actions: [
				{
					label: "teleport",
					run: () => {
						livesLeft = lives;
						fsm.setState("hall");
					},
				},
			],
		}),
		onEnteredState: (_, { name }) => {
			journal.push(name);
			logger?.log(`Just entered ${name}`);
		},
		debug,
		logger,
	});

	return {
		fsm,
		get room() {
			return fsm.state;
		},
		get lives() {
			return livesLeft;
		},
		journal,
		exits: () => fsm.values.exits,
		move(direction) {
			const target = fsm.values.exits[direction];
			if (target === undefined) {
				throw new Error(`No way ${direction} from "${fsm.values.name}"`);
			}
			return fsm.setState(target);
		},
		teleport() {
			const action = fsm.values.actions.find((a) => a.label === "teleport");
			if (!action) {
				throw new Error(`Nothing to teleport with in "${fsm.values.name}"`);
			}
			action.run();
			return fsm.state;
		},
	};
}
