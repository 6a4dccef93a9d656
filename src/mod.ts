/**
 * @module
 *
 * A lightweight, typed, framework-agnostic Finite State Machine with
 * entry-time redirects.
 *
 * Each state carries a bundle of properties. The machine only cares about two
 * optional hooks on that bundle: `onExit`, fired when leaving, and `onEnter`,
 * which may redirect the machine elsewhere instead of accepting entry. States
 * missing from the table are synthesized by a fallback factory.
 *
 * @example Basic usage
 * ```typescript
 * import { createFsm } from "redirecting-fsm";
 *
 * let lives = 3;
 * const fsm = createFsm<"HALL" | "LANDING" | "DUNGEON", { name: string }>({
 *   initial: "HALL",
 *   states: {
 *     HALL: { name: "Hall" },
 *     LANDING: { name: "Landing", onEnter: () => (--lives ? null : "DUNGEON") },
 *   },
 *   defaultProperties: (s) => ({ name: String(s) }),
 *   onEnteredState: (_, { name }) => console.log(`Just entered ${name}`),
 * });
 *
 * fsm.setState("LANDING"); // → "LANDING" while lives last, then "DUNGEON"
 * ```
 */

export * from "./fsm.ts";
export * from "./errors.ts";
