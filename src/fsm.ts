import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import { FSMRedirectLimitError } from "./errors.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/**
 * The minimal capability surface the FSM needs from a state's properties.
 * Anything else on the bundle (labels, exits, further callbacks) is payload
 * and is never touched by the machine.
 *
 * @template TState - Type of the state identifiers
 */
export interface FSMProperties<TState> {
	/**
	 * Called when the machine is about to enter this state. Return nothing
	 * (or `null`, or this very state) to accept; return another state to
	 * redirect the machine there instead.
	 */
	onEnter?: () => TState | null | undefined | void;
	/** Called when the machine is about to leave this state. */
	onExit?: () => void;
}

/**
 * Maps state identifiers to their properties.
 *
 * A `Map` accepts any key type. A plain record works for string, number and
 * symbol ids; only its own properties are considered.
 */
export type FSMStatesTable<TState, TProperties> =
	| ReadonlyMap<TState, TProperties>
	| Partial<Record<TState & PropertyKey, TProperties>>;

/**
 * Constructor configuration
 *
 * @template TState - Type of the state identifiers
 * @template TProperties - Type of the per-state properties bundle
 */
export type FSMConfig<
	TState,
	TProperties extends FSMProperties<TState> = FSMProperties<TState>
> = {
	/** The machine table. Read only, never mutated by the FSM. */
	states: FSMStatesTable<TState, TProperties>;
	/** State requested by the transition performed during construction */
	initial: TState;
	/**
	 * Synthesizes properties for any state missing from `states`.
	 * Invoked on every such lookup; the result is never cached.
	 */
	defaultProperties: (state: TState) => TProperties;
	/** Fired once per completed transition with the final (resolved) state */
	onEnteredState?: (state: TState, properties: TProperties) => void;
	/**
	 * Maximum number of `onEnter` redirects followed within one transition.
	 * Unlimited by default, so a redirect cycle never terminates.
	 */
	maxRedirects?: number;
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Published state data sent to subscribers.
 *
 * @template TState - Type of the state identifiers
 * @template TProperties - Type of the per-state properties bundle
 */
export type PublishedState<TState, TProperties> = {
	current: TState;
	values: TProperties;
};

/**
 * Factory function to create an FSM instance.
 * Equivalent to calling `new FSM(config)`.
 *
 * @example
 * ```typescript
 * const fsm = createFsm<"ON" | "OFF">({
 *   initial: "OFF",
 *   states: { ON: {}, OFF: {} },
 *   defaultProperties: () => ({}),
 * });
 * ```
 */
export function createFsm<
	TState,
	TProperties extends FSMProperties<TState> = FSMProperties<TState>
>(config: FSMConfig<TState, TProperties>): FSM<TState, TProperties> {
	return new FSM<TState, TProperties>(config);
}

function isTableMap<TState, TProperties>(
	states: FSMStatesTable<TState, TProperties>
): states is ReadonlyMap<TState, TProperties> {
	if (states instanceof Map) return true;
	// any other ReadonlyMap implementation
	return (
		"get" in states &&
		typeof states.get === "function" &&
		"has" in states &&
		typeof states.has === "function"
	);
}

function isPropertyKey<TState>(state: TState): state is TState & PropertyKey {
	return (
		typeof state === "string" ||
		typeof state === "number" ||
		typeof state === "symbol"
	);
}

function isRedirect<TState>(
	value: TState | null | undefined | void
): value is TState {
	return value !== undefined && value !== null;
}

/**
 * A lightweight, typed, synchronous Finite State Machine.
 *
 * At each point in time the machine is in exactly one state. The client
 * directs it from state to state with `setState()`; the machine exposes the
 * properties associated with whatever state it is in.
 *
 * A state may act as its own gatekeeper: its `onEnter` hook can refuse entry
 * by returning another state, and the machine follows such redirects until
 * one is accepted. Only the accepted state is ever committed or announced.
 *
 * **Execution order of `setState(target)`:**
 * 1. `onExit` hook of the current state (skipped during construction)
 * 2. `onEnter` of `target`, then of every state it redirects to, until accepted
 * 3. Current state updated
 * 4. `onEnteredState` callback, then subscribers
 *
 * Hooks may call `setState()` re-entrantly; the nested transition completes
 * before the outer one resumes. Errors thrown by hooks propagate to the
 * caller untouched and nothing is rolled back.
 *
 * @template TState - Type of the state identifiers
 * @template TProperties - Type of the per-state properties bundle
 *
 * @example
 * ```typescript
 * const fsm = new FSM<"LOBBY" | "VAULT", Room>({
 *   initial: "LOBBY",
 *   states: {
 *     LOBBY: { label: "Lobby" },
 *     VAULT: { label: "Vault", onEnter: () => (hasKey ? null : "LOBBY") },
 *   },
 *   defaultProperties: (s) => ({ label: String(s) }),
 * });
 *
 * fsm.setState("VAULT"); // → "LOBBY" unless hasKey
 * ```
 */
export class FSM<
	TState,
	TProperties extends FSMProperties<TState> = FSMProperties<TState>
> {
	/** FSM's current state */
	#state: TState;

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	#maxRedirects: number;

	/**
	 * Creates a new FSM instance and immediately transitions to `config.initial`.
	 * @param config - The FSM configuration containing the machine table, initial state and fallback factory
	 * @throws TypeError on an unusable configuration
	 */
	constructor(public readonly config: FSMConfig<TState, TProperties>) {
		if (typeof config.defaultProperties !== "function") {
			throw new TypeError(`"defaultProperties" must be a function`);
		}
		const maxRedirects = config.maxRedirects ?? Infinity;
		if (
			maxRedirects !== Infinity &&
			(!Number.isInteger(maxRedirects) || maxRedirects < 0)
		) {
			// prettier-ignore
			throw new TypeError(`"maxRedirects" must be a non-negative integer or Infinity (got ${maxRedirects})`);
		}
		this.#maxRedirects = maxRedirects;
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? defaultLogger;
		// no prior state, so no exit hook: enter directly
		this.#state = this.#enter(config.initial);
		this.#debugLog(`FSM created with initial state "${String(this.#state)}"`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[FSM]", ...args);
		}
	}

	/**
	 * Returns whether debug mode is enabled.
	 * @returns `true` if debug logging is active, `false` otherwise
	 */
	get debug(): boolean {
		return this.#debug;
	}

	/**
	 * Returns the logger instance used by this FSM.
	 * @returns The Logger instance (default: console)
	 */
	get logger(): Logger {
		return this.#logger;
	}

	/**
	 * Returns the current state of the FSM.
	 * This is a non-reactive getter; use `subscribe()` for reactive updates.
	 */
	get state(): TState {
		return this.#state;
	}

	/** Alias of `state` */
	get currentState(): TState {
		return this.#state;
	}

	/** The properties belonging to the current state */
	get values(): TProperties {
		return this.get(this.#state);
	}

	/**
	 * Returns the properties of any state, current or not. States missing
	 * from the table are synthesized by `defaultProperties` on every call.
	 */
	get(state: TState): TProperties {
		return this.#lookup(state) ?? this.config.defaultProperties(state);
	}

	#lookup(state: TState): TProperties | undefined {
		const { states } = this.config;
		if (isTableMap(states)) return states.get(state);
		if (isPropertyKey(state) && Object.hasOwn(states, state)) {
			return states[state];
		}
		return undefined;
	}

	#getNotifyData(): PublishedState<TState, TProperties> {
		return { current: this.#state, values: this.values };
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	/**
	 * Subscribes to FSM state changes.
	 * The callback is invoked immediately with the current state and after every
	 * completed `setState()` (following `onEnteredState`). Intermediate redirect
	 * hops are never published.
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 *
	 * @example
	 * ```typescript
	 * const unsub = fsm.subscribe(({ current, values }) => render(current, values));
	 * // Later: unsub() to stop listening
	 * ```
	 */
	subscribe(
		cb: (data: PublishedState<TState, TProperties>) => void
	): Unsubscriber {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	/**
	 * Resolves the entry chain starting at `target` and returns the accepted
	 * state. Does not commit anything.
	 */
	#resolve(target: TState): TState {
		let candidate = target;
		// null when unlimited: an unguarded cycle allocates nothing per hop
		const chain: TState[] | null =
			this.#maxRedirects === Infinity ? null : [target];

		while (true) {
			const { onEnter } = this.get(candidate);
			if (typeof onEnter !== "function") break;

			if (this.#debug) {
				this.#debugLog(`executing onEnter for "${String(candidate)}"`);
			}
			const redirect = onEnter();
			if (!isRedirect(redirect) || redirect === candidate) break;

			if (chain) {
				chain.push(redirect);
				if (chain.length - 1 > this.#maxRedirects) {
					throw new FSMRedirectLimitError(target, chain, this.#maxRedirects);
				}
			}
			if (this.#debug) {
				// prettier-ignore
				this.#debugLog(`"${String(candidate)}" redirects to "${String(redirect)}"`);
			}
			candidate = redirect;
		}

		return candidate;
	}

	/** Resolves, commits and notifies. Shared by the constructor and `setState()`. */
	#enter(target: TState): TState {
		const accepted = this.#resolve(target);
		this.#state = accepted;
		this.#debugLog(`entered "${String(accepted)}"`);

		this.config.onEnteredState?.(accepted, this.get(accepted));
		this.#notify();

		return accepted;
	}

	/**
	 * Directs the machine to the given state.
	 *
	 * Runs the current state's `onExit`, then follows `onEnter` redirects
	 * starting at `target` until a state accepts, commits that state and fires
	 * `onEnteredState` exactly once with it. Self-transitions are not special:
	 * targeting the current state runs its `onExit` and `onEnter` again.
	 *
	 * @returns The state the machine ended up in
	 * @throws FSMRedirectLimitError if `maxRedirects` is configured and exceeded
	 *
	 * @example
	 * ```typescript
	 * fsm.setState("KITCHEN");
	 * ```
	 */
	setState(target: TState): TState {
		// prettier-ignore
		this.#debugLog(`setState("${String(target)}") called from state "${String(this.#state)}"`);

		const { onExit } = this.get(this.#state);
		if (typeof onExit === "function") {
			this.#debugLog(`executing onExit for "${String(this.#state)}"`);
			onExit();
		}

		return this.#enter(target);
	}

	/**
	 * Requests the initial state again, with the full exit/enter lifecycle.
	 *
	 * @returns The FSM instance for chaining
	 *
	 * @example
	 * ```typescript
	 * fsm.reset().is("HALL"); // true, unless HALL redirects
	 * ```
	 */
	reset(): FSM<TState, TProperties> {
		this.#debugLog(`reset() called, returning to "${String(this.config.initial)}"`);
		this.setState(this.config.initial);
		return this;
	}

	/**
	 * Checks whether the FSM is currently in the given state.
	 *
	 * @example
	 * ```typescript
	 * if (fsm.is("DUNGEON")) showTeleport();
	 * ```
	 */
	is(state: TState): boolean {
		return this.#state === state;
	}
}
