/**
 * Thrown by `setState()` when an `onEnter` redirect chain grows beyond the
 * configured `maxRedirects`. Nothing has been committed when this is thrown.
 */
export class FSMRedirectLimitError<TState = unknown> extends Error {
	override name = "FSMRedirectLimitError";

	constructor(
		/** The state originally requested */
		public readonly from: TState,
		/** Every candidate visited, starting with `from` */
		public readonly chain: readonly TState[],
		public readonly limit: number
	) {
		// prettier-ignore
		super(`Redirect limit (${limit}) exceeded while entering "${String(from)}": ${chain.map(String).join(" -> ")}`);
	}
}
