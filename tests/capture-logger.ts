import type { Logger } from "../src/fsm.ts";

export type CapturedLine = { level: keyof Logger; line: string };

/** Logger collecting every call as a space-joined line */
export function createCaptureLogger(): Logger & { lines: CapturedLine[] } {
	const lines: CapturedLine[] = [];
	const write =
		(level: keyof Logger) =>
		(...args: unknown[]): string => {
			const line = args.map(String).join(" ");
			lines.push({ level, line });
			return line;
		};
	return {
		lines,
		debug: write("debug"),
		log: write("log"),
		warn: write("warn"),
		error: write("error"),
	};
}
