export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let activeLevel: LogLevel = "info";

/** Drop messages below `level`. Stdout stays reserved for data, so every level writes to stderr. */
export function setLogLevel(level: LogLevel): void {
	activeLevel = level;
}

export function getLogLevel(): LogLevel {
	return activeLevel;
}

function emit(level: LogLevel, args: unknown[]): void {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	debug: (...args: unknown[]) => emit("debug", args),
	info: (...args: unknown[]) => emit("info", args),
	warn: (...args: unknown[]) => emit("warn", args),
	error: (...args: unknown[]) => emit("error", args),
};
