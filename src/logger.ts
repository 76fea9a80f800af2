type Level = "debug" | "info" | "warn" | "error";

const SEVERITY: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(value: string | undefined): value is Level {
	return value !== undefined && Object.hasOwn(SEVERITY, value);
}

// Read on every call so LOG_LEVEL can be changed by tests and wrappers
function enabled(level: Level): boolean {
	const configured = process.env.LOG_LEVEL?.toLowerCase();
	const threshold = isLevel(configured) ? SEVERITY[configured] : SEVERITY.info;
	return SEVERITY[level] >= threshold;
}

function write(level: Level, args: unknown[]): void {
	if (!enabled(level)) return;
	console.error(new Date().toISOString(), `[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	info: (...args: unknown[]) => write("info", args),
	warn: (...args: unknown[]) => write("warn", args),
	error: (...args: unknown[]) => write("error", args),
	debug: (...args: unknown[]) => write("debug", args),
};
