// ---------------------------------------------------------------------------
// Structured Logger: JSON-lines logger shared by every switchyard package
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** All log levels, lowest severity first. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Type guard for {@link LogLevel}. */
export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && Object.hasOwn(LEVEL_VALUE, value);
}

/**
 * Structured logger writing one JSON object per line to stdout.
 *
 * `Error` values in the data are written as their message, so callers can
 * pass caught errors straight through.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const buildLogger = logger.child({ component: "orchestrator" });
 * buildLogger.info("built middleware chain", { chainType: "api", unitCount: 3 });
 * // => {"level":"info","msg":"built middleware chain","ts":"...","component":"orchestrator","chainType":"api","unitCount":3}
 * ```
 */
export class Logger {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function: defaults to stdout, overridable for testing. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	/** Log at debug level. */
	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	/** Log at info level. */
	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	/** Log at warn level. */
	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	/** Log at error level. */
	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits the parent's level and write function, plus
	 * merges any parent bindings with the new ones.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
		};
		for (const [key, value] of Object.entries(data ?? {})) {
			entry[key] = value instanceof Error ? value.message : value;
		}

		this.writeFn(JSON.stringify(entry));
	}
}

/** A logger that discards every entry. */
export function createSilentLogger(): Logger {
	return new Logger("error", {}, () => {});
}
