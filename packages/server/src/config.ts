import { ConfigError, Err, isLogLevel, LOG_LEVELS, type LogLevel, Ok, type Result } from "@switchyard/core";
import { type Environment, isEnvironment } from "@switchyard/orchestrator";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./units";

/** Process-level settings for {@link SwitchyardServer}. */
export interface ServerConfig {
	port: number;
	host: string;
	/** Unit and chain configuration file; built-in defaults only when absent. */
	configPath?: string;
	logLevel: LogLevel;
	/** Overrides the config file's environment when set. */
	environment?: Environment;
	requestTimeoutMs: number;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";

/**
 * Read server settings from environment variables:
 *
 * | Variable | Default |
 * |---|---|
 * | `SWITCHYARD_PORT` | 3000 |
 * | `SWITCHYARD_HOST` | 0.0.0.0 |
 * | `SWITCHYARD_CONFIG` | none |
 * | `SWITCHYARD_LOG_LEVEL` | info |
 * | `SWITCHYARD_ENV` | none |
 * | `SWITCHYARD_TIMEOUT_MS` | 30000 |
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): Result<ServerConfig, ConfigError> {
	const port = parseInteger(env.SWITCHYARD_PORT, DEFAULT_PORT, "SWITCHYARD_PORT", 0, 65_535);
	if (!port.ok) return port;

	const timeout = parseInteger(env.SWITCHYARD_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS, "SWITCHYARD_TIMEOUT_MS", 1);
	if (!timeout.ok) return timeout;

	const logLevel = env.SWITCHYARD_LOG_LEVEL || "info";
	if (!isLogLevel(logLevel)) {
		return Err(new ConfigError(`SWITCHYARD_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${logLevel}")`));
	}

	let environment: Environment | undefined;
	if (env.SWITCHYARD_ENV) {
		if (!isEnvironment(env.SWITCHYARD_ENV)) {
			return Err(new ConfigError(`SWITCHYARD_ENV must be "development" or "production" (got "${env.SWITCHYARD_ENV}")`));
		}
		environment = env.SWITCHYARD_ENV;
	}

	return Ok({
		port: port.value,
		host: env.SWITCHYARD_HOST || DEFAULT_HOST,
		configPath: env.SWITCHYARD_CONFIG || undefined,
		logLevel,
		environment,
		requestTimeoutMs: timeout.value,
	});
}

function parseInteger(
	raw: string | undefined,
	fallback: number,
	name: string,
	min: number,
	max = Number.MAX_SAFE_INTEGER,
): Result<number, ConfigError> {
	if (raw === undefined || raw === "") return Ok(fallback);
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min || value > max) {
		return Err(new ConfigError(`${name} must be an integer between ${min} and ${max} (got "${raw}")`));
	}
	return Ok(value);
}
