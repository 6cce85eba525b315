import { readFile } from "node:fs/promises";
import {
	type ChainType,
	ConfigError,
	Err,
	isChainType,
	isMiddlewareCategory,
	Ok,
	type Result,
	toError,
} from "@switchyard/core";
import equal from "fast-deep-equal";
import {
	type ChainConfig,
	type ConfigProvider,
	type Environment,
	isEnvironment,
	StaticConfigProvider,
	type SwitchyardConfig,
	type UnitConfig,
	type UnitSettings,
} from "./config";

// ---------------------------------------------------------------------------
// Document validation
// ---------------------------------------------------------------------------

const TOP_LEVEL_KEYS = new Set(["environment", "defaults", "units", "chains"]);
const UNIT_KEYS = new Set([
	"enabled",
	"category",
	"priority",
	"dependencies",
	"conflicts",
	"paths",
	"exclude_paths",
	"include_paths",
	"settings",
]);
const CHAIN_KEYS = new Set(["enabled", "units", "paths", "settings"]);

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function checkKeys(value: Record<string, unknown>, allowed: Set<string>, where: string): ConfigError | undefined {
	for (const key of Object.keys(value)) {
		if (!allowed.has(key)) return new ConfigError(`${where}: unknown key "${key}"`);
	}
	return undefined;
}

function optionalBoolean(value: unknown, where: string): Result<boolean | undefined, ConfigError> {
	if (value === undefined || typeof value === "boolean") return Ok(value);
	return Err(new ConfigError(`${where} must be a boolean`));
}

function optionalStrings(value: unknown, where: string): Result<string[] | undefined, ConfigError> {
	if (value === undefined) return Ok(undefined);
	if (isStringArray(value)) return Ok([...value]);
	return Err(new ConfigError(`${where} must be an array of strings`));
}

function optionalSettings(value: unknown, where: string): Result<Record<string, unknown> | undefined, ConfigError> {
	if (value === undefined) return Ok(undefined);
	if (isRecord(value)) return Ok({ ...value });
	return Err(new ConfigError(`${where} must be an object`));
}

function parseUnit(name: string, raw: unknown): Result<UnitSettings, ConfigError> {
	const where = `units.${name}`;
	if (!isRecord(raw)) return Err(new ConfigError(`${where} must be an object`));
	const unknownKey = checkKeys(raw, UNIT_KEYS, where);
	if (unknownKey) return Err(unknownKey);

	const unit: UnitSettings = {};

	const enabled = optionalBoolean(raw.enabled, `${where}.enabled`);
	if (!enabled.ok) return enabled;
	if (enabled.value !== undefined) unit.enabled = enabled.value;

	if (raw.category !== undefined) {
		if (!isMiddlewareCategory(raw.category)) {
			return Err(new ConfigError(`${where}.category: unknown category "${String(raw.category)}"`));
		}
		unit.category = raw.category;
	}

	if (raw.priority !== undefined) {
		if (typeof raw.priority !== "number" || !Number.isInteger(raw.priority)) {
			return Err(new ConfigError(`${where}.priority must be an integer`));
		}
		unit.priority = raw.priority;
	}

	const lists = [
		["dependencies", "dependencies"],
		["conflicts", "conflicts"],
		["paths", "paths"],
		["excludePaths", "exclude_paths"],
		["includePaths", "include_paths"],
	] as const;
	for (const [field, key] of lists) {
		const list = optionalStrings(raw[key], `${where}.${key}`);
		if (!list.ok) return list;
		if (list.value !== undefined) unit[field] = list.value;
	}

	const settings = optionalSettings(raw.settings, `${where}.settings`);
	if (!settings.ok) return settings;
	if (settings.value !== undefined) unit.settings = settings.value;

	return Ok(unit);
}

function parseChain(type: ChainType, raw: unknown): Result<Partial<ChainConfig>, ConfigError> {
	const where = `chains.${type}`;
	if (!isRecord(raw)) return Err(new ConfigError(`${where} must be an object`));
	const unknownKey = checkKeys(raw, CHAIN_KEYS, where);
	if (unknownKey) return Err(unknownKey);

	const chain: Partial<ChainConfig> = {};

	const enabled = optionalBoolean(raw.enabled, `${where}.enabled`);
	if (!enabled.ok) return enabled;
	if (enabled.value !== undefined) chain.enabled = enabled.value;

	const units = optionalStrings(raw.units, `${where}.units`);
	if (!units.ok) return units;
	if (units.value !== undefined) chain.units = units.value;

	const paths = optionalStrings(raw.paths, `${where}.paths`);
	if (!paths.ok) return paths;
	if (paths.value !== undefined) chain.paths = paths.value;

	const settings = optionalSettings(raw.settings, `${where}.settings`);
	if (!settings.ok) return settings;
	if (settings.value !== undefined) chain.settings = settings.value;

	return Ok(chain);
}

/**
 * Validate an on-disk configuration document and convert it to the typed
 * model. Path lists use the snake_case keys `exclude_paths` and
 * `include_paths`; unknown keys are rejected.
 */
export function parseConfig(raw: unknown): Result<SwitchyardConfig, ConfigError> {
	if (!isRecord(raw)) return Err(new ConfigError("config must be a JSON object"));
	const unknownKey = checkKeys(raw, TOP_LEVEL_KEYS, "config");
	if (unknownKey) return Err(unknownKey);

	const config: SwitchyardConfig = {};

	if (raw.environment !== undefined) {
		if (!isEnvironment(raw.environment)) {
			return Err(new ConfigError(`environment must be "development" or "production"`));
		}
		config.environment = raw.environment;
	}

	if (raw.defaults !== undefined) {
		if (!isRecord(raw.defaults)) return Err(new ConfigError("defaults must be an object"));
		const unknownDefault = checkKeys(raw.defaults, new Set(["enabled"]), "defaults");
		if (unknownDefault) return Err(unknownDefault);
		const enabled = optionalBoolean(raw.defaults.enabled, "defaults.enabled");
		if (!enabled.ok) return enabled;
		config.defaults = enabled.value === undefined ? {} : { enabled: enabled.value };
	}

	if (raw.units !== undefined) {
		if (!isRecord(raw.units)) return Err(new ConfigError("units must be an object"));
		const units: Record<string, UnitSettings> = {};
		for (const [name, value] of Object.entries(raw.units)) {
			const unit = parseUnit(name, value);
			if (!unit.ok) return unit;
			units[name] = unit.value;
		}
		config.units = units;
	}

	if (raw.chains !== undefined) {
		if (!isRecord(raw.chains)) return Err(new ConfigError("chains must be an object"));
		const chains: Partial<Record<ChainType, Partial<ChainConfig>>> = {};
		for (const [type, value] of Object.entries(raw.chains)) {
			if (!isChainType(type)) return Err(new ConfigError(`chains: unknown chain type "${type}"`));
			const chain = parseChain(type, value);
			if (!chain.ok) return chain;
			chains[type] = chain.value;
		}
		config.chains = chains;
	}

	return Ok(config);
}

// ---------------------------------------------------------------------------
// File loading
// ---------------------------------------------------------------------------

/** Read and validate a JSON configuration file. */
export async function loadConfigFile(path: string): Promise<Result<SwitchyardConfig, ConfigError>> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (err) {
		return Err(new ConfigError(`cannot read config file ${path}`, toError(err)));
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		return Err(new ConfigError(`config file ${path} is not valid JSON`, toError(err)));
	}

	const parsed = parseConfig(raw);
	if (!parsed.ok) {
		return Err(new ConfigError(`${path}: ${parsed.error.message}`, parsed.error));
	}
	return parsed;
}

/**
 * Provider backed by a JSON file. {@link reload} re-reads the file and
 * reports whether the document changed, so the owner knows to clear the
 * orchestrator's chain cache.
 *
 * @example
 * ```ts
 * const opened = await FileConfigProvider.open("switchyard.json");
 * if (!opened.ok) throw opened.error;
 * const changed = await opened.value.reload();
 * if (changed.ok && changed.value) orchestrator.clearCache();
 * ```
 */
export class FileConfigProvider implements ConfigProvider {
	private current: StaticConfigProvider;

	private constructor(
		readonly path: string,
		config: SwitchyardConfig,
		private readonly environment?: Environment,
	) {
		this.current = new StaticConfigProvider(config);
	}

	/**
	 * Load `path`. A given `environment` replaces the file's own on this and
	 * every later load.
	 */
	static async open(path: string, environment?: Environment): Promise<Result<FileConfigProvider, ConfigError>> {
		const loaded = await loadConfigFile(path);
		if (!loaded.ok) return loaded;
		return Ok(new FileConfigProvider(path, withEnvironment(loaded.value, environment), environment));
	}

	/**
	 * Re-read the file. Resolves to `true` when the document differs from the
	 * one in use. On failure the previous document stays in effect.
	 */
	async reload(): Promise<Result<boolean, ConfigError>> {
		const loaded = await loadConfigFile(this.path);
		if (!loaded.ok) return loaded;
		const next = withEnvironment(loaded.value, this.environment);
		if (equal(next, this.current.document)) return Ok(false);
		this.current = new StaticConfigProvider(next);
		return Ok(true);
	}

	isEnabled(name: string): boolean {
		return this.current.isEnabled(name);
	}

	getUnitConfig(name: string): UnitConfig {
		return this.current.getUnitConfig(name);
	}

	getChainConfig(chainType: ChainType): ChainConfig {
		return this.current.getChainConfig(chainType);
	}

	get document(): SwitchyardConfig {
		return this.current.document;
	}
}

function withEnvironment(config: SwitchyardConfig, environment: Environment | undefined): SwitchyardConfig {
	return environment === undefined ? config : { ...config, environment };
}
