import type { ChainType, MiddlewareCategory } from "@switchyard/core";

// ---------------------------------------------------------------------------
// Configuration provider contract
// ---------------------------------------------------------------------------

/** Declarative settings for one unit. Every field is optional. */
export interface UnitConfig {
	category?: MiddlewareCategory;
	priority?: number;
	/** Units that must be present in the same chain. */
	dependencies?: string[];
	/** Units that must not be present in the same chain. */
	conflicts?: string[];
	/** Paths for which the unit is added to a chain that would not otherwise hold it. */
	paths?: string[];
	/** Paths for which the unit is removed. */
	excludePaths?: string[];
	/** When non-empty, the unit is removed from every path that does not match. */
	includePaths?: string[];
	/** Free-form settings read by the unit itself. */
	settings?: Record<string, unknown>;
}

/** Declarative settings for one chain type. */
export interface ChainConfig {
	enabled: boolean;
	/** Explicit allow-list of unit names. Empty means every eligible unit. */
	units: string[];
	/** Path patterns served by this chain type (informational). */
	paths: string[];
	settings: Record<string, unknown>;
}

/**
 * Pure lookup interface the registry and orchestrator consult.
 *
 * Implementations must be free of side effects; answers may change between
 * calls (e.g. after a reload) but a single call never mutates state.
 */
export interface ConfigProvider {
	isEnabled(name: string): boolean;
	/** Never throws; unknown units yield an empty config. */
	getUnitConfig(name: string): UnitConfig;
	getChainConfig(chainType: ChainType): ChainConfig;
}

// ---------------------------------------------------------------------------
// Declarative model
// ---------------------------------------------------------------------------

/** Deployment mode. In development every unit is enabled. */
export type Environment = "development" | "production";

const ENVIRONMENTS: ReadonlySet<unknown> = new Set<Environment>(["development", "production"]);

export function isEnvironment(value: unknown): value is Environment {
	return ENVIRONMENTS.has(value);
}

/** Unit settings as stored in a config document. */
export interface UnitSettings extends UnitConfig {
	enabled?: boolean;
}

/** The whole configuration document. */
export interface SwitchyardConfig {
	environment?: Environment;
	defaults?: {
		/** Whether units without an explicit `enabled` flag are on (default true). */
		enabled?: boolean;
	};
	units?: Record<string, UnitSettings>;
	chains?: Partial<Record<ChainType, Partial<ChainConfig>>>;
}

// ---------------------------------------------------------------------------
// StaticConfigProvider
// ---------------------------------------------------------------------------

/**
 * Answers provider queries from an in-memory {@link SwitchyardConfig}.
 *
 * @example
 * ```ts
 * const config = new StaticConfigProvider({
 *   units: {
 *     csrf: { category: "security", dependencies: ["session"], excludePaths: ["/api/public/*"] },
 *   },
 *   chains: { static: { units: ["recovery"] } },
 * });
 * ```
 */
export class StaticConfigProvider implements ConfigProvider {
	constructor(private readonly config: SwitchyardConfig = {}) {}

	isEnabled(name: string): boolean {
		if (this.config.environment === "development") return true;
		return this.config.units?.[name]?.enabled ?? this.config.defaults?.enabled ?? true;
	}

	getUnitConfig(name: string): UnitConfig {
		const settings = this.config.units?.[name];
		if (!settings) return {};
		const { enabled: _enabled, ...unitConfig } = settings;
		return unitConfig;
	}

	getChainConfig(chainType: ChainType): ChainConfig {
		const chain = this.config.chains?.[chainType];
		return {
			enabled: chain?.enabled ?? true,
			units: chain?.units ?? [],
			paths: chain?.paths ?? [],
			settings: chain?.settings ?? {},
		};
	}

	/** The document this provider answers from. */
	get document(): SwitchyardConfig {
		return this.config;
	}
}

// ---------------------------------------------------------------------------
// UnitDefaultsConfigProvider
// ---------------------------------------------------------------------------

/**
 * Layers per-unit defaults under another provider. Fields the base provider
 * sets win; enablement and chain settings come from the base unchanged.
 */
export class UnitDefaultsConfigProvider implements ConfigProvider {
	constructor(
		private readonly base: ConfigProvider,
		private readonly defaults: Readonly<Record<string, UnitConfig>>,
	) {}

	isEnabled(name: string): boolean {
		return this.base.isEnabled(name);
	}

	getUnitConfig(name: string): UnitConfig {
		const config = this.base.getUnitConfig(name);
		const defaults = this.defaults[name];
		return defaults ? { ...defaults, ...config } : config;
	}

	getChainConfig(chainType: ChainType): ChainConfig {
		return this.base.getChainConfig(chainType);
	}
}
