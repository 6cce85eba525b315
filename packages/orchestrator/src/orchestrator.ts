// ---------------------------------------------------------------------------
// Orchestrator: builds, specialises, validates and caches chains
// ---------------------------------------------------------------------------

import {
	AlreadyExistsError,
	CHAIN_TYPES,
	type ChainInfo,
	type ChainType,
	ChainValidationError,
	createSilentLogger,
	type DependencyError,
	Err,
	type Logger,
	type MiddlewareUnit,
	MissingDependencyError,
	ConflictingUnitError,
	Ok,
	type Result,
} from "@switchyard/core";
import { Chain } from "./chain";
import { CHAIN_CATEGORIES, CHAIN_DESCRIPTIONS } from "./chain-types";
import type { ConfigProvider } from "./config";
import { matchesAnyPath } from "./path-matcher";
import { compareMetadata, type UnitMetadata, type UnitRegistry } from "./registry";

/** Options for {@link Orchestrator}. */
export interface OrchestratorOptions {
	registry: UnitRegistry;
	config: ConfigProvider;
	logger?: Logger;
	/** Most path chains kept at once; the least recently used goes first (default 1000). */
	pathCacheLimit?: number;
}

/** Default for {@link OrchestratorOptions.pathCacheLimit}. */
export const DEFAULT_PATH_CACHE_LIMIT = 1000;

/** Snapshot returned by {@link Orchestrator.getCacheStats}. */
export interface CacheStats {
	/** Number of cached path chains. */
	cacheSize: number;
	/** Last build duration (ms) per chain type. */
	buildTimes: Record<string, number>;
	/** Number of named chains. */
	registeredChains: number;
}

/** Errors {@link Orchestrator.validateConfiguration} can return. */
export type ConfigurationError = DependencyError | ChainValidationError;

/** Prefix of every path-cache key. */
const PATH_CACHE_PREFIX = "path";

/**
 * Assembles chains from the registry for a chain type, optionally
 * specialised for a request path.
 *
 * Path chains are cached by `(type, path)` until {@link clearCache}, up to
 * `pathCacheLimit` entries with least-recently-used eviction. Callers that
 * change configuration at run time must clear the cache themselves.
 *
 * @example
 * ```ts
 * const orchestrator = new Orchestrator({ registry, config, logger });
 * const built = orchestrator.getChainForPath("api", "/api/v1/forms");
 * if (!built.ok) throw built.error;
 * const response = await built.value.process(ctx, request, handler);
 * ```
 */
export class Orchestrator {
	private readonly registry: UnitRegistry;
	private readonly config: ConfigProvider;
	private readonly logger: Logger;
	private readonly pathCache = new Map<string, Chain>();
	private readonly namedChains = new Map<string, Chain>();
	private readonly buildTimes = new Map<ChainType, number>();
	private readonly pathCacheLimit: number;

	constructor(options: OrchestratorOptions) {
		this.registry = options.registry;
		this.config = options.config;
		this.logger = options.logger ?? createSilentLogger();
		this.pathCacheLimit = Math.max(1, options.pathCacheLimit ?? DEFAULT_PATH_CACHE_LIMIT);
	}

	// -----------------------------------------------------------------------
	// Chain building
	// -----------------------------------------------------------------------

	/** Build the chain for `type` from the registry and configuration. */
	createChain(type: ChainType): Result<Chain, ChainValidationError> {
		const start = performance.now();
		try {
			const eligible = this.eligibleUnits(type);
			const units = this.filterByConfig(eligible, type);

			const validation = this.validateUnitSet(units);
			if (!validation.ok) {
				this.logger.warn("chain validation failed", { chainType: type, error: validation.error });
				return Err(new ChainValidationError(type, validation.error));
			}

			this.logger.debug("built middleware chain", {
				chainType: type,
				units: units.map((unit) => unit.name),
			});
			return Ok(new Chain(units));
		} finally {
			this.buildTimes.set(type, performance.now() - start);
		}
	}

	/** Alias of {@link createChain}. */
	buildChain(type: ChainType): Result<Chain, ChainValidationError> {
		return this.createChain(type);
	}

	/**
	 * Build the chain for `type`, then specialise it for `path`: add enabled
	 * units whose `paths` match, drop units whose `excludePaths` match, and
	 * drop units whose non-empty `includePaths` do not match.
	 */
	buildChainForPath(type: ChainType, path: string): Result<Chain, ChainValidationError> {
		const base = this.createChain(type);
		if (!base.ok) return base;

		const units = base.value.list();
		const present = new Set(units.map((unit) => unit.name));

		if (this.config.getChainConfig(type).enabled) {
			for (const name of this.registry.list()) {
				if (present.has(name) || !this.config.isEnabled(name)) continue;
				const paths = this.config.getUnitConfig(name).paths ?? [];
				const unit = this.registry.get(name);
				if (unit && matchesAnyPath(path, paths)) {
					units.push(unit);
					present.add(name);
					this.logger.debug("added path-specific middleware", { name, path });
				}
			}
		}

		const filtered = units.filter((unit) => {
			const unitConfig = this.config.getUnitConfig(unit.name);
			if (matchesAnyPath(path, unitConfig.excludePaths ?? [])) {
				this.logger.debug("excluded middleware by path", { name: unit.name, path });
				return false;
			}
			const includePaths = unitConfig.includePaths ?? [];
			if (includePaths.length > 0 && !matchesAnyPath(path, includePaths)) {
				this.logger.debug("excluded middleware by path requirement", { name: unit.name, path });
				return false;
			}
			return true;
		});

		const ordered = this.sortUnits(filtered);
		const validation = this.validateUnitSet(ordered);
		if (!validation.ok) {
			this.logger.warn("path chain validation failed", {
				chainType: type,
				path,
				error: validation.error,
			});
			return Err(new ChainValidationError(type, validation.error, path));
		}

		return Ok(new Chain(ordered));
	}

	/** Cached {@link buildChainForPath}. Only successful builds are cached. */
	getChainForPath(type: ChainType, path: string): Result<Chain, ChainValidationError> {
		const key = `${PATH_CACHE_PREFIX}:${type}:${path}`;
		const cached = this.pathCache.get(key);
		if (cached) {
			// Map order doubles as recency order.
			this.pathCache.delete(key);
			this.pathCache.set(key, cached);
			return Ok(cached);
		}

		const built = this.buildChainForPath(type, path);
		if (!built.ok) return built;

		if (this.pathCache.size >= this.pathCacheLimit) {
			const oldest = this.pathCache.keys().next();
			if (!oldest.done) {
				this.pathCache.delete(oldest.value);
				this.logger.debug("evicted path chain", { key: oldest.value });
			}
		}
		this.pathCache.set(key, built.value);
		this.logger.info("cached path chain", { chainType: type, path, units: built.value.length });
		return built;
	}

	/** Drop every cached path chain. Named chains are kept. */
	clearCache(): void {
		this.pathCache.clear();
		this.logger.info("cleared chain cache");
	}

	// -----------------------------------------------------------------------
	// Named chains
	// -----------------------------------------------------------------------

	registerChain(name: string, chain: Chain): Result<void, AlreadyExistsError> {
		if (this.namedChains.has(name)) return Err(new AlreadyExistsError(name));
		this.namedChains.set(name, chain);
		this.logger.info("registered named chain", { name, units: chain.length });
		return Ok(undefined);
	}

	getChain(name: string): Chain | undefined {
		return this.namedChains.get(name);
	}

	/** Named chain names, sorted. */
	listChains(): string[] {
		return [...this.namedChains.keys()].sort();
	}

	removeChain(name: string): boolean {
		const removed = this.namedChains.delete(name);
		if (removed) this.logger.info("removed named chain", { name });
		return removed;
	}

	// -----------------------------------------------------------------------
	// Validation and introspection
	// -----------------------------------------------------------------------

	/**
	 * Check the registry as a whole, then build every chain type in
	 * declaration order. Returns the first failure.
	 */
	validateConfiguration(): Result<void, ConfigurationError> {
		const registryCheck = this.registry.validateDependencies();
		if (!registryCheck.ok) return registryCheck;

		for (const type of CHAIN_TYPES) {
			const built = this.createChain(type);
			if (!built.ok) return built;
		}
		return Ok(undefined);
	}

	getChainInfo(type: ChainType): ChainInfo {
		const chainConfig = this.config.getChainConfig(type);
		return {
			type,
			name: type,
			description: CHAIN_DESCRIPTIONS[type],
			categories: [...CHAIN_CATEGORIES[type]],
			units: this.eligibleUnits(type).map((unit) => unit.name),
			enabled: chainConfig.enabled,
			pathPatterns: [...chainConfig.paths],
			settings: { ...chainConfig.settings },
		};
	}

	/** Last build duration (ms) per chain type. */
	getChainPerformance(): Map<ChainType, number> {
		return new Map(this.buildTimes);
	}

	getCacheStats(): CacheStats {
		return {
			cacheSize: this.pathCache.size,
			buildTimes: Object.fromEntries(this.buildTimes),
			registeredChains: this.namedChains.size,
		};
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	/** Units of every category the chain type admits, in build order. */
	private eligibleUnits(type: ChainType): MiddlewareUnit[] {
		const units: MiddlewareUnit[] = [];
		for (const category of CHAIN_CATEGORIES[type]) {
			units.push(...this.registry.getOrdered(category));
		}
		return this.sortUnits(units);
	}

	private filterByConfig(units: MiddlewareUnit[], type: ChainType): MiddlewareUnit[] {
		const chainConfig = this.config.getChainConfig(type);
		if (!chainConfig.enabled) return [];

		const allowed = new Set(chainConfig.units);
		return units.filter(
			(unit) => this.config.isEnabled(unit.name) && (allowed.size === 0 || allowed.has(unit.name)),
		);
	}

	private sortUnits(units: MiddlewareUnit[]): MiddlewareUnit[] {
		const withMeta: Array<[MiddlewareUnit, UnitMetadata]> = [];
		for (const unit of units) {
			const metadata = this.registry.metadata(unit.name);
			if (metadata) withMeta.push([unit, metadata]);
		}
		withMeta.sort(([, a], [, b]) => compareMetadata(a, b));
		return withMeta.map(([unit]) => unit);
	}

	/** Dependencies and conflicts are checked against this set only. */
	private validateUnitSet(units: MiddlewareUnit[]): Result<void, DependencyError> {
		const names = new Set(units.map((unit) => unit.name));

		for (const name of names) {
			for (const dependency of this.registry.metadata(name)?.dependencies ?? []) {
				if (!names.has(dependency)) return Err(new MissingDependencyError(name, dependency));
			}
		}

		for (const name of names) {
			for (const conflict of this.registry.metadata(name)?.conflicts ?? []) {
				if (names.has(conflict)) return Err(new ConflictingUnitError(name, conflict));
			}
		}

		return Ok(undefined);
	}
}
