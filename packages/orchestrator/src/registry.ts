import {
	AlreadyRegisteredError,
	ConflictingUnitError,
	createSilentLogger,
	type DependencyError,
	Err,
	type Logger,
	type MiddlewareCategory,
	type MiddlewareUnit,
	MissingDependencyError,
	Ok,
	type RegistrationError,
	type Result,
	UnitNameMismatchError,
} from "@switchyard/core";
import type { ConfigProvider } from "./config";

/** Metadata derived from the configuration provider when a unit is registered. */
export interface UnitMetadata {
	readonly name: string;
	readonly category: MiddlewareCategory;
	/** Config priority, else the unit's own priority. */
	readonly priority: number;
	readonly dependencies: ReadonlySet<string>;
	readonly conflicts: ReadonlySet<string>;
	/** Registration order; breaks priority ties. */
	readonly sequence: number;
}

/** Category given to units whose config names none. */
export const DEFAULT_CATEGORY: MiddlewareCategory = "basic";

/** Options for {@link UnitRegistry}. */
export interface UnitRegistryOptions {
	config: ConfigProvider;
	logger?: Logger;
}

/** Ascending priority, then registration order. */
export function compareMetadata(a: UnitMetadata, b: UnitMetadata): number {
	return a.priority - b.priority || a.sequence - b.sequence;
}

/**
 * Catalog of registered middleware units and their metadata.
 *
 * Metadata is read from the configuration provider once, at registration,
 * and stays cached until the unit is removed or the registry cleared.
 *
 * @example
 * ```ts
 * const registry = new UnitRegistry({ config, logger });
 * const result = registry.register("request-id", requestIdUnit);
 * if (!result.ok) throw result.error;
 * registry.getOrdered("basic"); // enabled basic units, lowest priority first
 * ```
 */
export class UnitRegistry {
	private readonly config: ConfigProvider;
	private readonly logger: Logger;
	private readonly units = new Map<string, MiddlewareUnit>();
	private readonly meta = new Map<string, UnitMetadata>();
	private readonly categories = new Map<MiddlewareCategory, string[]>();
	private readonly disabled = new Set<string>();
	private sequence = 0;

	constructor(options: UnitRegistryOptions) {
		this.config = options.config;
		this.logger = options.logger ?? createSilentLogger();
	}

	/**
	 * Register a unit under `name`, which must equal `unit.name`: chains
	 * find a unit's metadata by its own name.
	 *
	 * A unit the provider reports disabled is accepted without error but is
	 * not catalogued: it never shows up in lookups, listings or chains.
	 */
	register(name: string, unit: MiddlewareUnit): Result<void, RegistrationError> {
		if (name !== unit.name) {
			return Err(new UnitNameMismatchError(name, unit.name));
		}
		if (this.units.has(name) || this.disabled.has(name)) {
			return Err(new AlreadyRegisteredError(name));
		}

		if (!this.config.isEnabled(name)) {
			this.disabled.add(name);
			this.logger.info("middleware disabled by config", { name });
			return Ok(undefined);
		}

		const metadata = this.deriveMetadata(name, unit);
		this.units.set(name, unit);
		this.meta.set(name, metadata);
		const bucket = this.categories.get(metadata.category) ?? [];
		bucket.push(name);
		this.categories.set(metadata.category, bucket);

		this.logger.debug("registered middleware", {
			name,
			category: metadata.category,
			priority: metadata.priority,
		});
		return Ok(undefined);
	}

	/** Look up a catalogued unit. */
	get(name: string): MiddlewareUnit | undefined {
		return this.units.get(name);
	}

	has(name: string): boolean {
		return this.units.has(name);
	}

	/** Catalogued unit names, sorted. */
	list(): string[] {
		return [...this.units.keys()].sort();
	}

	/** Names accepted while disabled, sorted. */
	listDisabled(): string[] {
		return [...this.disabled].sort();
	}

	isDisabled(name: string): boolean {
		return this.disabled.has(name);
	}

	/** Remove a unit and every index entry that mentions it. */
	remove(name: string): boolean {
		if (this.disabled.delete(name)) return true;

		const metadata = this.meta.get(name);
		if (!metadata) return false;

		this.units.delete(name);
		this.meta.delete(name);
		const bucket = this.categories.get(metadata.category);
		if (bucket) {
			const index = bucket.indexOf(name);
			if (index !== -1) bucket.splice(index, 1);
		}
		return true;
	}

	clear(): void {
		this.units.clear();
		this.meta.clear();
		this.categories.clear();
		this.disabled.clear();
	}

	/** Number of catalogued units. */
	count(): number {
		return this.units.size;
	}

	metadata(name: string): UnitMetadata | undefined {
		return this.meta.get(name);
	}

	categoryOf(name: string): MiddlewareCategory | undefined {
		return this.meta.get(name)?.category;
	}

	priorityOf(name: string): number | undefined {
		return this.meta.get(name)?.priority;
	}

	/**
	 * Units tagged with `category` that the provider currently reports
	 * enabled, lowest priority first, ties in registration order.
	 */
	getOrdered(category: MiddlewareCategory): MiddlewareUnit[] {
		const names = this.categories.get(category) ?? [];
		const ordered: UnitMetadata[] = [];
		for (const name of names) {
			const metadata = this.meta.get(name);
			if (metadata && this.config.isEnabled(name)) ordered.push(metadata);
		}
		ordered.sort(compareMetadata);

		const result: MiddlewareUnit[] = [];
		for (const { name } of ordered) {
			const unit = this.units.get(name);
			if (unit) result.push(unit);
		}
		return result;
	}

	/**
	 * Registry-wide sanity check: every declared dependency must be
	 * registered, and no declared conflict may be.
	 */
	validateDependencies(): Result<void, DependencyError> {
		for (const { name, dependencies } of this.meta.values()) {
			for (const dependency of dependencies) {
				if (!this.units.has(dependency)) {
					return Err(new MissingDependencyError(name, dependency));
				}
			}
		}

		for (const { name, conflicts } of this.meta.values()) {
			for (const conflict of conflicts) {
				if (this.units.has(conflict)) {
					return Err(new ConflictingUnitError(name, conflict));
				}
			}
		}

		return Ok(undefined);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private deriveMetadata(name: string, unit: MiddlewareUnit): UnitMetadata {
		const config = this.config.getUnitConfig(name);
		if (config.category === undefined) {
			this.logger.debug("middleware has no category, defaulting", { name, category: DEFAULT_CATEGORY });
		}
		return {
			name,
			category: config.category ?? DEFAULT_CATEGORY,
			priority: config.priority ?? unit.priority,
			dependencies: new Set(config.dependencies ?? []),
			conflicts: new Set(config.conflicts ?? []),
			sequence: this.sequence++,
		};
	}
}
