// ---------------------------------------------------------------------------
// Chain types and middleware categories
// ---------------------------------------------------------------------------

/** Every chain type, in the order start-up validation walks them. */
export const CHAIN_TYPES = ["default", "api", "web", "auth", "admin", "public", "static"] as const;

/** A closed category of request traffic that decides which units are eligible. */
export type ChainType = (typeof CHAIN_TYPES)[number];

/** Coarse classification of a unit's purpose. */
export const MIDDLEWARE_CATEGORIES = ["basic", "security", "auth", "logging", "custom"] as const;

/** A single category value from {@link MIDDLEWARE_CATEGORIES}. */
export type MiddlewareCategory = (typeof MIDDLEWARE_CATEGORIES)[number];

const CHAIN_TYPE_SET: ReadonlySet<unknown> = new Set(CHAIN_TYPES);
const CATEGORY_SET: ReadonlySet<unknown> = new Set(MIDDLEWARE_CATEGORIES);

/** Type guard for {@link ChainType}. */
export function isChainType(value: unknown): value is ChainType {
	return CHAIN_TYPE_SET.has(value);
}

/** Type guard for {@link MiddlewareCategory}. */
export function isMiddlewareCategory(value: unknown): value is MiddlewareCategory {
	return CATEGORY_SET.has(value);
}

/** Read-only descriptor of a chain type, used for introspection and tooling. */
export interface ChainInfo {
	type: ChainType;
	name: string;
	description: string;
	categories: MiddlewareCategory[];
	/** Eligible unit names in priority order, before chain config filtering. */
	units: string[];
	enabled: boolean;
	pathPatterns: string[];
	settings: Record<string, unknown>;
}
