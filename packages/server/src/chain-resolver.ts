// ---------------------------------------------------------------------------
// Chain-type resolution: request path to ChainType
// ---------------------------------------------------------------------------

import type { ChainType } from "@switchyard/core";

/** How a rule compares its path against the request path. */
export type ChainTypeMatch = "prefix" | "exact";

/** Rule definition: [chain type, match kind, path] */
export type ChainTypeRule = readonly [ChainType, ChainTypeMatch, string];

/** Rules in precedence order; the first match wins. */
export const DEFAULT_CHAIN_TYPE_RULES: ReadonlyArray<ChainTypeRule> = [
	["api", "prefix", "/api"],
	["web", "prefix", "/dashboard"],
	["web", "prefix", "/forms"],
	["auth", "exact", "/login"],
	["auth", "exact", "/signup"],
	["auth", "exact", "/logout"],
	["auth", "exact", "/forgot-password"],
	["auth", "exact", "/reset-password"],
	["admin", "prefix", "/admin"],
	["public", "prefix", "/public"],
	["static", "prefix", "/static"],
	["static", "prefix", "/assets"],
];

/**
 * Picks the chain type for a request path.
 *
 * Prefix rules match on segment boundaries: `/api` matches `/api` and
 * `/api/forms` but not `/apix`.
 */
export class ChainTypeResolver {
	constructor(
		private readonly rules: ReadonlyArray<ChainTypeRule> = DEFAULT_CHAIN_TYPE_RULES,
		private readonly fallback: ChainType = "default",
	) {}

	resolve(pathname: string): ChainType {
		for (const [type, match, path] of this.rules) {
			if (match === "exact" ? pathname === path : hasPathPrefix(pathname, path)) {
				return type;
			}
		}
		return this.fallback;
	}
}

function hasPathPrefix(pathname: string, prefix: string): boolean {
	if (!pathname.startsWith(prefix)) return false;
	return pathname.length === prefix.length || prefix.endsWith("/") || pathname[prefix.length] === "/";
}
