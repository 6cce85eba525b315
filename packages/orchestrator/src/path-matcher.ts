// ---------------------------------------------------------------------------
// Path matcher: ordered strategy list for unit path rules
// ---------------------------------------------------------------------------

/** A single way of comparing a request path against a pattern. */
export interface PathMatchStrategy {
	readonly name: string;
	matches(path: string, pattern: string): boolean;
}

/** `pattern === path`. */
const exact: PathMatchStrategy = {
	name: "exact",
	matches: (path, pattern) => pattern === path,
};

/**
 * `/admin/*` matches every path starting with `/admin`. The test is a plain
 * string prefix with no segment boundary, so `/public/*` also matches
 * `/publicity`. Chain-type resolution, unlike this, stops at segment
 * boundaries.
 */
const prefix: PathMatchStrategy = {
	name: "prefix",
	matches: (path, pattern) => pattern.endsWith("/*") && path.startsWith(pattern.slice(0, -2)),
};

/** `*` matches any run of characters, `/` included. Everything else is literal. */
const glob: PathMatchStrategy = {
	name: "glob",
	matches: (path, pattern) => {
		if (!pattern.includes("*")) return false;
		const source = pattern.split("*").map(escapeRegExp).join(".*");
		return new RegExp(`^${source}$`).test(path);
	},
};

/** Shell-style segment match: `*` and `?` stop at `/`, `[...]` is a character class. */
const segment: PathMatchStrategy = {
	name: "segment",
	matches: (path, pattern) => segmentPatternToRegExp(pattern)?.test(path) ?? false,
};

/** Strategies in precedence order. The first one that matches wins. */
export const PATH_MATCH_STRATEGIES: readonly PathMatchStrategy[] = [exact, prefix, glob, segment];

/** Name of the strategy that matched, or undefined. */
export function matchPathStrategy(path: string, pattern: string): string | undefined {
	return PATH_MATCH_STRATEGIES.find((strategy) => strategy.matches(path, pattern))?.name;
}

/** Whether `path` matches `pattern` under any strategy. */
export function matchesPath(path: string, pattern: string): boolean {
	return matchPathStrategy(path, pattern) !== undefined;
}

/** Whether `path` matches at least one of `patterns`. */
export function matchesAnyPath(path: string, patterns: readonly string[]): boolean {
	return patterns.some((pattern) => matchesPath(path, pattern));
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/** Compile a segment pattern. Returns undefined for malformed patterns. */
function segmentPatternToRegExp(pattern: string): RegExp | undefined {
	let source = "";
	let i = 0;
	while (i < pattern.length) {
		const ch = pattern[i] ?? "";
		if (ch === "*") {
			source += "[^/]*";
			i++;
		} else if (ch === "?") {
			source += "[^/]";
			i++;
		} else if (ch === "\\") {
			const escaped = pattern[i + 1];
			if (escaped === undefined) return undefined;
			source += escapeRegExp(escaped);
			i += 2;
		} else if (ch === "[") {
			const end = pattern.indexOf("]", i + 1);
			if (end === -1) return undefined;
			let body = pattern.slice(i + 1, end);
			const negated = body.startsWith("!") || body.startsWith("^");
			if (negated) body = body.slice(1);
			if (body === "") return undefined;
			source += `[${negated ? "^" : ""}${body.replace(/[\\\]^[]/g, "\\$&")}]`;
			i = end + 1;
		} else {
			source += escapeRegExp(ch);
			i++;
		}
	}
	try {
		return new RegExp(`^${source}$`);
	} catch {
		// reversed class range such as [z-a]
		return undefined;
	}
}
