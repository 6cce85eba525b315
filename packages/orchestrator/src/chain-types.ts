import type { ChainType, MiddlewareCategory } from "@switchyard/core";

/** Categories whose units are eligible for each chain type. */
export const CHAIN_CATEGORIES: Readonly<Record<ChainType, readonly MiddlewareCategory[]>> = {
	default: ["basic", "security", "logging"],
	api: ["basic", "security", "auth", "logging"],
	web: ["basic", "security", "auth", "logging"],
	auth: ["basic", "security", "auth"],
	admin: ["basic", "security", "auth", "logging"],
	public: ["basic", "security"],
	static: ["basic"],
};

/** Human-readable description of each chain type. */
export const CHAIN_DESCRIPTIONS: Readonly<Record<ChainType, string>> = {
	default: "Default middleware chain for most requests",
	api: "Middleware chain for API requests with authentication and logging",
	web: "Middleware chain for web page requests with session management",
	auth: "Middleware chain for authentication endpoints",
	admin: "Middleware chain for admin-only endpoints with enhanced security",
	public: "Middleware chain for public endpoints with basic security",
	static: "Middleware chain for static asset requests",
};
