export {
	type ChainRequest,
	createRequest,
	parseCookieHeader,
	type ChainRequestInit,
} from "./http/request";
export { ChainResponse, type CookieOptions, serializeCookie } from "./http/response";
export {
	createSilentLogger,
	isLogLevel,
	type LogEntry,
	LOG_LEVELS,
	Logger,
	type LogLevel,
} from "./logger";
export * from "./result";
export {
	CHAIN_TYPES,
	type ChainInfo,
	type ChainType,
	isChainType,
	isMiddlewareCategory,
	MIDDLEWARE_CATEGORIES,
	type MiddlewareCategory,
} from "./types";
export {
	createExecutionContext,
	DEFAULT_UNIT_PRIORITY,
	defineUnit,
	type ExecutionContext,
	type ExecutionContextOptions,
	type MiddlewareUnit,
	type NextHandler,
	type TerminalHandler,
	type UnitDefinition,
} from "./unit";
