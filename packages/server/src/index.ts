export {
	HttpChainAdapter,
	type HttpChainAdapterOptions,
	type IncomingRequest,
	type OutgoingResponse,
	type RequestListener,
} from "./adapter";
export {
	type ChainTypeMatch,
	ChainTypeResolver,
	type ChainTypeRule,
	DEFAULT_CHAIN_TYPE_RULES,
} from "./chain-resolver";
export { DEFAULT_HOST, DEFAULT_PORT, loadServerConfig, type ServerConfig } from "./config";
export {
	createDiagnosticsHandler,
	DIAGNOSTICS_PREFIX,
	type DiagnosticsHandler,
	type DiagnosticsOptions,
	refreshOrchestratorGauges,
} from "./diagnostics";
export { Counter, Gauge, Histogram, type Labels, MetricsRegistry } from "./metrics";
export { SwitchyardServer, type SwitchyardServerOptions } from "./server";
export {
	BUILTIN_UNIT_DEFAULTS,
	type BuiltinUnitOptions,
	DEFAULT_REQUEST_TIMEOUT_MS,
	recoveryUnit,
	REQUEST_ID_KEY,
	requestIdUnit,
	requestLoggingUnit,
	registerBuiltinUnits,
	SECURITY_HEADERS,
	securityHeadersUnit,
	timeoutUnit,
} from "./units";
