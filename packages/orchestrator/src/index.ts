export { Chain, notFoundTerminal } from "./chain";
export { CHAIN_CATEGORIES, CHAIN_DESCRIPTIONS } from "./chain-types";
export {
	type ChainConfig,
	type ConfigProvider,
	type Environment,
	isEnvironment,
	StaticConfigProvider,
	type SwitchyardConfig,
	type UnitConfig,
	UnitDefaultsConfigProvider,
	type UnitSettings,
} from "./config";
export { FileConfigProvider, loadConfigFile, parseConfig } from "./config-loader";
export {
	type CacheStats,
	type ConfigurationError,
	DEFAULT_PATH_CACHE_LIMIT,
	Orchestrator,
	type OrchestratorOptions,
} from "./orchestrator";
export {
	matchesAnyPath,
	matchesPath,
	matchPathStrategy,
	PATH_MATCH_STRATEGIES,
	type PathMatchStrategy,
} from "./path-matcher";
export {
	compareMetadata,
	DEFAULT_CATEGORY,
	type UnitMetadata,
	UnitRegistry,
	type UnitRegistryOptions,
} from "./registry";
