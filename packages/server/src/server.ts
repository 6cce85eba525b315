import { createServer, type Server } from "node:http";
import {
	createSilentLogger,
	type Logger,
	type MiddlewareUnit,
	Ok,
	type RegistrationError,
	type Result,
	type TerminalHandler,
	unwrapOrThrow,
} from "@switchyard/core";
import {
	type ConfigProvider,
	type ConfigurationError,
	Orchestrator,
	StaticConfigProvider,
	UnitDefaultsConfigProvider,
	UnitRegistry,
} from "@switchyard/orchestrator";
import { HttpChainAdapter } from "./adapter";
import type { ChainTypeResolver } from "./chain-resolver";
import { DEFAULT_HOST, DEFAULT_PORT } from "./config";
import { createDiagnosticsHandler } from "./diagnostics";
import { MetricsRegistry } from "./metrics";
import { BUILTIN_UNIT_DEFAULTS, registerBuiltinUnits } from "./units";

export interface SwitchyardServerOptions {
	/** Port to listen on (default 3000; 0 picks a free port). */
	port?: number;
	host?: string;
	/** Unit and chain configuration (default: everything enabled). */
	config?: ConfigProvider;
	logger?: Logger;
	/** Application handler run after the last unit (default: 404). */
	terminal?: TerminalHandler;
	resolver?: ChainTypeResolver;
	requestTimeoutMs?: number;
	/** Most path chains cached at once (default 1000). */
	pathCacheLimit?: number;
	/** Register the built-in units (default true). */
	builtins?: boolean;
	/** Serve /_switchyard/* and /metrics (default true). */
	diagnostics?: boolean;
}

/**
 * Standalone HTTP server running orchestrator-built chains.
 *
 * @example
 * ```ts
 * const server = new SwitchyardServer({ port: 3000, terminal: app, logger });
 * server.register(myUnit);
 * const started = await server.start();
 * if (!started.ok) process.exit(1);
 * ```
 */
export class SwitchyardServer {
	readonly registry: UnitRegistry;
	readonly orchestrator: Orchestrator;
	readonly metrics = new MetricsRegistry();
	readonly adapter: HttpChainAdapter;
	private readonly logger: Logger;
	private readonly options: SwitchyardServerOptions;
	private httpServer: Server | null = null;
	private resolvedPort = 0;

	constructor(options: SwitchyardServerOptions = {}) {
		this.options = options;
		this.logger = options.logger ?? createSilentLogger();

		const config = new UnitDefaultsConfigProvider(options.config ?? new StaticConfigProvider(), BUILTIN_UNIT_DEFAULTS);
		this.registry = new UnitRegistry({ config, logger: this.logger.child({ component: "registry" }) });
		this.orchestrator = new Orchestrator({
			registry: this.registry,
			config,
			logger: this.logger.child({ component: "orchestrator" }),
			pathCacheLimit: options.pathCacheLimit,
		});

		if (options.builtins ?? true) {
			unwrapOrThrow(registerBuiltinUnits(this.registry, { requestTimeoutMs: options.requestTimeoutMs }));
		}

		this.adapter = new HttpChainAdapter({
			orchestrator: this.orchestrator,
			terminal: options.terminal,
			resolver: options.resolver,
			logger: this.logger.child({ component: "adapter" }),
			metrics: this.metrics,
			diagnostics:
				(options.diagnostics ?? true)
					? createDiagnosticsHandler({ orchestrator: this.orchestrator, metrics: this.metrics })
					: undefined,
		});
	}

	/** Register an application unit. Cached path chains are dropped. */
	register(unit: MiddlewareUnit): Result<void, RegistrationError> {
		const registered = this.registry.register(unit.name, unit);
		if (registered.ok) this.orchestrator.clearCache();
		return registered;
	}

	/**
	 * Validate the configuration, then listen. Nothing listens when
	 * validation fails; a listen error rejects and leaves the server stopped.
	 */
	async start(): Promise<Result<void, ConfigurationError>> {
		const validation = this.orchestrator.validateConfiguration();
		if (!validation.ok) {
			this.logger.error("configuration invalid, not starting", {
				code: validation.error.code,
				error: validation.error,
			});
			return validation;
		}

		const server = createServer(this.adapter.listener());
		this.httpServer = server;

		const listening = new Promise<void>((resolve, reject) => {
			server.once("error", reject);
			server.listen(this.options.port ?? DEFAULT_PORT, this.options.host ?? DEFAULT_HOST, () => {
				server.off("error", reject);
				const addr = server.address();
				if (addr && typeof addr === "object") {
					this.resolvedPort = addr.port;
				}
				resolve();
			});
		});
		try {
			await listening;
		} catch (err) {
			this.httpServer = null;
			throw err;
		}

		this.logger.info("switchyard listening", { port: this.port, units: this.registry.list() });
		return Ok(undefined);
	}

	/** Stop accepting connections and wait for open ones to finish. */
	async stop(): Promise<void> {
		const server = this.httpServer;
		if (!server) return;
		this.httpServer = null;
		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
		this.logger.info("switchyard stopped");
	}

	/** The port the server is listening on (available after start). */
	get port(): number {
		return this.resolvedPort || (this.options.port ?? DEFAULT_PORT);
	}

	get isRunning(): boolean {
		return this.httpServer !== null;
	}
}
