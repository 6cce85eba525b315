// ---------------------------------------------------------------------------
// HTTP binding: node:http requests in, chain responses out
// ---------------------------------------------------------------------------

import type { IncomingHttpHeaders } from "node:http";
import {
	API_ERROR_CODES,
	type ChainRequest,
	ChainResponse,
	type ChainType,
	createExecutionContext,
	createRequest,
	createSilentLogger,
	type Logger,
	type TerminalHandler,
	toError,
} from "@switchyard/core";
import { type Chain, notFoundTerminal, type Orchestrator } from "@switchyard/orchestrator";
import { ChainTypeResolver } from "./chain-resolver";
import type { DiagnosticsHandler } from "./diagnostics";
import type { MetricsRegistry } from "./metrics";

// ---------------------------------------------------------------------------
// Transport shapes
// ---------------------------------------------------------------------------

/** The parts of an incoming Node request the adapter reads. */
export interface IncomingRequest extends AsyncIterable<Uint8Array | string> {
	readonly method?: string;
	readonly url?: string;
	readonly headers: IncomingHttpHeaders;
	readonly socket: { readonly remoteAddress?: string };
}

/** The parts of a Node response the adapter writes. */
export interface OutgoingResponse {
	statusCode: number;
	readonly headersSent: boolean;
	setHeader(name: string, value: string | string[]): unknown;
	end(chunk: Uint8Array): unknown;
}

/** A request listener; `node:http` accepts it as-is. */
export type RequestListener = (req: IncomingRequest, res: OutgoingResponse) => void;

export interface HttpChainAdapterOptions {
	orchestrator: Orchestrator;
	/** Runs after the last unit (default: 404). */
	terminal?: TerminalHandler;
	resolver?: ChainTypeResolver;
	logger?: Logger;
	metrics?: MetricsRegistry;
	/** Checked before chain dispatch; a response short-circuits it. */
	diagnostics?: DiagnosticsHandler;
	/** Id assigned to requests that arrive without `X-Request-ID`. */
	generateRequestId?: () => string;
}

// ---------------------------------------------------------------------------
// HttpChainAdapter
// ---------------------------------------------------------------------------

/**
 * Binds orchestrator-built chains to `node:http`.
 *
 * @example
 * ```ts
 * const adapter = new HttpChainAdapter({ orchestrator, terminal: app, logger });
 * createServer(adapter.listener()).listen(3000);
 * ```
 */
export class HttpChainAdapter {
	private readonly orchestrator: Orchestrator;
	private readonly terminal: TerminalHandler;
	private readonly resolver: ChainTypeResolver;
	private readonly logger: Logger;
	private readonly metrics?: MetricsRegistry;
	private readonly diagnostics?: DiagnosticsHandler;
	private readonly generateRequestId: () => string;

	constructor(options: HttpChainAdapterOptions) {
		this.orchestrator = options.orchestrator;
		this.terminal = options.terminal ?? notFoundTerminal;
		this.resolver = options.resolver ?? new ChainTypeResolver();
		this.logger = options.logger ?? createSilentLogger();
		this.metrics = options.metrics;
		this.diagnostics = options.diagnostics;
		this.generateRequestId = options.generateRequestId ?? (() => crypto.randomUUID());
	}

	/** Convert a Node request, reading its whole body. */
	async toChainRequest(req: IncomingRequest): Promise<ChainRequest> {
		const headers = toHeaders(req.headers);
		if (!headers.has("x-request-id")) headers.set("X-Request-ID", this.generateRequestId());
		const socket = req.socket;

		return createRequest({
			method: req.method ?? "GET",
			url: new URL(req.url ?? "/", `http://${headers.get("host") ?? "localhost"}`),
			headers,
			body: await readBody(req),
			remoteAddress: socket.remoteAddress ?? "",
			secure: "encrypted" in socket && socket.encrypted === true,
		});
	}

	/** Write status, headers, each cookie and the body. */
	writeResponse(res: OutgoingResponse, response: ChainResponse): void {
		if (res.headersSent) {
			this.logger.warn("response already sent", { status: response.status });
			return;
		}
		res.statusCode = response.status;
		response.headers.forEach((value, name) => {
			if (name !== "set-cookie") res.setHeader(name, value);
		});
		const cookies = response.cookies();
		if (cookies.length > 0) res.setHeader("Set-Cookie", cookies);
		res.end(response.body);
	}

	/** Resolve the chain type, run its path chain and write the result. */
	async dispatch(req: IncomingRequest, res: OutgoingResponse): Promise<void> {
		const start = performance.now();
		const request = await this.toChainRequest(req);

		const diagnostic = this.diagnostics?.(request);
		if (diagnostic) {
			this.writeResponse(res, diagnostic);
			return;
		}

		const chainType = this.resolver.resolve(request.path);
		const response = await this.run(chainType, request);
		this.writeResponse(res, response);
		this.record(chainType, response.status, start);
	}

	/** A listener that dispatches every request. */
	listener(): RequestListener {
		return (req, res) => {
			this.dispatch(req, res).catch((err: unknown) => this.fail(res, err));
		};
	}

	/** A listener that runs one fixed chain, bypassing type resolution. */
	bindChain(chain: Chain, terminal: TerminalHandler = this.terminal): RequestListener {
		return (req, res) => {
			const handle = async () => {
				const request = await this.toChainRequest(req);
				const response = await this.processChain(chain, request, terminal, {});
				this.writeResponse(res, response);
			};
			handle().catch((err: unknown) => this.fail(res, err));
		};
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async run(chainType: ChainType, request: ChainRequest): Promise<ChainResponse> {
		const built = this.orchestrator.getChainForPath(chainType, request.path);
		if (!built.ok) {
			this.logger.error("chain build failed", {
				chainType,
				path: request.path,
				requestId: request.requestId,
				error: built.error,
			});
			return ChainResponse.fromError(500, built.error, API_ERROR_CODES.CHAIN_VALIDATION_FAILED).setRequestId(
				request.requestId,
			);
		}
		return this.processChain(built.value, request, this.terminal, { chainType });
	}

	private async processChain(
		chain: Chain,
		request: ChainRequest,
		terminal: TerminalHandler,
		bindings: Record<string, unknown>,
	): Promise<ChainResponse> {
		const logger = this.logger.child({ requestId: request.requestId, ...bindings });
		const ctx = createExecutionContext({ logger });
		try {
			return await chain.process(ctx, request, terminal);
		} catch (err) {
			const error = toError(err);
			logger.error("unhandled middleware error", { path: request.path, error });
			return ChainResponse.json({ error: "Internal server error", code: API_ERROR_CODES.INTERNAL_ERROR }, 500)
				.setRequestId(request.requestId)
				.setError(error);
		}
	}

	private record(chainType: ChainType, status: number, start: number): void {
		if (!this.metrics) return;
		this.metrics.requestsTotal.inc({ chain: chainType, status: String(status) });
		this.metrics.requestDuration.observe({ chain: chainType }, performance.now() - start);
		this.metrics.chainCacheSize.set({}, this.orchestrator.getCacheStats().cacheSize);
	}

	/** Last resort when reading the request or writing the response fails. */
	private fail(res: OutgoingResponse, err: unknown): void {
		this.logger.error("request dispatch failed", { error: toError(err) });
		this.writeResponse(
			res,
			ChainResponse.json({ error: "Internal server error", code: API_ERROR_CODES.INTERNAL_ERROR }, 500),
		);
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toHeaders(incoming: IncomingHttpHeaders): Headers {
	const headers = new Headers();
	for (const [name, value] of Object.entries(incoming)) {
		if (value === undefined) continue;
		if (Array.isArray(value)) {
			for (const item of value) headers.append(name, item);
		} else {
			headers.set(name, value);
		}
	}
	return headers;
}

/** Read the full request body. */
async function readBody(req: AsyncIterable<Uint8Array | string>): Promise<Uint8Array> {
	const chunks: Buffer[] = [];
	for await (const chunk of req) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk));
	}
	return Buffer.concat(chunks);
}
