// ---------------------------------------------------------------------------
// Middleware unit: the execution contract every chain member satisfies
// ---------------------------------------------------------------------------

import type { ChainRequest } from "./http/request";
import type { ChainResponse } from "./http/response";
import { createSilentLogger, type Logger } from "./logger";

/** Priority given to units defined without one. */
export const DEFAULT_UNIT_PRIORITY = 50;

/**
 * Context forwarded untouched to every unit of a chain.
 *
 * Cancellation is advisory: a unit that wants to honour it checks `signal`.
 */
export interface ExecutionContext {
	readonly signal: AbortSignal;
	/** Abort `signal`. Used by units that give up on the downstream. */
	abort(reason?: unknown): void;
	readonly logger: Logger;
	/** Free-form state shared by the units handling one request. */
	readonly state: Map<string, unknown>;
}

/**
 * Continuation handed to a unit. Invokes the next unit, or the terminal
 * handler when none remain. Pass a request to replace it downstream.
 */
export type NextHandler = (request?: ChainRequest) => Promise<ChainResponse>;

/** The handler that runs after the last unit. */
export type TerminalHandler = (
	ctx: ExecutionContext,
	request: ChainRequest,
) => Promise<ChainResponse> | ChainResponse;

/** A named, prioritised request-processing capability. */
export interface MiddlewareUnit {
	/** Unique name; the registry's primary key. */
	readonly name: string;
	/** Lower values execute earlier. */
	readonly priority: number;
	/**
	 * Handle a request. Call `next` at most once to continue, or return a
	 * response without calling it to short-circuit.
	 */
	process(ctx: ExecutionContext, request: ChainRequest, next: NextHandler): Promise<ChainResponse>;
}

/** Input accepted by {@link defineUnit}. */
export interface UnitDefinition {
	name: string;
	priority?: number;
	process: MiddlewareUnit["process"];
}

/**
 * Build a frozen {@link MiddlewareUnit}.
 *
 * @example
 * ```ts
 * const poweredBy = defineUnit({
 *   name: "powered-by",
 *   priority: 15,
 *   async process(_ctx, _req, next) {
 *     const res = await next();
 *     return res.setHeader("X-Powered-By", "switchyard");
 *   },
 * });
 * ```
 */
export function defineUnit(definition: UnitDefinition): MiddlewareUnit {
	return Object.freeze({
		name: definition.name,
		priority: definition.priority ?? DEFAULT_UNIT_PRIORITY,
		process: definition.process,
	});
}

/** Options for {@link createExecutionContext}. */
export interface ExecutionContextOptions {
	signal?: AbortSignal;
	logger?: Logger;
	state?: Map<string, unknown>;
}

/**
 * Build an {@link ExecutionContext}; omitted parts get inert defaults.
 * A supplied `signal` aborts the context's own signal when it fires.
 */
export function createExecutionContext(options: ExecutionContextOptions = {}): ExecutionContext {
	const controller = new AbortController();
	const parent = options.signal;
	if (parent) {
		if (parent.aborted) controller.abort(parent.reason);
		else parent.addEventListener("abort", () => controller.abort(parent.reason), { once: true });
	}
	return {
		signal: controller.signal,
		abort: (reason) => controller.abort(reason),
		logger: options.logger ?? createSilentLogger(),
		state: options.state ?? new Map(),
	};
}
