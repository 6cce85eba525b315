import { defineUnit, type MiddlewareUnit, toError } from "@switchyard/core";

/** Logs method, path, status and duration of every request. */
export function requestLoggingUnit(): MiddlewareUnit {
	return defineUnit({
		name: "request-logging",
		priority: 90,
		async process(ctx, request, next) {
			const start = performance.now();
			try {
				const response = await next();
				ctx.logger.info("request completed", {
					method: request.method,
					path: request.path,
					status: response.status,
					durationMs: Math.round(performance.now() - start),
				});
				return response;
			} catch (err) {
				ctx.logger.warn("request failed", {
					method: request.method,
					path: request.path,
					error: toError(err),
					durationMs: Math.round(performance.now() - start),
				});
				throw err;
			}
		},
	});
}
