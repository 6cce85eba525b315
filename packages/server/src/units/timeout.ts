import { API_ERROR_CODES, ChainResponse, defineUnit, type MiddlewareUnit } from "@switchyard/core";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Answers 504 when the rest of the chain takes longer than `timeoutMs`, and
 * aborts the context signal so downstream work can stop.
 */
export function timeoutUnit(timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS): MiddlewareUnit {
	return defineUnit({
		name: "timeout",
		priority: 40,
		async process(ctx, request, next) {
			let timer: ReturnType<typeof setTimeout> | undefined;
			const expired = new Promise<ChainResponse>((resolve) => {
				timer = setTimeout(() => {
					ctx.abort(new Error(`request exceeded ${timeoutMs}ms`));
					ctx.logger.warn("request timed out", { path: request.path, timeoutMs });
					resolve(
						ChainResponse.json({ error: "Request timeout", code: API_ERROR_CODES.TIMEOUT }, 504).setRequestId(
							request.requestId,
						),
					);
				}, timeoutMs);
			});

			try {
				return await Promise.race([next(), expired]);
			} finally {
				clearTimeout(timer);
			}
		},
	});
}
