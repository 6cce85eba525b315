import { API_ERROR_CODES, ChainResponse, defineUnit, type MiddlewareUnit, toError } from "@switchyard/core";

/** Turns an error thrown further down the chain into a 500 response. */
export function recoveryUnit(): MiddlewareUnit {
	return defineUnit({
		name: "recovery",
		priority: 10,
		async process(ctx, request, next) {
			try {
				return await next();
			} catch (err) {
				const error = toError(err);
				ctx.logger.error("request failed", { path: request.path, error });
				return ChainResponse.json({ error: "Internal server error", code: API_ERROR_CODES.INTERNAL_ERROR }, 500)
					.setRequestId(request.requestId)
					.setError(error);
			}
		},
	});
}
