import { defineUnit, type MiddlewareUnit } from "@switchyard/core";

/** Request-scoped key under which the id is stored for later units. */
export const REQUEST_ID_KEY = "requestId";

/** Echoes the request id, generating one when the request has none. */
export function requestIdUnit(generate: () => string = () => crypto.randomUUID()): MiddlewareUnit {
	return defineUnit({
		name: "request-id",
		priority: 30,
		async process(_ctx, request, next) {
			const id = request.requestId || generate();
			request.set(REQUEST_ID_KEY, id);
			const response = await next();
			return response.setRequestId(id);
		},
	});
}
