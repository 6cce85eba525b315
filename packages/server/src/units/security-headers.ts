import { defineUnit, type MiddlewareUnit } from "@switchyard/core";

/** Standard security headers applied to every response. */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
	"X-Content-Type-Options": "nosniff",
	"X-Frame-Options": "DENY",
	"Strict-Transport-Security": "max-age=31536000; includeSubDomains",
};

/** Path prefixes whose responses must not be cached. */
const NO_STORE_PREFIXES = ["/api/", "/admin/"];

/**
 * Sets {@link SECURITY_HEADERS} on every response, plus
 * `Cache-Control: no-store` under /api/ and /admin/.
 */
export function securityHeadersUnit(): MiddlewareUnit {
	return defineUnit({
		name: "security-headers",
		priority: 50,
		async process(_ctx, request, next) {
			const response = await next();
			for (const [key, value] of Object.entries(SECURITY_HEADERS)) {
				response.setHeader(key, value);
			}
			if (NO_STORE_PREFIXES.some((prefix) => request.path.startsWith(prefix))) {
				response.setHeader("Cache-Control", "no-store");
			}
			return response;
		},
	});
}
