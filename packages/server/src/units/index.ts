import { Ok, type RegistrationError, type Result } from "@switchyard/core";
import type { UnitConfig, UnitRegistry } from "@switchyard/orchestrator";
import { recoveryUnit } from "./recovery";
import { requestIdUnit } from "./request-id";
import { requestLoggingUnit } from "./request-logging";
import { securityHeadersUnit } from "./security-headers";
import { timeoutUnit } from "./timeout";

export { recoveryUnit } from "./recovery";
export { REQUEST_ID_KEY, requestIdUnit } from "./request-id";
export { requestLoggingUnit } from "./request-logging";
export { SECURITY_HEADERS, securityHeadersUnit } from "./security-headers";
export { DEFAULT_REQUEST_TIMEOUT_MS, timeoutUnit } from "./timeout";

/** Category and priority of each built-in unit, layered under user config. */
export const BUILTIN_UNIT_DEFAULTS: Readonly<Record<string, UnitConfig>> = {
	recovery: { category: "basic", priority: 10 },
	"request-id": { category: "basic", priority: 30 },
	timeout: { category: "basic", priority: 40 },
	"security-headers": { category: "security", priority: 50 },
	"request-logging": { category: "logging", priority: 90 },
};

export interface BuiltinUnitOptions {
	requestTimeoutMs?: number;
	generateRequestId?: () => string;
}

/** Register every built-in unit. Stops at the first name already taken. */
export function registerBuiltinUnits(
	registry: UnitRegistry,
	options: BuiltinUnitOptions = {},
): Result<void, RegistrationError> {
	const units = [
		recoveryUnit(),
		requestIdUnit(options.generateRequestId),
		timeoutUnit(options.requestTimeoutMs),
		securityHeadersUnit(),
		requestLoggingUnit(),
	];
	for (const unit of units) {
		const registered = registry.register(unit.name, unit);
		if (!registered.ok) return registered;
	}
	return Ok(undefined);
}
