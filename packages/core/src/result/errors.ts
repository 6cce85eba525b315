import type { ChainType } from "../types";

/** Base error class for all switchyard errors */
export class SwitchyardError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** A unit name was registered twice */
export class AlreadyRegisteredError extends SwitchyardError {
	constructor(readonly unit: string) {
		super(`middleware "${unit}" already registered`, "ALREADY_REGISTERED");
	}
}

/** The registration key differs from the unit's own name */
export class UnitNameMismatchError extends SwitchyardError {
	constructor(
		readonly key: string,
		readonly unit: string,
	) {
		super(`cannot register middleware "${unit}" under the name "${key}"`, "NAME_MISMATCH");
	}
}

/** Errors a unit registry can return from `register` */
export type RegistrationError = AlreadyRegisteredError | UnitNameMismatchError;

/** A unit declares a dependency that is absent from the checked scope */
export class MissingDependencyError extends SwitchyardError {
	constructor(
		readonly unit: string,
		readonly dependency: string,
	) {
		super(`middleware "${unit}" requires missing dependency "${dependency}"`, "MISSING_DEPENDENCY");
	}
}

/** A unit declares a conflict with another unit present in the checked scope */
export class ConflictingUnitError extends SwitchyardError {
	constructor(
		readonly unit: string,
		readonly conflictsWith: string,
	) {
		super(`middleware "${unit}" conflicts with "${conflictsWith}"`, "CONFLICTING_UNIT");
	}
}

/** Errors raised while checking a unit set's dependency graph */
export type DependencyError = MissingDependencyError | ConflictingUnitError;

/** A chain could not be built; wraps the dependency or conflict violation */
export class ChainValidationError extends SwitchyardError {
	override readonly cause: DependencyError;

	constructor(
		readonly chainType: ChainType,
		cause: DependencyError,
		readonly path?: string,
	) {
		const scope = path === undefined ? chainType : `${chainType} (path ${path})`;
		super(`chain validation failed for ${scope}: ${cause.message}`, "CHAIN_VALIDATION_FAILED", cause);
		this.cause = cause;
	}
}

/** A named chain was registered twice */
export class AlreadyExistsError extends SwitchyardError {
	constructor(readonly chain: string) {
		super(`chain with name "${chain}" already exists`, "ALREADY_EXISTS");
	}
}

/** Configuration file or object failed validation */
export class ConfigError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_INVALID", cause);
	}
}

/** A unit invoked its continuation more than once */
export class NextCalledTwiceError extends SwitchyardError {
	constructor(readonly unit: string) {
		super(`middleware "${unit}" called next() multiple times`, "NEXT_CALLED_TWICE");
	}
}

/** Structured error codes for HTTP error bodies. */
export const API_ERROR_CODES = {
	CHAIN_VALIDATION_FAILED: "CHAIN_VALIDATION_FAILED",
	NOT_FOUND: "NOT_FOUND",
	TIMEOUT: "TIMEOUT",
	INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

/** A single error code value from {@link API_ERROR_CODES}. */
export type ApiErrorCode = (typeof API_ERROR_CODES)[keyof typeof API_ERROR_CODES];

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
