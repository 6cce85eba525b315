import type { SwitchyardError } from "./errors";

/** Either a success value or a failure, discriminated on `ok`. */
export type Result<T, E = SwitchyardError> = { ok: true; value: T } | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** The success value, or the error thrown. For failures that are programming errors. */
export function unwrapOrThrow<T, E>(result: Result<T, E>): T {
	if (!result.ok) throw result.error;
	return result.value;
}
