export {
	AlreadyExistsError,
	AlreadyRegisteredError,
	API_ERROR_CODES,
	type ApiErrorCode,
	ChainValidationError,
	ConfigError,
	ConflictingUnitError,
	type DependencyError,
	MissingDependencyError,
	NextCalledTwiceError,
	type RegistrationError,
	SwitchyardError,
	toError,
	UnitNameMismatchError,
} from "./errors";
export { Err, Ok, type Result, unwrapOrThrow } from "./result";
