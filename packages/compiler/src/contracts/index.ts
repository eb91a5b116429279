/**
 * Contracts module - Branch declarations and their building blocks
 *
 * Guards, conditional-compile rules, branch records and the uniform
 * dispatch interface contract types are declared with.
 */

// Types
export type {
	GuardKind,
	GuardFn,
	Guard,
	ConditionalCompileType,
	ConditionalCompileKind,
	ConditionallyCompileIf,
	ThenFn,
	FinishOrFn,
	CoerceArgsFn,
	ArgumentSchema,
	ThenFunc,
	FinishOrFuncDeclaration,
	CallableAsFoF,
	ContractDefinition,
	CompilationErrorCode,
} from "./types.js";

export { CompilationError, ContractError } from "./types.js";

// Context
export { Context, type ContextOptions } from "./context.js";

// Conditional compilation
export {
	NoConstraint,
	Skippable,
	Nullable,
	Required,
	Never,
	NEVER_AND_REQUIRED_INCOMPATIBLE,
	fail,
	isFail,
	mergeConditionalCompileTypes,
	foldConditionalCompileTypes,
	evaluateConditionalCompileIf,
	compileIf,
	describeConditionalCompileType,
} from "./conditional-compile.js";

// Guards
export { cacheGuard, freshGuard, GuardCache } from "./guard.js";

// Branches
export { thenFunc, finishOrFunc, FinishOrFunc } from "./branches.js";

// Coercion
export { coerceWith, coerceField } from "./coercion.js";

// Definitions
export {
	defineContract,
	validateContractDefinition,
	getBranchNames,
} from "./definition.js";
