/**
 * covenant-kit compiler
 *
 * Declares contract types as sets of guarded branches and compiles contract
 * instances into templates paired with the clauses that unlock them.
 *
 * @example
 * ```typescript
 * import {
 *   ContractCompiler,
 *   EscrowContract,
 *   toGuardedTemplates,
 * } from "@covenant-kit/compiler";
 *
 * const escrow = new EscrowContract({
 *   sender: { pubkey: senderKey, address: senderAddress },
 *   receiver: { pubkey: receiverKey, address: receiverAddress },
 *   amount: 100_000n,
 *   unilateralDelay: 144,
 * });
 *
 * const compiler = new ContractCompiler({ network: "regtest" });
 * const compiled = await escrow.compile(compiler, compiler.createContext(100_000n));
 * for (const { branch, condition, template } of toGuardedTemplates(compiled)) {
 *   // ...
 * }
 * ```
 */

import "reflect-metadata";

// Core - Policy clauses and leaf scripts
export {
	// Types
	type XOnlyPubKey,
	type NetworkType,
	type HashType,
	type Clause,
	type ClauseType,
	type ClauseSpendingPath,
	// Classes
	ScriptBuilder,
	ScriptConfigError,
	// Constants
	NETWORK_TYPES,
	MAX_RELATIVE_BLOCKS,
	LOCKTIME_THRESHOLD,
	MAX_LEAVES_PER_CLAUSE,
	// Utilities
	isValidXOnlyPubKey,
	validateClause,
	trivial,
	unsatisfiable,
	key,
	older,
	after,
	hashLock,
	sha256,
	hash160,
	and,
	or,
	threshold,
	conjunction,
	describeClause,
	compileLeafScripts,
} from "./core/index.js";

// Contracts - Branch declarations
export {
	// Types
	type GuardKind,
	type GuardFn,
	type Guard,
	type ConditionalCompileType,
	type ConditionalCompileKind,
	type ConditionallyCompileIf,
	type ThenFn,
	type FinishOrFn,
	type CoerceArgsFn,
	type ArgumentSchema,
	type ThenFunc,
	type FinishOrFuncDeclaration,
	type CallableAsFoF,
	type ContractDefinition,
	type CompilationErrorCode,
	type ContextOptions,
	// Classes
	CompilationError,
	ContractError,
	Context,
	GuardCache,
	FinishOrFunc,
	// Verdicts
	NoConstraint,
	Skippable,
	Nullable,
	Required,
	Never,
	NEVER_AND_REQUIRED_INCOMPATIBLE,
	// Utilities
	fail,
	isFail,
	mergeConditionalCompileTypes,
	foldConditionalCompileTypes,
	evaluateConditionalCompileIf,
	compileIf,
	describeConditionalCompileType,
	cacheGuard,
	freshGuard,
	thenFunc,
	finishOrFunc,
	coerceWith,
	coerceField,
	defineContract,
	validateContractDefinition,
	getBranchNames,
} from "./contracts/index.js";

// Compiler - Branch resolution
export {
	// Types
	type CompilerConfig,
	type BranchKind,
	type CompileOptions,
	type BranchVerdict,
	type CompiledBranch,
	type CompiledContract,
	type GuardedTemplate,
	// Classes
	ContractCompiler,
	CompilationSession,
	CompilerConfigError,
	// Configuration
	DEFAULT_COMPILER_CONFIG,
	DEFAULT_MAX_TEMPLATES_PER_BRANCH,
	validateCompilerConfig,
	createCompilerConfig,
	loadCompilerConfigFromEnv,
	// Utilities
	toGuardedTemplates,
	findBranch,
	buildContractScripts,
} from "./compiler/index.js";

// Transactions - Templates
export {
	// Types
	type TxOutput,
	type TransactionTemplate,
	type TxTmplIt,
	// Classes
	TemplateBuilder,
	// Constants
	SEQUENCE_FINAL,
	DEFAULT_TX_VERSION,
	// Utilities
	totalOutputAmount,
} from "./transactions/index.js";

// Utils
export { errorMessage } from "./utils/errors.js";

// Modules - Contract types built on the engine
// Escrow module
export {
	type EscrowParty,
	type EscrowConfig,
	type EscrowUpdate,
	SettleArgs,
	senderSigns,
	receiverSigns,
	arbiterSigns,
	unilateralDelayElapsed,
	cooperativeClose,
	requiresArbiter,
	requiresFunding,
	EscrowContract,
	ESCROW_CONTRACT,
	validateEscrowConfig,
} from "./modules/escrow/index.js";
