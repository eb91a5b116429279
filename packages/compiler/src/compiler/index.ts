/**
 * Compiler module - Branch resolution for contract instances
 */

// Types
export type {
	CompilerConfig,
	BranchKind,
	CompileOptions,
	BranchVerdict,
	CompiledBranch,
	CompiledContract,
	GuardedTemplate,
} from "./types.js";

export { CompilerConfigError } from "./types.js";

// Configuration
export {
	DEFAULT_COMPILER_CONFIG,
	DEFAULT_MAX_TEMPLATES_PER_BRANCH,
	validateCompilerConfig,
	createCompilerConfig,
	loadCompilerConfigFromEnv,
} from "./config.js";

// Session and driver
export { CompilationSession } from "./session.js";
export { ContractCompiler } from "./compiler.js";

// Results
export {
	toGuardedTemplates,
	findBranch,
	buildContractScripts,
} from "./compiled-contract.js";
