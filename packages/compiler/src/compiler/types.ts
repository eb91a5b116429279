/**
 * Compiler layer types
 */

import type { LoggerService } from "@nestjs/common";

import { Clause, NetworkType } from "../core/types.js";
import { ConditionalCompileType } from "../contracts/types.js";
import { TransactionTemplate } from "../transactions/types.js";
import type { CompilationSession } from "./session.js";

/**
 * Compiler configuration.
 */
export interface CompilerConfig {
	/** Network contexts must be created for */
	network: NetworkType;
	/** Templates consumed per branch before it is treated as failing */
	maxTemplatesPerBranch: number;
	/** Logger to use instead of the default `Logger` */
	logger?: LoggerService;
}

/**
 * Where a compiled branch came from.
 */
export type BranchKind = "then" | "finish-or" | "finish";

/**
 * Options for one `compile` call.
 */
export interface CompileOptions<TArgs> {
	/** Stateful arguments passed to every finish-or-func */
	args?: TArgs;
	/** Share guard memoization with earlier compilations */
	session?: CompilationSession;
}

/**
 * Verdict computed for one branch before resolution.
 */
export interface BranchVerdict {
	name: string;
	kind: Exclude<BranchKind, "finish">;
	verdict: ConditionalCompileType;
}

/**
 * An included branch and what it contributes.
 */
export interface CompiledBranch {
	name: string;
	kind: BranchKind;
	verdict: ConditionalCompileType;
	/** Guard clauses in declaration order */
	guards: Clause[];
	/** Conjunction of `guards` */
	condition: Clause;
	templates: TransactionTemplate[];
}

/**
 * Result of compiling one contract instance.
 */
export interface CompiledContract {
	name: string;
	sessionId: string;
	network: NetworkType;
	path: string[];
	funds: bigint;
	/** Included branches, in declaration order */
	branches: CompiledBranch[];
}

/**
 * A template paired with the condition that unlocks it.
 */
export interface GuardedTemplate {
	branch: string;
	condition: Clause;
	template: TransactionTemplate;
}

/**
 * Invalid compiler configuration.
 */
export class CompilerConfigError extends Error {
	constructor(
		message: string,
		public readonly field?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "CompilerConfigError";
	}
}
