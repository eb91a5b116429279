/**
 * Contract layer types
 *
 * Types for declaring the branches of a contract type: guards,
 * conditional-compile rules, branch records and the uniform dispatch
 * interface that lets branches with different argument types share one list.
 */

import { Clause } from "../core/types.js";
import { TxTmplIt } from "../transactions/types.js";
import type { Context } from "./context.js";

/**
 * Guard caching policy.
 *
 * - cache: evaluated at most once per contract instance per compilation
 *   session, the stored clause is returned afterwards
 * - fresh: evaluated every time it is consulted
 */
export type GuardKind = "cache" | "fresh";

/**
 * Function producing an unlocking clause for a contract instance. It must not
 * mutate the instance; it may perform I/O (e.g. ask an oracle for a key).
 */
export type GuardFn<TSelf> = (self: TSelf, ctx: Context) => Clause | Promise<Clause>;

/**
 * A guard: a clause-producing function with a caching policy.
 *
 * The guard object itself is the memo key, so declare each guard once per
 * contract type and reuse the same object.
 */
export interface Guard<TSelf> {
	readonly kind: GuardKind;
	readonly name: string;
	readonly evaluate: GuardFn<TSelf>;
}

/**
 * Inclusion verdict for a branch.
 *
 * Precedence: fail > never / required (mutually exclusive) > skippable >
 * nullable > no-constraint.
 */
export type ConditionalCompileType =
	| { readonly type: "no-constraint" }
	| { readonly type: "skippable" }
	| { readonly type: "nullable" }
	| { readonly type: "required" }
	| { readonly type: "never" }
	| { readonly type: "fail"; readonly reasons: readonly string[] };

export type ConditionalCompileKind = ConditionalCompileType["type"];

/**
 * Rule producing an inclusion verdict for a branch. Kept separate from the
 * production function so tooling can decide inclusion without running it.
 */
export interface ConditionallyCompileIf<TSelf> {
	readonly kind: "fresh";
	readonly name: string;
	readonly evaluate: (self: TSelf, ctx: Context) => ConditionalCompileType;
}

/**
 * Production function of a branch without arguments.
 */
export type ThenFn<TSelf> = (self: TSelf, ctx: Context) => TxTmplIt;

/**
 * Production function of a branch taking branch-specific arguments.
 */
export type FinishOrFn<TSelf, TSpecific> = (
	self: TSelf,
	ctx: Context,
	args: TSpecific,
) => TxTmplIt;

/**
 * Converts the contract-wide stateful arguments into one branch's argument
 * type. Throws (or rejects) when the arguments do not fit.
 */
export type CoerceArgsFn<TArgs, TSpecific> = (
	args: TArgs,
) => TSpecific | Promise<TSpecific>;

/**
 * Structural description of a branch's argument type, for callers deciding
 * what to send. Descriptive only; the compiler never enforces it.
 */
export interface ArgumentSchema {
	title?: string;
	description?: string;
	type?: string;
	properties?: Record<string, ArgumentSchema>;
	required?: string[];
	items?: ArgumentSchema;
	enum?: unknown[];
	[keyword: string]: unknown;
}

/**
 * A branch whose templates are binding: every template it yields is spendable
 * only when the AND of its guards holds.
 */
export interface ThenFunc<TSelf> {
	readonly name: string;
	readonly guards: readonly Guard<TSelf>[];
	readonly conditionalCompileIf: readonly ConditionallyCompileIf<TSelf>[];
	readonly func: ThenFn<TSelf>;
}

/**
 * A branch that by default finishes (its guards unlock the coins) and may
 * suggest templates built from caller-supplied arguments.
 */
export interface FinishOrFuncDeclaration<TSelf, TArgs, TSpecific> {
	readonly name: string;
	readonly guards: readonly Guard<TSelf>[];
	readonly conditionalCompileIf: readonly ConditionallyCompileIf<TSelf>[];
	readonly coerceArgs: CoerceArgsFn<TArgs, TSpecific>;
	readonly func: FinishOrFn<TSelf, TSpecific>;
	readonly schema?: ArgumentSchema;
}

/**
 * Uniform calling convention for argument-taking branches.
 *
 * Hides the branch-specific argument type so that one contract can hold
 * branches with different argument types in a single list.
 */
export interface CallableAsFoF<TSelf, TArgs> {
	/**
	 * Coerce `args` into the branch's argument type, then produce. A coercion
	 * failure surfaces when the returned sequence is iterated.
	 */
	call(self: TSelf, ctx: Context, args: TArgs): TxTmplIt;
	getConditionalCompileIf(): readonly ConditionallyCompileIf<TSelf>[];
	getGuards(): readonly Guard<TSelf>[];
	getName(): string;
	getSchema(): ArgumentSchema | undefined;
}

/**
 * Declaration of a contract type: every branch it may take.
 */
export interface ContractDefinition<TSelf extends object, TArgs = unknown> {
	/** Contract type name */
	name: string;
	/** Branches with binding templates, in resolution order */
	thenFuncs: readonly ThenFunc<TSelf>[];
	/** Argument-taking branches, resolved after `thenFuncs` */
	finishOrFuncs: readonly CallableAsFoF<TSelf, TArgs>[];
	/** Spending paths without templates, one per guard */
	finishGuards: readonly Guard<TSelf>[];
	/** Stateful arguments used when the caller supplies none */
	defaultArgs?: () => TArgs;
}

/**
 * Error codes for compilation failures.
 */
export type CompilationErrorCode =
	| "ARGUMENT_COERCION_FAILURE"
	| "PRODUCTION_FAILURE"
	| "INCLUSION_CONFLICT"
	| "EMPTY_REQUIRED_BRANCH"
	| "GUARD_FAILURE"
	| "INSUFFICIENT_FUNDS";

const CODE_PREFIXES: Record<CompilationErrorCode, string> = {
	ARGUMENT_COERCION_FAILURE: "Argument coercion failed",
	PRODUCTION_FAILURE: "Template production failed",
	INCLUSION_CONFLICT: "Conditional compilation failed",
	EMPTY_REQUIRED_BRANCH: "Required branch produced no templates",
	GUARD_FAILURE: "Guard evaluation failed",
	INSUFFICIENT_FUNDS: "Insufficient funds",
};

/**
 * Error thrown when a contract instance cannot be compiled.
 *
 * `reasons` is ordered: for an inclusion conflict it follows branch
 * declaration order and, within a branch, rule order.
 */
export class CompilationError extends Error {
	readonly reasons: readonly string[];

	constructor(
		public readonly code: CompilationErrorCode,
		reasons: readonly string[],
		public readonly branch?: string,
		public readonly details?: unknown,
		options?: { cause?: unknown },
	) {
		const scope = branch ? ` in branch "${branch}"` : "";
		super(`${CODE_PREFIXES[code]}${scope}: ${reasons.join("; ")}`, options);
		this.name = "CompilationError";
		this.reasons = [...reasons];
	}

	/**
	 * Same error, attributed to a branch.
	 */
	inBranch(branch: string): CompilationError {
		if (this.branch === branch) {
			return this;
		}
		return new CompilationError(this.code, this.reasons, branch, this.details, {
			cause: this.cause,
		});
	}
}

/**
 * Error thrown when a contract definition is malformed.
 */
export class ContractError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ContractError";
	}
}
