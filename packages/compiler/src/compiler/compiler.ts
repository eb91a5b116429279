/**
 * ContractCompiler
 *
 * Resolves the declared branches of a contract instance into guarded
 * templates. Resolution is sequential and in declaration order:
 *
 * 1. every branch's conditional-compile rules are folded into a verdict; any
 *    `fail` verdict aborts before a guard or production function runs, with
 *    the reasons of all failing branches;
 * 2. each branch that is not `never` has its guards evaluated, then its
 *    production function consumed;
 * 3. a failure under `skippable` or `nullable` drops the branch, under
 *    `required` or `no-constraint` it aborts the compilation; an empty
 *    branch is pruned unless it is `required`;
 * 4. finish guards are evaluated last, each becoming a template-less path.
 */

import { Logger, LoggerService } from "@nestjs/common";

import { conjunction } from "../core/clause.js";
import { Clause } from "../core/types.js";
import {
	NoConstraint,
	describeConditionalCompileType,
	evaluateConditionalCompileIf,
} from "../contracts/conditional-compile.js";
import { Context, ContextOptions } from "../contracts/context.js";
import { validateContractDefinition } from "../contracts/definition.js";
import {
	CompilationError,
	ConditionalCompileType,
	ContractDefinition,
	Guard,
} from "../contracts/types.js";
import { TransactionTemplate, TxTmplIt } from "../transactions/types.js";
import { errorMessage } from "../utils/errors.js";
import { createCompilerConfig } from "./config.js";
import { CompilationSession } from "./session.js";
import {
	BranchVerdict,
	CompileOptions,
	CompiledBranch,
	CompiledContract,
	CompilerConfig,
	CompilerConfigError,
} from "./types.js";

interface PlannedBranch<TSelf> {
	name: string;
	kind: "then" | "finish-or";
	verdict: ConditionalCompileType;
	guards: readonly Guard<TSelf>[];
	/** Set when the branch is left out without invoking it */
	skipReason?: string;
	produce: (ctx: Context) => TxTmplIt;
}

function toBranchError(branch: string, err: unknown): CompilationError {
	if (err instanceof CompilationError) {
		return err.inBranch(branch);
	}
	return new CompilationError(
		"PRODUCTION_FAILURE",
		[errorMessage(err)],
		branch,
		undefined,
		{ cause: err },
	);
}

function isRecoverable(verdict: ConditionalCompileType): boolean {
	return verdict.type === "skippable" || verdict.type === "nullable";
}

/**
 * @example
 * ```typescript
 * const compiler = new ContractCompiler({ network: "regtest" });
 * const ctx = compiler.createContext(100_000n);
 * const compiled = await compiler.compile(Escrow, escrow, ctx, {
 *   args: { settle: { receiverShare: 60_000 } },
 * });
 * for (const { condition, template } of toGuardedTemplates(compiled)) {
 *   // ...
 * }
 * ```
 */
export class ContractCompiler {
	private readonly config: CompilerConfig;
	private readonly logger: LoggerService;

	constructor(config: Partial<CompilerConfig> = {}) {
		this.config = createCompilerConfig(config);
		this.logger = this.config.logger ?? new Logger(ContractCompiler.name);
	}

	getConfig(): CompilerConfig {
		return this.config;
	}

	/**
	 * Context on the configured network.
	 */
	createContext(
		funds: bigint,
		options: Omit<ContextOptions, "network" | "funds"> = {},
	): Context {
		return new Context({ ...options, network: this.config.network, funds });
	}

	createSession(): CompilationSession {
		return new CompilationSession();
	}

	/**
	 * Fold each branch's rules without resolving anything, e.g. to show which
	 * branches a contract instance would take.
	 */
	evaluateVerdicts<TSelf extends object, TArgs>(
		contract: ContractDefinition<TSelf, TArgs>,
		self: TSelf,
		ctx: Context,
	): BranchVerdict[] {
		return this.planBranches(contract, self, ctx, {}).map(({ name, kind, verdict }) => ({
			name,
			kind,
			verdict,
		}));
	}

	/**
	 * Compile one contract instance.
	 *
	 * @throws CompilationError when any branch's verdict is `fail`, or a
	 *   non-recoverable branch fails or comes out empty while `required`
	 * @throws CompilerConfigError when `ctx` is on another network
	 */
	async compile<TSelf extends object, TArgs>(
		contract: ContractDefinition<TSelf, TArgs>,
		self: TSelf,
		ctx: Context,
		options: CompileOptions<TArgs> = {},
	): Promise<CompiledContract> {
		validateContractDefinition(contract);
		if (ctx.network !== this.config.network) {
			throw new CompilerConfigError(
				`Context network "${ctx.network}" does not match compiler network "${this.config.network}"`,
				"network",
			);
		}

		const session = options.session ?? this.createSession();
		const plans = this.planBranches(contract, self, ctx, options);

		const failed = plans.flatMap((plan) =>
			plan.verdict.type === "fail"
				? [{ branch: plan.name, reasons: plan.verdict.reasons }]
				: [],
		);
		if (failed.length > 0) {
			throw new CompilationError(
				"INCLUSION_CONFLICT",
				failed.flatMap((f) => f.reasons),
				failed.length === 1 ? failed[0].branch : undefined,
				{ contract: contract.name, branches: failed },
			);
		}

		const branches: CompiledBranch[] = [];
		for (const plan of plans) {
			const branch = await this.resolveBranch(plan, self, ctx, session);
			if (branch) {
				branches.push(branch);
			}
		}

		for (const guard of contract.finishGuards) {
			branches.push(await this.resolveFinishGuard(guard, self, ctx, session));
		}

		const templateCount = branches.reduce((n, b) => n + b.templates.length, 0);
		this.logger.log(
			`Compiled "${contract.name}" (session ${session.id}): ${branches.length} branches, ${templateCount} templates`,
		);

		return {
			name: contract.name,
			sessionId: session.id,
			network: ctx.network,
			path: [...ctx.path],
			funds: ctx.funds,
			branches,
		};
	}

	private planBranches<TSelf extends object, TArgs>(
		contract: ContractDefinition<TSelf, TArgs>,
		self: TSelf,
		ctx: Context,
		options: CompileOptions<TArgs>,
	): PlannedBranch<TSelf>[] {
		const plans = contract.thenFuncs.map((f): PlannedBranch<TSelf> => ({
			name: f.name,
			kind: "then",
			verdict: evaluateConditionalCompileIf(f.conditionalCompileIf, self, ctx),
			guards: f.guards,
			produce: (branchCtx: Context) => f.func(self, branchCtx),
		}));

		for (const f of contract.finishOrFuncs) {
			const verdict = evaluateConditionalCompileIf(f.getConditionalCompileIf(), self, ctx);
			const name = f.getName();
			const plan: PlannedBranch<TSelf> = {
				name,
				kind: "finish-or",
				verdict,
				guards: f.getGuards(),
				produce: (branchCtx: Context) => {
					if (options.args !== undefined) {
						return f.call(self, branchCtx, options.args);
					}
					if (contract.defaultArgs) {
						return f.call(self, branchCtx, contract.defaultArgs());
					}
					throw new CompilationError(
						"ARGUMENT_COERCION_FAILURE",
						["no stateful arguments supplied"],
						name,
					);
				},
			};
			if (options.args === undefined && verdict.type === "skippable") {
				plan.skipReason = "no stateful arguments supplied";
			}
			plans.push(plan);
		}

		return plans;
	}

	private async resolveBranch<TSelf extends object>(
		plan: PlannedBranch<TSelf>,
		self: TSelf,
		ctx: Context,
		session: CompilationSession,
	): Promise<CompiledBranch | undefined> {
		const { name, kind, verdict } = plan;
		const verdictText = describeConditionalCompileType(verdict);

		if (verdict.type === "never") {
			this.logger.debug?.(`Branch "${name}" excluded (never)`);
			return undefined;
		}
		if (plan.skipReason) {
			this.logger.debug?.(`Branch "${name}" skipped: ${plan.skipReason}`);
			return undefined;
		}

		const branchCtx = ctx.derive(name);
		let guards: Clause[];
		let templates: TransactionTemplate[];
		try {
			guards = await session.evaluateGuards(plan.guards, self, branchCtx);
			templates = await this.collectTemplates(plan.produce(branchCtx));
		} catch (err) {
			const error = toBranchError(name, err);
			if (isRecoverable(verdict)) {
				this.logger.warn(`Dropping ${verdictText} branch "${name}": ${error.message}`);
				return undefined;
			}
			throw error;
		}

		if (templates.length === 0) {
			if (verdict.type === "required") {
				throw new CompilationError(
					"EMPTY_REQUIRED_BRANCH",
					[`branch "${name}" produced no templates`],
					name,
				);
			}
			this.logger.debug?.(`Branch "${name}" (${verdictText}) pruned: no templates`);
			return undefined;
		}

		this.logger.debug?.(
			`Branch "${name}" (${verdictText}) included with ${templates.length} templates`,
		);
		return {
			name,
			kind,
			verdict,
			guards,
			condition: conjunction(guards),
			templates,
		};
	}

	private async resolveFinishGuard<TSelf extends object>(
		guard: Guard<TSelf>,
		self: TSelf,
		ctx: Context,
		session: CompilationSession,
	): Promise<CompiledBranch> {
		let guards: Clause[];
		try {
			guards = await session.evaluateGuards([guard], self, ctx.derive(guard.name));
		} catch (err) {
			throw toBranchError(guard.name, err);
		}
		return {
			name: guard.name,
			kind: "finish",
			verdict: NoConstraint,
			guards,
			condition: conjunction(guards),
			templates: [],
		};
	}

	/**
	 * Drain a template sequence, failing once it exceeds the configured bound.
	 */
	private async collectTemplates(it: TxTmplIt): Promise<TransactionTemplate[]> {
		const max = this.config.maxTemplatesPerBranch;
		const templates: TransactionTemplate[] = [];
		for await (const template of it) {
			if (templates.length === max) {
				throw new CompilationError("PRODUCTION_FAILURE", [
					`more than ${max} templates produced`,
				]);
			}
			templates.push(template);
		}
		return templates;
	}
}
