/**
 * Branch records
 *
 * `ThenFunc` is a plain record. `FinishOrFunc` wraps its declaration in a
 * class implementing `CallableAsFoF`, which erases the branch-specific
 * argument type behind one calling convention.
 */

import { TxTmplIt } from "../transactions/types.js";
import { errorMessage } from "../utils/errors.js";
import type { Context } from "./context.js";
import {
	ArgumentSchema,
	CallableAsFoF,
	CompilationError,
	ConditionallyCompileIf,
	FinishOrFuncDeclaration,
	Guard,
	ThenFn,
	ThenFunc,
} from "./types.js";

/**
 * Declare a branch with binding templates.
 *
 * @example
 * ```typescript
 * const release = thenFunc<Escrow>({
 *   name: "release",
 *   guards: [arbiterSigns],
 *   func: (self, ctx) => [ctx.template().addOutput(self.amount, self.receiverAddress).build()],
 * });
 * ```
 */
export function thenFunc<TSelf>(declaration: {
	name: string;
	guards?: readonly Guard<TSelf>[];
	conditionalCompileIf?: readonly ConditionallyCompileIf<TSelf>[];
	func: ThenFn<TSelf>;
}): ThenFunc<TSelf> {
	return Object.freeze({
		name: declaration.name,
		guards: Object.freeze([...(declaration.guards ?? [])]),
		conditionalCompileIf: Object.freeze([...(declaration.conditionalCompileIf ?? [])]),
		func: declaration.func,
	});
}

function toCoercionError(branch: string, err: unknown): CompilationError {
	if (err instanceof CompilationError && err.code === "ARGUMENT_COERCION_FAILURE") {
		return err.inBranch(branch);
	}
	return new CompilationError(
		"ARGUMENT_COERCION_FAILURE",
		[errorMessage(err)],
		branch,
		undefined,
		{ cause: err },
	);
}

/**
 * An argument-taking branch.
 */
export class FinishOrFunc<TSelf, TArgs, TSpecific>
	implements CallableAsFoF<TSelf, TArgs>
{
	private readonly declaration: FinishOrFuncDeclaration<TSelf, TArgs, TSpecific>;
	private readonly guards: readonly Guard<TSelf>[];
	private readonly conditionalCompileIf: readonly ConditionallyCompileIf<TSelf>[];

	constructor(declaration: FinishOrFuncDeclaration<TSelf, TArgs, TSpecific>) {
		this.declaration = declaration;
		this.guards = Object.freeze([...declaration.guards]);
		this.conditionalCompileIf = Object.freeze([...declaration.conditionalCompileIf]);
	}

	call(self: TSelf, ctx: Context, args: TArgs): TxTmplIt {
		const { name, coerceArgs, func } = this.declaration;

		return (async function* () {
			let specific: TSpecific;
			try {
				specific = await coerceArgs(args);
			} catch (err) {
				throw toCoercionError(name, err);
			}
			yield* func(self, ctx, specific);
		})();
	}

	/**
	 * Run only the coercion step.
	 */
	async coerce(args: TArgs): Promise<TSpecific> {
		try {
			return await this.declaration.coerceArgs(args);
		} catch (err) {
			throw toCoercionError(this.declaration.name, err);
		}
	}

	getConditionalCompileIf(): readonly ConditionallyCompileIf<TSelf>[] {
		return this.conditionalCompileIf;
	}

	getGuards(): readonly Guard<TSelf>[] {
		return this.guards;
	}

	getName(): string {
		return this.declaration.name;
	}

	getSchema(): ArgumentSchema | undefined {
		return this.declaration.schema;
	}
}

/**
 * Declare an argument-taking branch.
 *
 * @example
 * ```typescript
 * const settle = finishOrFunc<Escrow, EscrowUpdate, SettleArgs>({
 *   name: "settle",
 *   guards: [senderSigns, receiverSigns],
 *   conditionalCompileIf: [compileIf("optional", () => Skippable)],
 *   coerceArgs: coerceWith(SettleArgs),
 *   func: (self, ctx, args) => [...],
 * });
 * ```
 */
export function finishOrFunc<TSelf, TArgs, TSpecific>(declaration: {
	name: string;
	guards?: readonly Guard<TSelf>[];
	conditionalCompileIf?: readonly ConditionallyCompileIf<TSelf>[];
	coerceArgs: FinishOrFuncDeclaration<TSelf, TArgs, TSpecific>["coerceArgs"];
	func: FinishOrFuncDeclaration<TSelf, TArgs, TSpecific>["func"];
	schema?: ArgumentSchema;
}): FinishOrFunc<TSelf, TArgs, TSpecific> {
	return new FinishOrFunc({
		name: declaration.name,
		guards: declaration.guards ?? [],
		conditionalCompileIf: declaration.conditionalCompileIf ?? [],
		coerceArgs: declaration.coerceArgs,
		func: declaration.func,
		schema: declaration.schema,
	});
}
