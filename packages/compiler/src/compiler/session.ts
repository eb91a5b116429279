/**
 * Compilation session
 *
 * Owns the guard memo for the compilations it runs. Reuse a session to
 * compile the same contract instance more than once without re-running its
 * cached guards; never share one between concurrent compilations.
 */

import { nanoid } from "nanoid";

import { Clause } from "../core/types.js";
import type { Context } from "../contracts/context.js";
import { GuardCache } from "../contracts/guard.js";
import { CompilationError, Guard } from "../contracts/types.js";
import { errorMessage } from "../utils/errors.js";

export class CompilationSession {
	readonly id: string;
	private readonly guardCache = new GuardCache();

	constructor(options?: { id?: string }) {
		this.id = options?.id ?? nanoid(16);
	}

	/**
	 * Evaluate one guard, honoring its caching policy.
	 */
	evaluateGuard<TSelf extends object>(
		guard: Guard<TSelf>,
		self: TSelf,
		ctx: Context,
	): Promise<Clause> {
		return this.guardCache.evaluate(guard, self, ctx);
	}

	/**
	 * Evaluate a guard list in declared order.
	 *
	 * @throws CompilationError (GUARD_FAILURE) naming the first failing guard
	 */
	async evaluateGuards<TSelf extends object>(
		guards: readonly Guard<TSelf>[],
		self: TSelf,
		ctx: Context,
	): Promise<Clause[]> {
		const clauses: Clause[] = [];
		for (const guard of guards) {
			try {
				clauses.push(await this.evaluateGuard(guard, self, ctx));
			} catch (err) {
				throw new CompilationError(
					"GUARD_FAILURE",
					[`guard "${guard.name}" failed: ${errorMessage(err)}`],
					undefined,
					{ guard: guard.name },
					{ cause: err },
				);
			}
		}
		return clauses;
	}

	/**
	 * Number of guard function calls made in this session.
	 */
	getGuardInvocationCount(): number {
		return this.guardCache.getInvocationCount();
	}
}
