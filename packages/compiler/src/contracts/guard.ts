/**
 * Guards and the per-session guard memo.
 */

import { Clause } from "../core/types.js";
import type { Context } from "./context.js";
import { Guard, GuardFn } from "./types.js";

/**
 * Declare a guard computed at most once per contract instance per session.
 * Use for guards that contact a remote service or must be stable across calls.
 */
export function cacheGuard<TSelf>(name: string, evaluate: GuardFn<TSelf>): Guard<TSelf> {
	return Object.freeze({ kind: "cache", name, evaluate });
}

/**
 * Declare a guard evaluated every time it is consulted.
 */
export function freshGuard<TSelf>(name: string, evaluate: GuardFn<TSelf>): Guard<TSelf> {
	return Object.freeze({ kind: "fresh", name, evaluate });
}

/**
 * Memo table for `cache` guards, keyed by (contract instance, guard).
 *
 * Owned by exactly one compilation session and discarded with it. The
 * promise is stored, not the clause, so a second lookup issued while the
 * first is still pending does not call the guard again; a rejection is
 * memoized the same way.
 */
export class GuardCache {
	private readonly entries = new WeakMap<object, Map<Guard<never>, Promise<Clause>>>();
	private invocations = 0;

	/**
	 * Evaluate a guard, consulting the memo for `cache` guards.
	 */
	evaluate<TSelf extends object>(guard: Guard<TSelf>, self: TSelf, ctx: Context): Promise<Clause> {
		if (guard.kind === "fresh") {
			return this.invoke(guard, self, ctx);
		}

		let perInstance = this.entries.get(self);
		if (!perInstance) {
			perInstance = new Map();
			this.entries.set(self, perInstance);
		}

		const cached = perInstance.get(guard);
		if (cached) {
			return cached;
		}

		const pending = this.invoke(guard, self, ctx);
		perInstance.set(guard, pending);
		return pending;
	}

	/**
	 * Whether a `cache` guard already has an entry for this instance.
	 */
	has<TSelf extends object>(guard: Guard<TSelf>, self: TSelf): boolean {
		return this.entries.get(self)?.has(guard) ?? false;
	}

	/**
	 * Number of times a guard function was actually called through this cache.
	 */
	getInvocationCount(): number {
		return this.invocations;
	}

	private async invoke<TSelf>(guard: Guard<TSelf>, self: TSelf, ctx: Context): Promise<Clause> {
		this.invocations += 1;
		return guard.evaluate(self, ctx);
	}
}
