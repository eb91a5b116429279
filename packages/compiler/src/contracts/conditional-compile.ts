/**
 * Conditional compilation verdicts and their merge operator.
 *
 * Precedence:
 *     fail > non-fail                   ==> fail (reasons concatenated when both fail)
 *     forall x. x > no-constraint       ==> x
 *     required > {skippable, nullable}  ==> required
 *     never > {skippable, nullable}     ==> never
 *     never >< required                 ==> fail
 *     skippable > nullable              ==> skippable
 */

import { errorMessage } from "../utils/errors.js";
import type { Context } from "./context.js";
import {
	ConditionalCompileType,
	ConditionallyCompileIf,
} from "./types.js";

export const NoConstraint: ConditionalCompileType = Object.freeze({
	type: "no-constraint",
});

/** May proceed without calling the branch at all */
export const Skippable: ConditionalCompileType = Object.freeze({
	type: "skippable",
});

/** Pruned when it yields no templates or fails */
export const Nullable: ConditionalCompileType = Object.freeze({
	type: "nullable",
});

/** Must contribute at least one template */
export const Required: ConditionalCompileType = Object.freeze({
	type: "required",
});

/** Must never be used */
export const Never: ConditionalCompileType = Object.freeze({ type: "never" });

export const NEVER_AND_REQUIRED_INCOMPATIBLE = "Never and Required incompatible";

/**
 * Unconditional failure carrying human-readable reasons.
 */
export function fail(...reasons: string[]): ConditionalCompileType {
	return { type: "fail", reasons };
}

export function isFail(
	verdict: ConditionalCompileType,
): verdict is { readonly type: "fail"; readonly reasons: readonly string[] } {
	return verdict.type === "fail";
}

/**
 * Merge two verdicts. Total; commutative except for the order of
 * concatenated fail reasons, which follows argument order. Associative on
 * non-fail verdicts. Once a Never/Required clash meets a fail, grouping can
 * change the reason list, though the result fails either way.
 */
export function mergeConditionalCompileTypes(
	a: ConditionalCompileType,
	b: ConditionalCompileType,
): ConditionalCompileType {
	if (a.type === "no-constraint") return b;
	if (b.type === "no-constraint") return a;

	if (a.type === "fail" && b.type === "fail") {
		return { type: "fail", reasons: [...a.reasons, ...b.reasons] };
	}
	if (a.type === "fail") return a;
	if (b.type === "fail") return b;

	if (
		(a.type === "required" && b.type === "never") ||
		(a.type === "never" && b.type === "required")
	) {
		return fail(NEVER_AND_REQUIRED_INCOMPATIBLE);
	}

	if (a.type === "never" || b.type === "never") return Never;
	if (a.type === "required" || b.type === "required") return Required;
	if (a.type === "skippable" || b.type === "skippable") return Skippable;
	return Nullable;
}

/**
 * Fold verdicts left to right, starting from NoConstraint. Reason order in
 * the result follows list order.
 */
export function foldConditionalCompileTypes(
	verdicts: Iterable<ConditionalCompileType>,
): ConditionalCompileType {
	let acc = NoConstraint;
	for (const verdict of verdicts) {
		acc = mergeConditionalCompileTypes(acc, verdict);
	}
	return acc;
}

/**
 * Evaluate a branch's rules in declared order and fold the results. A rule
 * that throws contributes a fail naming the rule.
 */
export function evaluateConditionalCompileIf<TSelf>(
	rules: readonly ConditionallyCompileIf<TSelf>[],
	self: TSelf,
	ctx: Context,
): ConditionalCompileType {
	return foldConditionalCompileTypes(
		rules.map((rule) => {
			try {
				return rule.evaluate(self, ctx);
			} catch (err) {
				return fail(`rule "${rule.name}" threw: ${errorMessage(err)}`);
			}
		}),
	);
}

/**
 * Declare a conditional-compile rule.
 */
export function compileIf<TSelf>(
	name: string,
	evaluate: (self: TSelf, ctx: Context) => ConditionalCompileType,
): ConditionallyCompileIf<TSelf> {
	return { kind: "fresh", name, evaluate };
}

/**
 * Human-readable rendering of a verdict, for logs.
 */
export function describeConditionalCompileType(verdict: ConditionalCompileType): string {
	if (verdict.type === "fail") {
		return `fail(${verdict.reasons.map((r) => JSON.stringify(r)).join(", ")})`;
	}
	return verdict.type;
}
