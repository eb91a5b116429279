/**
 * Clause constructors and helpers.
 *
 * @example
 * ```typescript
 * const refund = and(key(senderKey), older(144));
 * const anyone = or(key(aliceKey), key(bobKey));
 * describeClause(refund); // "and(pk(02ab…), older(144))"
 * ```
 */

import { hex } from "@scure/base";

import {
	Clause,
	HashType,
	XOnlyPubKey,
	ScriptConfigError,
	validateClause,
} from "./types.js";

export const trivial: Clause = Object.freeze({ type: "trivial" });

export const unsatisfiable: Clause = Object.freeze({ type: "unsatisfiable" });

export function key(pubkey: XOnlyPubKey): Clause {
	const clause: Clause = { type: "key", pubkey };
	validateClause(clause);
	return clause;
}

export function older(blocks: number): Clause {
	const clause: Clause = { type: "older", blocks };
	validateClause(clause);
	return clause;
}

export function after(height: number): Clause {
	const clause: Clause = { type: "after", height };
	validateClause(clause);
	return clause;
}

export function hashLock(hash: Uint8Array, hashType: HashType = "sha256"): Clause {
	const clause: Clause = { type: "hash", hashType, hash };
	validateClause(clause);
	return clause;
}

export function sha256(hash: Uint8Array): Clause {
	return hashLock(hash, "sha256");
}

export function hash160(hash: Uint8Array): Clause {
	return hashLock(hash, "hash160");
}

export function and(...clauses: Clause[]): Clause {
	if (clauses.length === 0) {
		throw new ScriptConfigError("and() requires at least one clause", "clauses");
	}
	return { type: "and", clauses };
}

export function or(...clauses: Clause[]): Clause {
	if (clauses.length === 0) {
		throw new ScriptConfigError("or() requires at least one clause", "clauses");
	}
	return { type: "or", clauses };
}

export function threshold(k: number, clauses: Clause[]): Clause {
	const clause: Clause = { type: "threshold", k, clauses };
	validateClause(clause);
	return clause;
}

/**
 * Implicit AND of a guard list.
 *
 * Nested ANDs are flattened and `trivial` operands dropped. An empty list (or
 * one made only of `trivial`) is `trivial`; any `unsatisfiable` operand makes
 * the whole conjunction `unsatisfiable`; a single operand is returned as is.
 */
export function conjunction(clauses: readonly Clause[]): Clause {
	const flat: Clause[] = [];
	const visit = (clause: Clause): void => {
		if (clause.type === "and") {
			clause.clauses.forEach(visit);
		} else if (clause.type !== "trivial") {
			flat.push(clause);
		}
	};
	clauses.forEach(visit);

	if (flat.some((c) => c.type === "unsatisfiable")) {
		return unsatisfiable;
	}
	if (flat.length === 0) {
		return trivial;
	}
	if (flat.length === 1) {
		return flat[0];
	}
	return { type: "and", clauses: flat };
}

/**
 * Human-readable, miniscript-like rendering of a clause.
 */
export function describeClause(clause: Clause): string {
	switch (clause.type) {
		case "key":
			return `pk(${hex.encode(clause.pubkey)})`;
		case "older":
			return `older(${clause.blocks})`;
		case "after":
			return `after(${clause.height})`;
		case "hash":
			return `${clause.hashType}(${hex.encode(clause.hash)})`;
		case "and":
		case "or":
			return `${clause.type}(${clause.clauses.map(describeClause).join(", ")})`;
		case "threshold":
			return `thresh(${clause.k}, ${clause.clauses.map(describeClause).join(", ")})`;
		case "trivial":
			return "TRIVIAL";
		case "unsatisfiable":
			return "UNSATISFIABLE";
	}
}
