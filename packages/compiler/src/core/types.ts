/**
 * Core types for covenant-kit
 *
 * The policy model guards produce. The branch engine treats a clause as
 * opaque: it only collects, memoizes and conjoins them. Script encoding
 * lives in `script-builder.ts`.
 */

/**
 * X-only public key (32 bytes) - standard for Taproot/Schnorr
 */
export type XOnlyPubKey = Uint8Array;

/**
 * Network type for Bitcoin-compatible protocols.
 */
export type NetworkType = "bitcoin" | "testnet" | "signet" | "regtest";

export const NETWORK_TYPES: readonly NetworkType[] = [
	"bitcoin",
	"testnet",
	"signet",
	"regtest",
];

/**
 * Hash types supported for hash-lock clauses.
 */
export type HashType = "sha256" | "hash160";

/**
 * Unlocking predicate produced by a guard.
 *
 * - key: a signature from the given key
 * - older: relative timelock in blocks (CSV)
 * - after: absolute timelock as block height (CLTV)
 * - hash: reveal of a preimage of the given hash
 * - and / or / threshold: composition
 * - trivial: always satisfied; unsatisfiable: never satisfied
 */
export type Clause =
	| { readonly type: "key"; readonly pubkey: XOnlyPubKey }
	| { readonly type: "older"; readonly blocks: number }
	| { readonly type: "after"; readonly height: number }
	| { readonly type: "hash"; readonly hashType: HashType; readonly hash: Uint8Array }
	| { readonly type: "and"; readonly clauses: readonly Clause[] }
	| { readonly type: "or"; readonly clauses: readonly Clause[] }
	| {
			readonly type: "threshold";
			readonly k: number;
			readonly clauses: readonly Clause[];
	  }
	| { readonly type: "trivial" }
	| { readonly type: "unsatisfiable" };

export type ClauseType = Clause["type"];

/**
 * Largest relative lock expressible in blocks (BIP 68, 16 bits).
 */
export const MAX_RELATIVE_BLOCKS = 0xffff;

/**
 * Heights at or above this are read as unix timestamps by CLTV.
 */
export const LOCKTIME_THRESHOLD = 500_000_000;

/**
 * Validation error for clauses and scripts.
 */
export class ScriptConfigError extends Error {
	constructor(
		message: string,
		public readonly field?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ScriptConfigError";
	}
}

/**
 * Validates that a public key is a valid x-only format (32 bytes).
 */
export function isValidXOnlyPubKey(pubkey: Uint8Array): boolean {
	return pubkey.length === 32;
}

function expectedHashLength(hashType: HashType): number {
	return hashType === "sha256" ? 32 : 20;
}

/**
 * Validates a clause tree, throwing on the first malformed node.
 */
export function validateClause(clause: Clause): void {
	switch (clause.type) {
		case "key":
			if (!isValidXOnlyPubKey(clause.pubkey)) {
				throw new ScriptConfigError(
					`Invalid public key length: expected 32 bytes, got ${clause.pubkey.length}`,
					"pubkey",
				);
			}
			return;

		case "older":
			if (
				!Number.isInteger(clause.blocks) ||
				clause.blocks < 1 ||
				clause.blocks > MAX_RELATIVE_BLOCKS
			) {
				throw new ScriptConfigError(
					`Invalid relative timelock: ${clause.blocks} (must be 1-${MAX_RELATIVE_BLOCKS} blocks)`,
					"blocks",
				);
			}
			return;

		case "after":
			if (
				!Number.isInteger(clause.height) ||
				clause.height < 1 ||
				clause.height >= LOCKTIME_THRESHOLD
			) {
				throw new ScriptConfigError(
					`Invalid absolute timelock: ${clause.height} (must be a block height below ${LOCKTIME_THRESHOLD})`,
					"height",
				);
			}
			return;

		case "hash": {
			const expected = expectedHashLength(clause.hashType);
			if (clause.hash.length !== expected) {
				throw new ScriptConfigError(
					`Invalid ${clause.hashType} hash length: expected ${expected} bytes, got ${clause.hash.length}`,
					"hash",
				);
			}
			return;
		}

		case "and":
		case "or":
			if (clause.clauses.length === 0) {
				throw new ScriptConfigError(
					`"${clause.type}" clause must have at least one sub-clause`,
					"clauses",
				);
			}
			clause.clauses.forEach(validateClause);
			return;

		case "threshold":
			if (
				!Number.isInteger(clause.k) ||
				clause.k < 1 ||
				clause.k > clause.clauses.length
			) {
				throw new ScriptConfigError(
					`Invalid threshold: ${clause.k} (must be 1-${clause.clauses.length})`,
					"k",
				);
			}
			clause.clauses.forEach(validateClause);
			return;

		case "trivial":
		case "unsatisfiable":
			return;
	}
}
