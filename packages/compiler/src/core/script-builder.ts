/**
 * ScriptBuilder - Tapscript leaves for compiled spending paths
 *
 * Each spending path carries one clause (the conjunction of a branch's
 * guards). The clause is brought to disjunctive normal form and every
 * disjunct becomes one tapscript leaf.
 */

import { hex } from "@scure/base";
import { Script as BtcScript } from "@scure/btc-signer";

import { Clause, ScriptConfigError, validateClause } from "./types.js";

type ScriptOps = Parameters<typeof BtcScript.encode>[0];

/**
 * Upper bound on leaves produced for one clause.
 */
export const MAX_LEAVES_PER_CLAUSE = 64;

/**
 * A named spending path and its unlocking clause.
 */
export interface ClauseSpendingPath {
	name: string;
	clause: Clause;
}

/**
 * Expand a clause into disjuncts, each a list of atoms that must all hold.
 * `unsatisfiable` contributes no disjunct; `trivial` an empty one.
 */
function toDisjuncts(clause: Clause): Clause[][] {
	switch (clause.type) {
		case "trivial":
			return [[]];
		case "unsatisfiable":
			return [];
		case "or":
			return clause.clauses.flatMap(toDisjuncts);
		case "and": {
			let acc: Clause[][] = [[]];
			for (const sub of clause.clauses) {
				const next: Clause[][] = [];
				for (const left of acc) {
					for (const right of toDisjuncts(sub)) {
						next.push([...left, ...right]);
					}
				}
				if (next.length > MAX_LEAVES_PER_CLAUSE) {
					throw new ScriptConfigError(
						`Clause expands to more than ${MAX_LEAVES_PER_CLAUSE} leaves`,
						"clauses",
					);
				}
				acc = next;
			}
			return acc;
		}
		default:
			return [[clause]];
	}
}

function pushSignatureCheck(ops: ScriptOps, atom: Clause, last: boolean): void {
	if (atom.type === "key") {
		ops.push(atom.pubkey, last ? "CHECKSIG" : "CHECKSIGVERIFY");
		return;
	}
	if (atom.type !== "threshold") {
		throw new ScriptConfigError(`Not a signature check: ${atom.type}`);
	}

	atom.clauses.forEach((sub, i) => {
		if (sub.type !== "key") {
			throw new ScriptConfigError(
				`Threshold clauses may only contain keys, found "${sub.type}"`,
				"clauses",
			);
		}
		ops.push(sub.pubkey, i === 0 ? "CHECKSIG" : "CHECKSIGADD");
	});
	ops.push(atom.k, last ? "NUMEQUAL" : "NUMEQUALVERIFY");
}

/**
 * Encode one conjunction of atoms into a leaf script.
 *
 * Locks come first, signature checks last so that the final check leaves
 * the result on the stack.
 */
function encodeLeaf(atoms: Clause[]): Uint8Array {
	const ops: ScriptOps = [];
	const signatureChecks: Clause[] = [];

	for (const atom of atoms) {
		switch (atom.type) {
			case "older":
				ops.push(atom.blocks, "CHECKSEQUENCEVERIFY", "DROP");
				break;
			case "after":
				ops.push(atom.height, "CHECKLOCKTIMEVERIFY", "DROP");
				break;
			case "hash":
				ops.push(
					"SIZE",
					32,
					"EQUALVERIFY",
					atom.hashType === "sha256" ? "SHA256" : "HASH160",
					atom.hash,
					"EQUALVERIFY",
				);
				break;
			case "key":
			case "threshold":
				signatureChecks.push(atom);
				break;
			default:
				throw new ScriptConfigError(`Unexpected clause in leaf: ${atom.type}`);
		}
	}

	if (signatureChecks.length === 0) {
		throw new ScriptConfigError(
			"Leaf has no signature check; add a key to the spending path",
		);
	}

	signatureChecks.forEach((atom, i) =>
		pushSignatureCheck(ops, atom, i === signatureChecks.length - 1),
	);

	return BtcScript.encode(ops);
}

/**
 * Compile a clause into its tapscript leaves, one per disjunct.
 */
export function compileLeafScripts(clause: Clause): Uint8Array[] {
	validateClause(clause);
	const disjuncts = toDisjuncts(clause);
	if (disjuncts.length > MAX_LEAVES_PER_CLAUSE) {
		throw new ScriptConfigError(
			`Clause expands to more than ${MAX_LEAVES_PER_CLAUSE} leaves`,
			"clauses",
		);
	}
	return disjuncts.map(encodeLeaf);
}

/**
 * Builds and indexes the leaves of a set of spending paths.
 *
 * @example
 * ```typescript
 * const builder = new ScriptBuilder([
 *   { name: "release", clause: key(arbiterKey) },
 *   { name: "refund", clause: and(key(arbiterKey), older(144)) },
 * ]);
 * builder.getLeafScriptHexes("refund"); // ["5ab275…ac"]
 * ```
 */
export class ScriptBuilder {
	private readonly paths: ClauseSpendingPath[];
	private readonly leafScripts: Map<string, Uint8Array[]>;

	constructor(paths: ClauseSpendingPath[]) {
		this.paths = [...paths];
		this.leafScripts = new Map();

		for (const path of paths) {
			if (this.leafScripts.has(path.name)) {
				throw new ScriptConfigError(
					`Duplicate spending path name "${path.name}"`,
					"name",
				);
			}
			this.leafScripts.set(path.name, compileLeafScripts(path.clause));
		}
	}

	/**
	 * Get the leaf scripts for a named spending path
	 */
	getLeafScripts(name: string): Uint8Array[] {
		const leaves = this.leafScripts.get(name);
		if (!leaves) {
			throw new ScriptConfigError(`Spending path "${name}" not found`);
		}
		return leaves;
	}

	getLeafScriptHexes(name: string): string[] {
		return this.getLeafScripts(name).map((leaf) => hex.encode(leaf));
	}

	/**
	 * All leaves in declaration order, as hex
	 */
	getAllLeafScriptHexes(): Map<string, string[]> {
		const result = new Map<string, string[]>();
		for (const path of this.paths) {
			result.set(path.name, this.getLeafScriptHexes(path.name));
		}
		return result;
	}

	hasSpendingPath(name: string): boolean {
		return this.leafScripts.has(name);
	}
}
