/**
 * Core module - Policy clauses and leaf script encoding
 *
 * Clauses are the unlocking predicates guards produce. The branch engine
 * treats them as opaque; the script builder turns them into tapscript leaves.
 */

// Types
export type {
	XOnlyPubKey,
	NetworkType,
	HashType,
	Clause,
	ClauseType,
} from "./types.js";

// Validation utilities
export {
	NETWORK_TYPES,
	MAX_RELATIVE_BLOCKS,
	LOCKTIME_THRESHOLD,
	ScriptConfigError,
	isValidXOnlyPubKey,
	validateClause,
} from "./types.js";

// Clause constructors
export {
	trivial,
	unsatisfiable,
	key,
	older,
	after,
	hashLock,
	sha256,
	hash160,
	and,
	or,
	threshold,
	conjunction,
	describeClause,
} from "./clause.js";

// Script builder
export {
	type ClauseSpendingPath,
	MAX_LEAVES_PER_CLAUSE,
	ScriptBuilder,
	compileLeafScripts,
} from "./script-builder.js";
