/**
 * Transaction layer types
 *
 * Templates are the compiler's description of a possible transaction
 * spending the contract. They are never signed or broadcast here.
 */

/**
 * Transaction output definition.
 */
export interface TxOutput {
	/** Recipient address (bech32m) */
	address: string;
	/** Amount in satoshis */
	amount: bigint;
	/** Optional script for advanced outputs */
	script?: Uint8Array;
	/** Human-readable purpose of this output */
	label?: string;
}

/**
 * A transaction template produced by a branch.
 */
export interface TransactionTemplate {
	/** Human-readable name, e.g. "release to receiver" */
	label?: string;
	/** Transaction version */
	version: number;
	/** nLockTime (block height, 0 when unlocked) */
	lockTime: number;
	/** nSequence per input, in input order */
	sequences: number[];
	/** Outputs created by this transaction */
	outputs: TxOutput[];
	/** Free-form annotations carried alongside the template */
	metadata: Record<string, unknown>;
}

/**
 * Lazy, finite, fallible sequence of templates returned by a production
 * function. A failure is signalled by throwing, either when the function is
 * called or while the sequence is being iterated.
 */
export type TxTmplIt =
	| Iterable<TransactionTemplate>
	| AsyncIterable<TransactionTemplate>;

/**
 * Sum of all output amounts in a template.
 */
export function totalOutputAmount(template: TransactionTemplate): bigint {
	return template.outputs.reduce((sum, output) => sum + output.amount, 0n);
}
