/**
 * TemplateBuilder - incremental construction of a TransactionTemplate
 *
 * Tracks the funds still available so that a production function cannot
 * create outputs worth more than the contract holds.
 */

import { CompilationError } from "../contracts/types.js";
import { TransactionTemplate, TxOutput } from "./types.js";

/** nSequence that disables relative locks and RBF signalling */
export const SEQUENCE_FINAL = 0xffffffff;

export const DEFAULT_TX_VERSION = 2;

/**
 * @example
 * ```typescript
 * const template = ctx
 *   .template()
 *   .setLabel("release")
 *   .addOutput(90_000n, receiverAddress, "receiver")
 *   .setSequence(0, 144)
 *   .build();
 * ```
 */
export class TemplateBuilder {
	private remaining: bigint;
	private label?: string;
	private lockTime = 0;
	private readonly sequences: number[] = [SEQUENCE_FINAL];
	private readonly outputs: TxOutput[] = [];
	private readonly metadata: Record<string, unknown> = {};

	constructor(options: { funds: bigint }) {
		this.remaining = options.funds;
	}

	/**
	 * Add an output, spending `amount` from the available funds.
	 *
	 * @throws CompilationError (INSUFFICIENT_FUNDS) if the funds do not cover it
	 */
	addOutput(amount: bigint, address: string, label?: string): this {
		if (amount <= 0n) {
			throw new CompilationError("PRODUCTION_FAILURE", [
				`output amount must be positive (got ${amount})`,
			]);
		}
		if (amount > this.remaining) {
			throw new CompilationError(
				"INSUFFICIENT_FUNDS",
				[`output of ${amount} sats exceeds the ${this.remaining} sats available`],
				undefined,
				{ requested: amount, available: this.remaining },
			);
		}
		this.remaining -= amount;
		this.outputs.push(label === undefined ? { address, amount } : { address, amount, label });
		return this;
	}

	/**
	 * Set nSequence of an input. Inputs up to `index` are created as needed.
	 */
	setSequence(index: number, sequence: number): this {
		if (!Number.isInteger(index) || index < 0) {
			throw new CompilationError("PRODUCTION_FAILURE", [
				`invalid input index ${index}`,
			]);
		}
		while (this.sequences.length <= index) {
			this.sequences.push(SEQUENCE_FINAL);
		}
		this.sequences[index] = sequence;
		return this;
	}

	setLockTime(lockTime: number): this {
		this.lockTime = lockTime;
		return this;
	}

	setLabel(label: string): this {
		this.label = label;
		return this;
	}

	addMetadata(key: string, value: unknown): this {
		this.metadata[key] = value;
		return this;
	}

	/**
	 * Satoshis not yet assigned to an output.
	 */
	getRemainingFunds(): bigint {
		return this.remaining;
	}

	build(): TransactionTemplate {
		const template: TransactionTemplate = {
			version: DEFAULT_TX_VERSION,
			lockTime: this.lockTime,
			sequences: [...this.sequences],
			outputs: this.outputs.map((o) => ({ ...o })),
			metadata: { ...this.metadata },
		};
		if (this.label !== undefined) {
			template.label = this.label;
		}
		return template;
	}
}
