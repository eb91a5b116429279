/**
 * Compile-time environment threaded through every guard, rule and
 * production function. Immutable: every "modifier" returns a new context.
 */

import { NetworkType } from "../core/types.js";
import { TemplateBuilder } from "../transactions/template-builder.js";
import { CompilationError } from "./types.js";

export interface ContextOptions {
	network: NetworkType;
	/** Satoshis available to the contract being compiled */
	funds: bigint;
	path?: readonly string[];
	/** Chain tip at compile time, if known */
	blockHeight?: number;
	now?: Date;
}

export class Context {
	readonly network: NetworkType;
	readonly funds: bigint;
	readonly path: readonly string[];
	readonly blockHeight?: number;
	readonly now?: Date;

	constructor(options: ContextOptions) {
		if (options.funds < 0n) {
			throw new CompilationError("INSUFFICIENT_FUNDS", [
				`funds cannot be negative (got ${options.funds})`,
			]);
		}
		this.network = options.network;
		this.funds = options.funds;
		this.path = Object.freeze([...(options.path ?? [])]);
		this.blockHeight = options.blockHeight;
		this.now = options.now;
	}

	private with(changes: Partial<ContextOptions>): Context {
		return new Context({
			network: this.network,
			funds: this.funds,
			path: this.path,
			blockHeight: this.blockHeight,
			now: this.now,
			...changes,
		});
	}

	/**
	 * Child context for a named sub-computation (e.g. a branch).
	 */
	derive(name: string): Context {
		return this.with({ path: [...this.path, name] });
	}

	withFunds(funds: bigint): Context {
		return this.with({ funds });
	}

	/**
	 * Context with `amount` fewer satoshis available.
	 */
	spendAmount(amount: bigint): Context {
		if (amount < 0n) {
			throw new CompilationError("INSUFFICIENT_FUNDS", [
				`cannot spend a negative amount (${amount})`,
			]);
		}
		if (amount > this.funds) {
			throw new CompilationError(
				"INSUFFICIENT_FUNDS",
				[`requested ${amount} sats but only ${this.funds} available`],
				undefined,
				{ requested: amount, available: this.funds },
			);
		}
		return this.withFunds(this.funds - amount);
	}

	/**
	 * Start a template spending from this context's funds.
	 */
	template(): TemplateBuilder {
		return new TemplateBuilder({ funds: this.funds });
	}

	/**
	 * Path rendered as "a/b/c", used to prefix log lines.
	 */
	pathString(): string {
		return this.path.join("/");
	}
}
