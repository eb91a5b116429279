/**
 * Escrow Contract
 *
 * An escrow declared with the branch engine. The instance holds the parties
 * and amount; `ESCROW_CONTRACT` declares every branch it may take.
 */

import { hex } from "@scure/base";
import { nanoid } from "nanoid";

import { MAX_RELATIVE_BLOCKS, isValidXOnlyPubKey } from "../../core/types.js";
import { coerceField } from "../../contracts/coercion.js";
import type { Context } from "../../contracts/context.js";
import { defineContract } from "../../contracts/definition.js";
import { finishOrFunc, thenFunc } from "../../contracts/branches.js";
import {
	CompilationError,
	ContractDefinition,
	ContractError,
} from "../../contracts/types.js";
import type { ContractCompiler } from "../../compiler/compiler.js";
import type { CompilationSession } from "../../compiler/session.js";
import { CompiledContract } from "../../compiler/types.js";
import { TransactionTemplate } from "../../transactions/types.js";
import {
	alwaysRequired,
	arbiterSigns,
	cooperativeClose,
	optionalSettlement,
	receiverSigns,
	requiresArbiter,
	requiresFunding,
	senderSigns,
	unilateralDelayElapsed,
} from "./escrow-guards.js";
import { EscrowConfig, EscrowParty, EscrowUpdate, SettleArgs } from "./types.js";

/**
 * Validates an escrow configuration.
 */
export function validateEscrowConfig(config: EscrowConfig): void {
	const parties: Array<[string, EscrowParty | undefined]> = [
		["sender", config.sender],
		["receiver", config.receiver],
		["arbiter", config.arbiter],
	];

	const pubkeys = new Set<string>();
	for (const [role, party] of parties) {
		if (!party) {
			continue;
		}
		if (!isValidXOnlyPubKey(party.pubkey)) {
			throw new ContractError(
				`Invalid public key length for ${role}: expected 32 bytes, got ${party.pubkey.length}`,
				"INVALID_ESCROW_CONFIG",
				{ role },
			);
		}
		const pubkeyHex = hex.encode(party.pubkey);
		if (pubkeys.has(pubkeyHex)) {
			throw new ContractError(
				`Duplicate public key for ${role}`,
				"INVALID_ESCROW_CONFIG",
				{ role },
			);
		}
		pubkeys.add(pubkeyHex);
	}

	if (config.amount <= 0n) {
		throw new ContractError(
			`Escrow amount must be positive, got ${config.amount}`,
			"INVALID_ESCROW_CONFIG",
		);
	}

	if (
		!Number.isInteger(config.unilateralDelay) ||
		config.unilateralDelay < 1 ||
		config.unilateralDelay > MAX_RELATIVE_BLOCKS
	) {
		throw new ContractError(
			`Invalid unilateral delay: ${config.unilateralDelay} (must be 1-${MAX_RELATIVE_BLOCKS} blocks)`,
			"INVALID_ESCROW_CONFIG",
		);
	}
}

/**
 * Escrow Contract
 *
 * @example
 * ```typescript
 * const escrow = new EscrowContract({
 *   sender: { pubkey: senderKey, address: senderAddress },
 *   receiver: { pubkey: receiverKey, address: receiverAddress },
 *   arbiter: { pubkey: arbiterKey, address: arbiterAddress },
 *   amount: 100_000n,
 *   unilateralDelay: 144,
 * });
 *
 * const compiler = new ContractCompiler({ network: "regtest" });
 * const compiled = await escrow.compile(compiler, compiler.createContext(100_000n), {
 *   settle: { receiverShare: 70_000 },
 * });
 * ```
 */
export class EscrowContract {
	readonly id: string;
	readonly sender: EscrowParty;
	readonly receiver: EscrowParty;
	readonly arbiter?: EscrowParty;
	readonly amount: bigint;
	readonly unilateralDelay: number;
	readonly description?: string;

	constructor(config: EscrowConfig, options?: { id?: string }) {
		validateEscrowConfig(config);
		this.id = options?.id ?? nanoid(16);
		this.sender = config.sender;
		this.receiver = config.receiver;
		this.arbiter = config.arbiter;
		this.amount = config.amount;
		this.unilateralDelay = config.unilateralDelay;
		this.description = config.description;
	}

	hasArbiter(): boolean {
		return this.arbiter !== undefined;
	}

	/**
	 * Compile this escrow. Without `update`, the settle branch is skipped.
	 */
	compile(
		compiler: ContractCompiler,
		ctx: Context,
		update?: EscrowUpdate,
		session?: CompilationSession,
	): Promise<CompiledContract> {
		return compiler.compile(ESCROW_CONTRACT, this, ctx, { args: update, session });
	}
}

function payTo(
	self: EscrowContract,
	ctx: Context,
	label: string,
	party: EscrowParty,
): TransactionTemplate {
	return ctx
		.template()
		.setLabel(label)
		.addOutput(self.amount, party.address, label)
		.addMetadata("escrowId", self.id)
		.build();
}

export const release = thenFunc<EscrowContract>({
	name: "release",
	guards: [receiverSigns, arbiterSigns],
	conditionalCompileIf: [requiresArbiter],
	func: (self, ctx) => [payTo(self, ctx, "release", self.receiver)],
});

export const refund = thenFunc<EscrowContract>({
	name: "refund",
	guards: [senderSigns, arbiterSigns],
	conditionalCompileIf: [requiresArbiter],
	func: (self, ctx) => [payTo(self, ctx, "refund", self.sender)],
});

export const unilateralRefund = thenFunc<EscrowContract>({
	name: "unilateral-refund",
	guards: [senderSigns, unilateralDelayElapsed],
	conditionalCompileIf: [requiresFunding, alwaysRequired],
	func: (self, ctx) => [
		ctx
			.template()
			.setLabel("unilateral-refund")
			.setSequence(0, self.unilateralDelay)
			.addOutput(self.amount, self.sender.address, "unilateral-refund")
			.addMetadata("escrowId", self.id)
			.build(),
	],
});

export const settle = finishOrFunc<EscrowContract, EscrowUpdate, SettleArgs>({
	name: "settle",
	guards: [senderSigns, receiverSigns],
	conditionalCompileIf: [optionalSettlement],
	coerceArgs: coerceField("settle", SettleArgs),
	schema: {
		title: "SettleArgs",
		description: "Split of the escrowed amount; the sender receives the remainder",
		type: "object",
		properties: {
			receiverShare: { type: "integer", minimum: 0 },
			memo: { type: "string", maxLength: 140 },
		},
		required: ["receiverShare"],
	},
	func: (self, ctx, args) => {
		const receiverShare = BigInt(args.receiverShare);
		if (receiverShare > self.amount) {
			throw new CompilationError("PRODUCTION_FAILURE", [
				`receiver share ${receiverShare} exceeds the escrowed ${self.amount} sats`,
			]);
		}

		const builder = ctx.template().setLabel("settle");
		if (receiverShare > 0n) {
			builder.addOutput(receiverShare, self.receiver.address, "receiver");
		}
		const senderShare = self.amount - receiverShare;
		if (senderShare > 0n) {
			builder.addOutput(senderShare, self.sender.address, "sender");
		}
		if (args.memo !== undefined) {
			builder.addMetadata("memo", args.memo);
		}
		return [builder.addMetadata("escrowId", self.id).build()];
	},
});

/**
 * Declaration of the escrow contract type.
 */
export const ESCROW_CONTRACT: ContractDefinition<EscrowContract, EscrowUpdate> =
	defineContract<EscrowContract, EscrowUpdate>({
		name: "escrow",
		thenFuncs: [release, refund, unilateralRefund],
		finishOrFuncs: [settle],
		finishGuards: [cooperativeClose],
	});
