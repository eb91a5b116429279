/**
 * Escrow Module Types
 *
 * Types specific to the escrow contract module.
 */

import { IsInt, IsOptional, IsString, MaxLength, Min } from "class-validator";

import { XOnlyPubKey } from "../../core/types.js";

/**
 * A participant of the escrow.
 */
export interface EscrowParty {
	/** X-only public key (32 bytes) */
	pubkey: XOnlyPubKey;
	/** Address funds are paid to when this party is the destination */
	address: string;
	/** Human-readable display name (optional) */
	displayName?: string;
}

/**
 * Configuration for creating an escrow contract.
 */
export interface EscrowConfig {
	/** Sender party (the one funding the escrow) */
	sender: EscrowParty;
	/** Receiver party (the one receiving funds on success) */
	receiver: EscrowParty;
	/** Arbiter party (dispute resolver); without one, arbitration branches are never compiled */
	arbiter?: EscrowParty;
	/** Amount to be escrowed in satoshis */
	amount: bigint;
	/** Relative delay, in blocks, before the sender may reclaim alone */
	unilateralDelay: number;
	/** Description of the escrow purpose */
	description?: string;
}

/**
 * Arguments for the "settle" branch: how much of the escrow the receiver gets.
 * The sender receives the remainder.
 */
export class SettleArgs {
	@IsInt()
	@Min(0)
	receiverShare!: number;

	@IsOptional()
	@IsString()
	@MaxLength(140)
	memo?: string;
}

/**
 * Stateful arguments of the escrow contract, one optional entry per
 * argument-taking branch.
 */
export interface EscrowUpdate {
	settle?: {
		receiverShare: number;
		memo?: string;
	};
}
