/**
 * Escrow Module
 *
 * Escrow between a sender and a receiver, with an optional arbiter, a
 * unilateral refund after a relative delay and a negotiated settlement.
 */

// Types
export type {
	EscrowParty,
	EscrowConfig,
	EscrowUpdate,
} from "./types.js";

export { SettleArgs } from "./types.js";

// Guards and rules
export {
	senderSigns,
	receiverSigns,
	arbiterSigns,
	unilateralDelayElapsed,
	cooperativeClose,
	requiresArbiter,
	requiresFunding,
	alwaysRequired,
	optionalSettlement,
} from "./escrow-guards.js";

// Contract
export {
	EscrowContract,
	ESCROW_CONTRACT,
	validateEscrowConfig,
	release,
	refund,
	unilateralRefund,
	settle,
} from "./escrow-contract.js";
