/**
 * Escrow guards and conditional-compile rules
 *
 * Signature guards are cached: a party's key does not change within a
 * compilation. The timelock guard is fresh.
 */

import { and, key, older } from "../../core/clause.js";
import {
	NoConstraint,
	Never,
	Required,
	Skippable,
	compileIf,
	fail,
} from "../../contracts/conditional-compile.js";
import { cacheGuard, freshGuard } from "../../contracts/guard.js";
import { ContractError } from "../../contracts/types.js";
import type { EscrowContract } from "./escrow-contract.js";

export const senderSigns = cacheGuard<EscrowContract>("sender-signs", (self) =>
	key(self.sender.pubkey),
);

export const receiverSigns = cacheGuard<EscrowContract>("receiver-signs", (self) =>
	key(self.receiver.pubkey),
);

export const arbiterSigns = cacheGuard<EscrowContract>("arbiter-signs", (self) => {
	if (!self.arbiter) {
		throw new ContractError(
			`Escrow ${self.id} has no arbiter`,
			"MISSING_ARBITER",
		);
	}
	return key(self.arbiter.pubkey);
});

export const unilateralDelayElapsed = freshGuard<EscrowContract>(
	"unilateral-delay",
	(self) => older(self.unilateralDelay),
);

/**
 * Finish path: sender and receiver together may spend without templates.
 */
export const cooperativeClose = cacheGuard<EscrowContract>("cooperative-close", (self) =>
	and(key(self.sender.pubkey), key(self.receiver.pubkey)),
);

export const requiresArbiter = compileIf<EscrowContract>("arbiter-present", (self) =>
	self.arbiter ? NoConstraint : Never,
);

export const requiresFunding = compileIf<EscrowContract>("funded", (self, ctx) =>
	ctx.funds < self.amount
		? fail(`escrow needs ${self.amount} sats but the context holds ${ctx.funds}`)
		: NoConstraint,
);

export const alwaysRequired = compileIf<EscrowContract>("required", () => Required);

export const optionalSettlement = compileIf<EscrowContract>("optional", () => Skippable);
