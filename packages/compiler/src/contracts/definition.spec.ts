import { key } from "../core/clause.js";
import { defineContract, getBranchNames, validateContractDefinition } from "./definition.js";
import { cacheGuard } from "./guard.js";
import { finishOrFunc, thenFunc } from "./branches.js";
import { ContractDefinition, ContractError } from "./types.js";

interface Wallet {
	pubkey: Uint8Array;
}

const owner = cacheGuard<Wallet>("owner", (self) => key(self.pubkey));
const spend = thenFunc<Wallet>({ name: "spend", guards: [owner], func: () => [] });
const topUp = finishOrFunc<Wallet, unknown, unknown>({
	name: "top-up",
	coerceArgs: (args) => args,
	func: () => [],
});

describe("defineContract", () => {
	it("should default every list to empty", () => {
		const empty = defineContract<Wallet>({ name: "empty" });

		expect(empty.thenFuncs).toEqual([]);
		expect(empty.finishOrFuncs).toEqual([]);
		expect(empty.finishGuards).toEqual([]);
		expect(Object.isFrozen(empty)).toBe(true);
	});

	it("should list branch names in declaration order", () => {
		const wallet = defineContract<Wallet>({
			name: "wallet",
			thenFuncs: [spend],
			finishOrFuncs: [topUp],
			finishGuards: [owner],
		});

		expect(getBranchNames(wallet)).toEqual(["spend", "top-up", "owner"]);
	});

	it("should reject duplicate branch names across lists", () => {
		const declare = () =>
			defineContract<Wallet>({
				name: "wallet",
				thenFuncs: [thenFunc<Wallet>({ name: "owner", func: () => [] })],
				finishGuards: [owner],
			});

		expect(declare).toThrow(ContractError);
		expect(declare).toThrow('Duplicate branch name "owner" in contract "wallet"');
	});

	it("should reject empty names", () => {
		expect(() => defineContract<Wallet>({ name: " " })).toThrow(
			"Contract name cannot be empty",
		);
		expect(() =>
			defineContract<Wallet>({
				name: "wallet",
				thenFuncs: [thenFunc<Wallet>({ name: "", func: () => [] })],
			}),
		).toThrow('Contract "wallet" declares a branch with an empty name');
	});

	it("should validate definitions built by hand", () => {
		const handMade: ContractDefinition<Wallet> = {
			name: "wallet",
			thenFuncs: [spend, spend],
			finishOrFuncs: [],
			finishGuards: [],
		};

		try {
			validateContractDefinition(handMade);
			throw new Error("expected a ContractError");
		} catch (err) {
			expect(err).toBeInstanceOf(ContractError);
			expect(err).toMatchObject({ code: "DUPLICATE_BRANCH", details: { branch: "spend", contract: "wallet" } });
		}
	});
});
