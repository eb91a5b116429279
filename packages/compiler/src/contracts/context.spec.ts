import { Context } from "./context.js";
import { CompilationError } from "./types.js";

describe("Context", () => {
	const root = new Context({ network: "signet", funds: 50_000n, blockHeight: 812 });

	it("should derive child contexts without touching the parent", () => {
		const child = root.derive("release").derive("payout");

		expect(child.path).toEqual(["release", "payout"]);
		expect(child.pathString()).toBe("release/payout");
		expect(child.network).toBe("signet");
		expect(child.blockHeight).toBe(812);
		expect(root.path).toEqual([]);
	});

	it("should reduce funds on spendAmount", () => {
		expect(root.spendAmount(20_000n).funds).toBe(30_000n);
		expect(root.spendAmount(50_000n).funds).toBe(0n);
		expect(root.funds).toBe(50_000n);
	});

	it("should reject spending more than is available", () => {
		expect(() => root.spendAmount(50_001n)).toThrow(
			new CompilationError("INSUFFICIENT_FUNDS", [
				"requested 50001 sats but only 50000 available",
			]),
		);
	});

	it("should reject negative amounts", () => {
		expect(() => root.spendAmount(-1n)).toThrow("cannot spend a negative amount (-1)");
		expect(() => new Context({ network: "regtest", funds: -1n })).toThrow(
			"Insufficient funds: funds cannot be negative (got -1)",
		);
	});

	it("should replace funds with withFunds", () => {
		const topped = root.derive("a").withFunds(7n);

		expect(topped.funds).toBe(7n);
		expect(topped.path).toEqual(["a"]);
	});

	it("should start templates from the context funds", () => {
		expect(root.template().getRemainingFunds()).toBe(50_000n);
	});
});
