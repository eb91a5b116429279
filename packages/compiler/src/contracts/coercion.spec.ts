import { IsInt, IsOptional, IsString, Min } from "class-validator";

import { coerceField, coerceWith } from "./coercion.js";
import { CompilationError } from "./types.js";

class PayoutArgs {
	@IsInt()
	@Min(0)
	amount!: number;

	@IsOptional()
	@IsString()
	note?: string;
}

describe("coerceWith", () => {
	const coerce = coerceWith(PayoutArgs);

	it("should return an instance of the argument class", async () => {
		const args = await coerce({ amount: 1_500, note: "rent" });

		expect(args).toBeInstanceOf(PayoutArgs);
		expect(args).toEqual({ amount: 1_500, note: "rent" });
	});

	it("should report each violated constraint as a reason", async () => {
		await expect(coerce({ amount: -5 })).rejects.toMatchObject({
			code: "ARGUMENT_COERCION_FAILURE",
			reasons: ["amount must not be less than 0"],
			message: "Argument coercion failed: amount must not be less than 0",
		});
	});

	it("should collect every reason of a property", async () => {
		const result = coerce({ amount: "lots" });

		await expect(result).rejects.toBeInstanceOf(CompilationError);
		await expect(result).rejects.toMatchObject({
			reasons: expect.arrayContaining([
				"amount must be an integer number",
				"amount must not be less than 0",
			]),
		});
	});

	it("should reject unknown properties", async () => {
		await expect(coerce({ amount: 1, extra: true })).rejects.toMatchObject({
			reasons: ["property extra should not exist"],
		});
	});

	it.each([
		[null, "null"],
		[[1, 2], "array"],
		[42, "number"],
		[undefined, "undefined"],
	])("should reject %j as not an object", async (input, kind) => {
		await expect(coerce(input)).rejects.toMatchObject({
			reasons: [`expected an object for PayoutArgs, got ${kind}`],
		});
	});
});

describe("coerceField", () => {
	const coerce = coerceField("payout", PayoutArgs);

	it("should validate the selected field", async () => {
		await expect(coerce({ payout: { amount: 10 } })).resolves.toEqual({ amount: 10 });
	});

	it("should fail when the field is missing", async () => {
		await expect(coerce({ other: {} })).rejects.toMatchObject({
			code: "ARGUMENT_COERCION_FAILURE",
			reasons: ['missing "payout" in stateful arguments'],
		});
	});
});
