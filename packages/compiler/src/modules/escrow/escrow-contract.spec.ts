import { and, key, older } from "../../core/clause.js";
import { Required, Skippable } from "../../contracts/conditional-compile.js";
import { ContractError } from "../../contracts/types.js";
import { buildContractScripts, findBranch } from "../../compiler/compiled-contract.js";
import { ContractCompiler } from "../../compiler/compiler.js";
import { ESCROW_CONTRACT, EscrowContract } from "./escrow-contract.js";
import { EscrowConfig } from "./types.js";

const senderKey = new Uint8Array(32).fill(0x11);
const receiverKey = new Uint8Array(32).fill(0x22);
const arbiterKey = new Uint8Array(32).fill(0x33);

const baseConfig: EscrowConfig = {
	sender: { pubkey: senderKey, address: "addr-sender" },
	receiver: { pubkey: receiverKey, address: "addr-receiver" },
	arbiter: { pubkey: arbiterKey, address: "addr-arbiter" },
	amount: 100_000n,
	unilateralDelay: 144,
};

describe("EscrowContract", () => {
	let logger: { log: jest.Mock; error: jest.Mock; warn: jest.Mock; debug: jest.Mock };
	let compiler: ContractCompiler;

	beforeEach(() => {
		logger = { log: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() };
		compiler = new ContractCompiler({ network: "regtest", logger });
	});

	describe("construction", () => {
		it("should keep the configuration and generate an id", () => {
			const escrow = new EscrowContract(baseConfig);

			expect(escrow.id).toHaveLength(16);
			expect(escrow.amount).toBe(100_000n);
			expect(escrow.hasArbiter()).toBe(true);
		});

		it.each<[string, Partial<EscrowConfig>, string]>([
			[
				"a short key",
				{ receiver: { pubkey: new Uint8Array(31), address: "addr-receiver" } },
				"Invalid public key length for receiver: expected 32 bytes, got 31",
			],
			[
				"a repeated key",
				{ arbiter: { pubkey: senderKey, address: "addr-arbiter" } },
				"Duplicate public key for arbiter",
			],
			["a zero amount", { amount: 0n }, "Escrow amount must be positive, got 0"],
			[
				"a zero delay",
				{ unilateralDelay: 0 },
				"Invalid unilateral delay: 0 (must be 1-65535 blocks)",
			],
		])("should reject %s", (_case, overrides, message) => {
			const create = () => new EscrowContract({ ...baseConfig, ...overrides });

			expect(create).toThrow(ContractError);
			expect(create).toThrow(message);
		});
	});

	describe("compile", () => {
		const escrow = new EscrowContract(baseConfig, { id: "escrow-1" });

		it("should compile every arbitrated and unilateral branch without arguments", async () => {
			const compiled = await escrow.compile(compiler, compiler.createContext(100_000n));

			expect(compiled.name).toBe("escrow");
			expect(compiled.branches.map((b) => b.name)).toEqual([
				"release",
				"refund",
				"unilateral-refund",
				"cooperative-close",
			]);

			const release = findBranch(compiled, "release");
			expect(release?.condition).toEqual(and(key(receiverKey), key(arbiterKey)));
			expect(release?.templates).toEqual([
				{
					label: "release",
					version: 2,
					lockTime: 0,
					sequences: [0xffffffff],
					outputs: [{ address: "addr-receiver", amount: 100_000n, label: "release" }],
					metadata: { escrowId: "escrow-1" },
				},
			]);

			const unilateral = findBranch(compiled, "unilateral-refund");
			expect(unilateral?.verdict).toEqual(Required);
			expect(unilateral?.condition).toEqual(and(key(senderKey), older(144)));
			expect(unilateral?.templates[0].sequences).toEqual([144]);
			expect(unilateral?.templates[0].outputs).toEqual([
				{ address: "addr-sender", amount: 100_000n, label: "unilateral-refund" },
			]);

			expect(findBranch(compiled, "cooperative-close")).toMatchObject({
				kind: "finish",
				condition: and(key(senderKey), key(receiverKey)),
				templates: [],
			});
		});

		it("should never compile arbitrated branches without an arbiter", async () => {
			const { arbiter: _arbiter, ...withoutArbiter } = baseConfig;
			const twoParty = new EscrowContract(withoutArbiter);

			const compiled = await twoParty.compile(compiler, compiler.createContext(100_000n));

			expect(twoParty.hasArbiter()).toBe(false);
			expect(compiled.branches.map((b) => b.name)).toEqual([
				"unilateral-refund",
				"cooperative-close",
			]);
		});

		it("should split the escrow when a settlement is supplied", async () => {
			const compiled = await escrow.compile(compiler, compiler.createContext(100_000n), {
				settle: { receiverShare: 70_000, memo: "partial delivery" },
			});

			const settle = findBranch(compiled, "settle");
			expect(settle?.kind).toBe("finish-or");
			expect(settle?.verdict).toEqual(Skippable);
			expect(settle?.condition).toEqual(and(key(senderKey), key(receiverKey)));
			expect(settle?.templates[0].outputs).toEqual([
				{ address: "addr-receiver", amount: 70_000n, label: "receiver" },
				{ address: "addr-sender", amount: 30_000n, label: "sender" },
			]);
			expect(settle?.templates[0].metadata).toEqual({
				memo: "partial delivery",
				escrowId: "escrow-1",
			});
		});

		it("should omit empty outputs from a settlement", async () => {
			const compiled = await escrow.compile(compiler, compiler.createContext(100_000n), {
				settle: { receiverShare: 100_000 },
			});

			expect(findBranch(compiled, "settle")?.templates[0].outputs).toEqual([
				{ address: "addr-receiver", amount: 100_000n, label: "receiver" },
			]);
		});

		it("should drop a settlement that exceeds the escrow", async () => {
			const compiled = await escrow.compile(compiler, compiler.createContext(100_000n), {
				settle: { receiverShare: 150_000 },
			});

			expect(findBranch(compiled, "settle")).toBeUndefined();
			expect(logger.warn).toHaveBeenCalledWith(
				'Dropping skippable branch "settle": Template production failed in branch "settle": receiver share 150000 exceeds the escrowed 100000 sats',
			);
		});

		it("should drop a settlement whose arguments do not validate", async () => {
			const compiled = await escrow.compile(compiler, compiler.createContext(100_000n), {
				settle: { receiverShare: -1 },
			});

			expect(findBranch(compiled, "settle")).toBeUndefined();
			expect(compiled.branches).toHaveLength(4);
		});

		it("should fail when the context cannot cover the escrow", async () => {
			await expect(
				escrow.compile(compiler, compiler.createContext(50_000n)),
			).rejects.toMatchObject({
				code: "INCLUSION_CONFLICT",
				branch: "unilateral-refund",
				reasons: ["escrow needs 100000 sats but the context holds 50000"],
			});
		});

		it("should produce tapscript leaves for every branch", async () => {
			const compiled = await escrow.compile(compiler, compiler.createContext(100_000n));

			const scripts = buildContractScripts(compiled);

			expect(scripts.getLeafScriptHexes("unilateral-refund")).toEqual([
				`029000b27520${"11".repeat(32)}ac`,
			]);
			expect(scripts.getLeafScriptHexes("cooperative-close")).toEqual([
				`20${"11".repeat(32)}ad20${"22".repeat(32)}ac`,
			]);
		});
	});

	describe("definition", () => {
		it("should expose the settlement argument schema", () => {
			expect(ESCROW_CONTRACT.finishOrFuncs[0].getName()).toBe("settle");
			expect(ESCROW_CONTRACT.finishOrFuncs[0].getSchema()?.required).toEqual(["receiverShare"]);
		});
	});
});
