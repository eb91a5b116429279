import { key, older } from "../core/clause.js";
import { Context } from "../contracts/context.js";
import { cacheGuard, freshGuard } from "../contracts/guard.js";
import { CompilationError } from "../contracts/types.js";
import { CompilationSession } from "./session.js";

const alice = new Uint8Array(32).fill(1);
const bob = new Uint8Array(32).fill(2);

describe("CompilationSession", () => {
	const ctx = new Context({ network: "regtest", funds: 5_000n });

	it("should use the given id or generate one", () => {
		expect(new CompilationSession({ id: "session-1" }).id).toBe("session-1");
		expect(new CompilationSession().id).toHaveLength(16);
	});

	it("should evaluate guards in declared order", async () => {
		const calls: string[] = [];
		const guards = [
			cacheGuard<object>("bob", () => {
				calls.push("bob");
				return key(bob);
			}),
			freshGuard<object>("delay", () => {
				calls.push("delay");
				return older(6);
			}),
			cacheGuard<object>("alice", () => {
				calls.push("alice");
				return key(alice);
			}),
		];

		const clauses = await new CompilationSession().evaluateGuards(guards, {}, ctx);

		expect(calls).toEqual(["bob", "delay", "alice"]);
		expect(clauses).toEqual([key(bob), older(6), key(alice)]);
	});

	it("should count only real invocations", async () => {
		const session = new CompilationSession();
		const self = {};
		const cached = cacheGuard<object>("alice", () => key(alice));
		const fresh = freshGuard<object>("delay", () => older(6));

		await session.evaluateGuards([cached, fresh], self, ctx);
		await session.evaluateGuards([cached, fresh], self, ctx);

		expect(session.getGuardInvocationCount()).toBe(3);
	});

	it("should wrap a throwing guard in GUARD_FAILURE", async () => {
		const failing = freshGuard<object>("oracle", () => {
			throw new Error("timeout");
		});
		const after = jest.fn(() => key(alice));

		const result = new CompilationSession().evaluateGuards(
			[failing, freshGuard<object>("alice", after)],
			{},
			ctx,
		);

		await expect(result).rejects.toBeInstanceOf(CompilationError);
		await expect(result).rejects.toMatchObject({
			code: "GUARD_FAILURE",
			reasons: ['guard "oracle" failed: timeout'],
			details: { guard: "oracle" },
		});
		expect(after).not.toHaveBeenCalled();
	});
});
