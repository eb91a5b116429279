/**
 * Contract type declarations.
 */

import {
	CallableAsFoF,
	ContractDefinition,
	ContractError,
	Guard,
	ThenFunc,
} from "./types.js";

/**
 * Validates a contract definition: non-empty names, and branch names unique
 * across then-funcs, finish-or-funcs and finish guards.
 */
export function validateContractDefinition<TSelf extends object, TArgs>(
	definition: ContractDefinition<TSelf, TArgs>,
): void {
	if (!definition.name || definition.name.trim().length === 0) {
		throw new ContractError("Contract name cannot be empty", "INVALID_NAME");
	}

	const names = getBranchNames(definition);

	const seen = new Set<string>();
	for (const name of names) {
		if (!name || name.trim().length === 0) {
			throw new ContractError(
				`Contract "${definition.name}" declares a branch with an empty name`,
				"INVALID_NAME",
			);
		}
		if (seen.has(name)) {
			throw new ContractError(
				`Duplicate branch name "${name}" in contract "${definition.name}"`,
				"DUPLICATE_BRANCH",
				{ branch: name, contract: definition.name },
			);
		}
		seen.add(name);
	}
}

/**
 * Declare a contract type. Lists default to empty; the result is frozen and
 * validated.
 *
 * @example
 * ```typescript
 * const Escrow = defineContract<EscrowInstance, EscrowUpdate>({
 *   name: "escrow",
 *   thenFuncs: [release, refund],
 *   finishOrFuncs: [settle],
 *   finishGuards: [cooperativeClose],
 * });
 * ```
 */
export function defineContract<TSelf extends object, TArgs = unknown>(declaration: {
	name: string;
	thenFuncs?: readonly ThenFunc<TSelf>[];
	finishOrFuncs?: readonly CallableAsFoF<TSelf, TArgs>[];
	finishGuards?: readonly Guard<TSelf>[];
	defaultArgs?: () => TArgs;
}): ContractDefinition<TSelf, TArgs> {
	const definition: ContractDefinition<TSelf, TArgs> = Object.freeze({
		name: declaration.name,
		thenFuncs: Object.freeze([...(declaration.thenFuncs ?? [])]),
		finishOrFuncs: Object.freeze([...(declaration.finishOrFuncs ?? [])]),
		finishGuards: Object.freeze([...(declaration.finishGuards ?? [])]),
		defaultArgs: declaration.defaultArgs,
	});
	validateContractDefinition(definition);
	return definition;
}

/**
 * Names of all branches in declaration order.
 */
export function getBranchNames<TSelf extends object, TArgs>(
	definition: ContractDefinition<TSelf, TArgs>,
): string[] {
	return [
		...definition.thenFuncs.map((f) => f.name),
		...definition.finishOrFuncs.map((f) => f.getName()),
		...definition.finishGuards.map((g) => g.name),
	];
}
