/**
 * Helpers over a compiled contract.
 */

import { ScriptBuilder } from "../core/script-builder.js";
import { CompiledBranch, CompiledContract, GuardedTemplate } from "./types.js";

/**
 * Flatten a compiled contract into (condition, template) pairs, in branch
 * order then template order.
 */
export function toGuardedTemplates(compiled: CompiledContract): GuardedTemplate[] {
	return compiled.branches.flatMap((branch) =>
		branch.templates.map((template) => ({
			branch: branch.name,
			condition: branch.condition,
			template,
		})),
	);
}

export function findBranch(
	compiled: CompiledContract,
	name: string,
): CompiledBranch | undefined {
	return compiled.branches.find((branch) => branch.name === name);
}

/**
 * Tapscript leaves for every included branch, keyed by branch name.
 */
export function buildContractScripts(compiled: CompiledContract): ScriptBuilder {
	return new ScriptBuilder(
		compiled.branches.map((branch) => ({
			name: branch.name,
			clause: branch.condition,
		})),
	);
}
