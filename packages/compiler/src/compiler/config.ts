import { NETWORK_TYPES, NetworkType } from "../core/types.js";
import { CompilerConfig, CompilerConfigError } from "./types.js";

export const DEFAULT_MAX_TEMPLATES_PER_BRANCH = 1024;

export const DEFAULT_COMPILER_CONFIG: Readonly<CompilerConfig> = Object.freeze({
	network: "regtest",
	maxTemplatesPerBranch: DEFAULT_MAX_TEMPLATES_PER_BRANCH,
});

function isNetworkType(value: string): value is NetworkType {
	return NETWORK_TYPES.some((network) => network === value);
}

/**
 * Validates a complete compiler configuration.
 */
export function validateCompilerConfig(config: CompilerConfig): void {
	if (!isNetworkType(config.network)) {
		throw new CompilerConfigError(
			`Unknown network "${config.network}" (expected one of ${NETWORK_TYPES.join(", ")})`,
			"network",
		);
	}

	if (
		!Number.isInteger(config.maxTemplatesPerBranch) ||
		config.maxTemplatesPerBranch < 1
	) {
		throw new CompilerConfigError(
			`maxTemplatesPerBranch must be a positive integer, got ${config.maxTemplatesPerBranch}`,
			"maxTemplatesPerBranch",
		);
	}
}

/**
 * Fill in defaults and validate.
 */
export function createCompilerConfig(
	overrides: Partial<CompilerConfig> = {},
): CompilerConfig {
	const config: CompilerConfig = {
		...DEFAULT_COMPILER_CONFIG,
		...overrides,
	};
	validateCompilerConfig(config);
	return config;
}

/**
 * Read the configuration from environment variables:
 *
 * - COVENANT_NETWORK: bitcoin | testnet | signet | regtest (default regtest)
 * - COVENANT_MAX_TEMPLATES: positive integer (default 1024)
 */
export function loadCompilerConfigFromEnv(
	env: NodeJS.ProcessEnv = process.env,
): CompilerConfig {
	const network = env.COVENANT_NETWORK ?? DEFAULT_COMPILER_CONFIG.network;
	if (!isNetworkType(network)) {
		throw new CompilerConfigError(
			`COVENANT_NETWORK must be one of ${NETWORK_TYPES.join(", ")}, got "${network}"`,
			"network",
		);
	}

	const rawMax = env.COVENANT_MAX_TEMPLATES;
	const maxTemplatesPerBranch =
		rawMax === undefined || rawMax.trim() === ""
			? DEFAULT_MAX_TEMPLATES_PER_BRANCH
			: Number(rawMax);

	return createCompilerConfig({ network, maxTemplatesPerBranch });
}
