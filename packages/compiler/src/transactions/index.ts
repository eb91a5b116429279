/**
 * Transactions module - Templates produced by contract branches
 */

// Types
export type { TxOutput, TransactionTemplate, TxTmplIt } from "./types.js";

export { totalOutputAmount } from "./types.js";

// Builder
export {
	TemplateBuilder,
	SEQUENCE_FINAL,
	DEFAULT_TX_VERSION,
} from "./template-builder.js";
