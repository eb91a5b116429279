/**
 * Message of any thrown value.
 */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) {
		return err.message;
	}
	return typeof err === "string" ? err : String(err);
}
