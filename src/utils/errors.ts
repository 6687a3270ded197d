/**
 * Normalizes thrown values into Error instances
 */
export const toError = (error: unknown): Error => {
	return error instanceof Error ? error : new Error(String(error));
};

export const describeError = (error: unknown): string => {
	return error instanceof Error ? error.message : String(error);
};
