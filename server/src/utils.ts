// Small shared utilities

const IS_TEST = typeof process !== 'undefined' && (
	typeof process.env.VITEST_WORKER_ID === 'string' || process.env.NODE_ENV === 'test'
);

/**
 * Compile-time exhaustiveness helper. Under Vitest (or NODE_ENV==='test') it throws;
 * otherwise it is a no-op at runtime, so a kind added to a union later degrades quietly.
 */
export function AssertNever(x: never, message?: string): never {
	if (IS_TEST) {
		throw new Error(message ?? `Unexpected value in AssertNever: ${String(x)}`);
	}
	return undefined as never;
}
