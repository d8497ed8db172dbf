import { createLogger } from "@/utils/logger";

const log = createLogger("scheduler");

export interface RetryOptions {
	/** Total attempts, including the first */
	attempts: number;
	/** Fixed wait between attempts */
	delayMs: number;
	label?: string;
	sleepImpl?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it resolves or the attempts are used up.
 * The error of the last attempt is rethrown.
 */
export async function withRetry<T>(
	fn: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const wait = options.sleepImpl ?? sleep;
	const attempts = Math.max(1, options.attempts);
	const label = options.label ?? "task";

	let lastError: unknown;
	for (let attempt = 1; attempt <= attempts; attempt++) {
		try {
			return await fn(attempt);
		} catch (error) {
			lastError = error;
			if (attempt === attempts) break;
			log.warn(
				`${label} failed, retrying`,
				{ attempt, attempts, delayMs: options.delayMs },
				error,
			);
			await wait(options.delayMs);
		}
	}

	throw lastError;
}
