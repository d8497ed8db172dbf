import { AsyncLocalStorage } from "node:async_hooks";

interface RunContext {
	runId: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Run a function with a pipeline run context.
 * Every log line emitted inside the async chain carries the run id.
 */
export function runWithContext<T>(runId: string, fn: () => T): T {
	return asyncLocalStorage.run({ runId }, fn);
}

/**
 * Get the current run ID from async context if available.
 */
export function getRunId(): string | undefined {
	return asyncLocalStorage.getStore()?.runId;
}
