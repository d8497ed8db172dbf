import { desc, eq } from "drizzle-orm";
import type { Database } from "@/db";
import { loadRuns, type LoadRunRow } from "@/db/schema";
import type { RunSummary } from "./types";

/**
 * Record that a run started.
 * Sets status to "running" with all counters at 0.
 */
export function recordRunStarted(
	db: Database,
	runId: string,
	startedAt: Date,
	batchRef: string | null = null,
): void {
	db.insert(loadRuns)
		.values({
			id: runId,
			batchRef,
			status: "running",
			startedAt,
		})
		.onConflictDoNothing({ target: loadRuns.id })
		.run();
}

/**
 * Record the final summary of a run.
 * Written outside the batch transaction, so a failed run is still recorded.
 */
export function recordRunFinished(db: Database, summary: RunSummary): void {
	db.update(loadRuns)
		.set({
			batchRef: summary.batchRef,
			status: summary.status === "DONE" ? "done" : "failed",
			accepted: summary.accepted,
			rejected: summary.rejected,
			upsertedStations: summary.upsertedStations,
			insertedFacts: summary.insertedFacts,
			skippedDuplicateFacts: summary.skippedDuplicateFacts,
			errors: summary.errors.length > 0 ? JSON.stringify(summary.errors) : null,
			failure: summary.failure
				? JSON.stringify({
						state: summary.failure.state,
						message: summary.failure.message,
					})
				: null,
			completedAt: summary.completedAt,
		})
		.where(eq(loadRuns.id, summary.runId))
		.run();
}

/**
 * Most recent runs first.
 */
export function listRecentRuns(db: Database, limit = 20): LoadRunRow[] {
	return db
		.select()
		.from(loadRuns)
		.orderBy(desc(loadRuns.startedAt))
		.limit(limit)
		.all();
}
