/**
 * Transform-Load Processor
 *
 * Pulls one batch from staging and moves it through
 * FETCHING -> VALIDATING -> DEDUPING -> WRITING -> DONE | FAILED.
 * The batch is marked processed only after the warehouse commit, so a
 * failed run leaves it for the scheduler's retry.
 */

import type { DedupPolicy, PipelineEnv } from "@/config/schemas";
import type { Database } from "@/db";
import type { DatabaseHandle, WarehouseConnector } from "@/utils/bindings";
import { generatePrefixedId } from "@/utils/id";
import { createLogger } from "@/utils/logger";
import { runWithContext } from "@/utils/run-context";
import { dedupeSnapshots } from "./core/dedupe";
import { writeBatch } from "./core/persist";
import { recordRunFinished, recordRunStarted } from "./core/run-stats";
import { StagingReadError } from "./core/staging";
import type {
	BatchLimits,
	RunState,
	RunSummary,
	StagedBatch,
	StagingStore,
} from "./core/types";
import { validateBatch } from "./core/validate";

const log = createLogger("pipeline");

// ============================================================================
// Types
// ============================================================================

export interface TransformLoadOptions extends BatchLimits {
	dedupPolicy: DedupPolicy;
}

export interface TransformLoadContext {
	staging: StagingStore;
	warehouse: WarehouseConnector;
	options: TransformLoadOptions;
	/** Clock used for commit and bookkeeping timestamps */
	now?: () => Date;
}

/**
 * Raised by triggerTransformLoad when the run ended FAILED.
 * Carries the summary so the scheduler can log it before retrying.
 */
export class TransformLoadFailedError extends Error {
	constructor(readonly summary: RunSummary) {
		super(
			`Transform-load run ${summary.runId} failed in ${summary.failure?.state ?? "unknown state"}: ${summary.failure?.message ?? "no cause recorded"}`,
			{ cause: summary.failure?.cause },
		);
		this.name = "TransformLoadFailedError";
	}
}

export function resolveTransformLoadOptions(config: PipelineEnv): TransformLoadOptions {
	return {
		maxExtractions: config.BATCH_MAX_EXTRACTIONS,
		windowMs: config.BATCH_WINDOW_MINUTES * 60_000,
		dedupPolicy: config.DEDUP_POLICY,
	};
}

// ============================================================================
// Run State
// ============================================================================

class TransformLoadRun {
	state: RunState = "FETCHING";
	batchRef: string | null;
	accepted = 0;
	rejected = 0;
	upsertedStations = 0;
	insertedFacts = 0;
	skippedDuplicateFacts = 0;
	errors: RunSummary["errors"] = [];
	failure: RunSummary["failure"];
	completedAt: Date | null = null;

	constructor(
		readonly runId: string,
		batchRef: string | null,
		readonly startedAt: Date,
	) {
		this.batchRef = batchRef;
	}

	transition(next: RunState): void {
		log.debug("Run state transition", { from: this.state, to: next });
		this.state = next;
	}

	fail(error: unknown, at: Date): void {
		this.failure = {
			state: this.state,
			message: error instanceof Error ? error.message : String(error),
			cause: error,
		};
		this.completedAt = at;
		this.state = "FAILED";
	}

	complete(at: Date): void {
		this.completedAt = at;
		this.transition("DONE");
	}

	toSummary(): RunSummary {
		return {
			runId: this.runId,
			batchRef: this.batchRef,
			status: this.state === "DONE" ? "DONE" : "FAILED",
			accepted: this.accepted,
			rejected: this.rejected,
			upsertedStations: this.upsertedStations,
			insertedFacts: this.insertedFacts,
			skippedDuplicateFacts: this.skippedDuplicateFacts,
			errors: this.errors,
			...(this.failure ? { failure: this.failure } : {}),
			startedAt: this.startedAt,
			completedAt: this.completedAt ?? this.startedAt,
		};
	}
}

// ============================================================================
// Phases
// ============================================================================

async function fetchBatch(
	staging: StagingStore,
	limits: BatchLimits,
	batchRef: string | undefined,
): Promise<StagedBatch | null> {
	try {
		return batchRef
			? await staging.fetchBatch(batchRef, limits)
			: await staging.fetchNextBatch(limits);
	} catch (error) {
		if (error instanceof StagingReadError) throw error;
		const message = error instanceof Error ? error.message : String(error);
		throw new StagingReadError(`Failed to read batch from staging: ${message}`, {
			cause: error,
		});
	}
}

async function processBatch(
	ctx: TransformLoadContext,
	db: Database,
	run: TransformLoadRun,
	batchRef: string | undefined,
): Promise<void> {
	const now = ctx.now ?? (() => new Date());

	const batch = await fetchBatch(ctx.staging, ctx.options, batchRef);
	if (!batch) {
		log.info(
			batchRef
				? "Batch already processed, nothing to do"
				: "No unprocessed batch in staging",
			{ batchRef },
		);
		return;
	}
	run.batchRef = batch.ref;
	log.info("Batch fetched", {
		batchRef: batch.ref,
		extractions: batch.extractionIds.length,
		snapshots: batch.snapshots.length,
	});

	run.transition("VALIDATING");
	const { accepted, rejected } = validateBatch(batch.snapshots);
	run.accepted = accepted.length;
	run.rejected = rejected.length;
	run.errors = rejected.map(({ recordRef, reason }) => ({ recordRef, reason }));
	for (const rejection of rejected) {
		log.warn("Snapshot rejected", { ...rejection });
	}

	run.transition("DEDUPING");
	const deduped = dedupeSnapshots(accepted, { policy: ctx.options.dedupPolicy });
	log.debug("Batch deduplicated", {
		stations: deduped.stations.length,
		facts: deduped.facts.length,
		collapsed: deduped.collapsed,
	});

	run.transition("WRITING");
	const outcome = writeBatch(db, deduped, now());
	run.upsertedStations = outcome.upsertedStations;
	run.insertedFacts = outcome.insertedFacts;
	run.skippedDuplicateFacts = outcome.skippedDuplicateFacts;

	await ctx.staging.markProcessed(batch, run.runId, now());
}

/**
 * Bookkeeping must never change a run's outcome.
 */
function recordSafely(operation: string, fn: () => void): void {
	try {
		fn();
	} catch (error) {
		log.warn("Failed to record run bookkeeping", { operation }, error);
	}
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Run one transform-load over the next unprocessed batch, or over the batch
 * named by `batchRef`. Never throws: failures come back as a FAILED summary.
 */
export async function runTransformLoad(
	ctx: TransformLoadContext,
	batchRef?: string,
): Promise<RunSummary> {
	const now = ctx.now ?? (() => new Date());
	const startedAt = now();
	const run = new TransformLoadRun(generatePrefixedId("run", startedAt), batchRef ?? null, startedAt);

	return runWithContext(run.runId, async () => {
		log.info("Transform-load run started", { batchRef });

		let handle: DatabaseHandle | null = null;
		try {
			const opened = ctx.warehouse.open();
			handle = opened;
			recordSafely("start", () =>
				recordRunStarted(opened.db, run.runId, startedAt, run.batchRef),
			);

			await processBatch(ctx, opened.db, run, batchRef);
			run.complete(now());
		} catch (error) {
			run.fail(error, now());
			log.error("Transform-load run failed", { state: run.failure?.state }, error);
		} finally {
			const summary = run.toSummary();
			if (handle) {
				const db = handle.db;
				recordSafely("finish", () => recordRunFinished(db, summary));
				handle.release();
			}
		}

		const summary = run.toSummary();
		log.info("Transform-load run finished", {
			status: summary.status,
			batchRef: summary.batchRef,
			accepted: summary.accepted,
			rejected: summary.rejected,
			upsertedStations: summary.upsertedStations,
			insertedFacts: summary.insertedFacts,
			skippedDuplicateFacts: summary.skippedDuplicateFacts,
			duration: summary.completedAt.getTime() - summary.startedAt.getTime(),
		});
		return summary;
	});
}

/**
 * Scheduler trigger: returns the summary of a DONE run, throws
 * TransformLoadFailedError for a FAILED one so the caller can retry.
 */
export async function triggerTransformLoad(
	ctx: TransformLoadContext,
	batchRef?: string,
): Promise<RunSummary> {
	const summary = await runTransformLoad(ctx, batchRef);
	if (summary.status === "FAILED") {
		throw new TransformLoadFailedError(summary);
	}
	return summary;
}
