/**
 * ETL Cycle
 *
 * One scheduled tick: extract a fresh snapshot into staging, then
 * transform-load the oldest pending batch. Shared by the Bree worker
 * and the `cycle` CLI command.
 */

import type { PipelineEnv } from "@/config/schemas";
import { withRetry } from "@/jobs/retry";
import type { WarehouseConnector } from "@/utils/bindings";
import { createLogger, measureTime } from "@/utils/logger";
import type { FetchLike } from "./core/fetch";
import type {
	RunState,
	RunSummary,
	RunSummaryError,
	StagingStore,
} from "./core/types";
import {
	type ExtractionResult,
	extractStationStatus,
	resolveExtractorSettings,
} from "./extractor";
import { resolveTransformLoadOptions, triggerTransformLoad } from "./processor";

const log = createLogger("pipeline");

export interface CycleContext {
	config: PipelineEnv;
	staging: StagingStore;
	warehouse: WarehouseConnector;
	fetchImpl?: FetchLike;
	sleepImpl?: (ms: number) => Promise<void>;
	now?: () => Date;
}

export interface CycleResult {
	/** Null when the extraction failed; pending batches are still loaded */
	extraction: ExtractionResult | null;
	extractionError: string | null;
	run: RunSummary;
	attempts: number;
	duration: number;
}

/**
 * Run one cycle. Throws TransformLoadFailedError when every
 * transform-load attempt failed.
 */
export async function runEtlCycle(ctx: CycleContext): Promise<CycleResult> {
	const { result, duration } = await measureTime(async () => {
		let extraction: ExtractionResult | null = null;
		let extractionError: string | null = null;
		try {
			extraction = await extractStationStatus({
				staging: ctx.staging,
				settings: resolveExtractorSettings(ctx.config),
				fetchImpl: ctx.fetchImpl,
				sleepImpl: ctx.sleepImpl,
				now: ctx.now,
			});
		} catch (error) {
			extractionError = error instanceof Error ? error.message : String(error);
			log.error("Extraction failed, loading pending batches only", {}, error);
		}

		let attempts = 0;
		const run = await withRetry(
			(attempt) => {
				attempts = attempt;
				return triggerTransformLoad({
					staging: ctx.staging,
					warehouse: ctx.warehouse,
					options: resolveTransformLoadOptions(ctx.config),
					now: ctx.now,
				});
			},
			{
				attempts: ctx.config.RETRY_ATTEMPTS,
				delayMs: ctx.config.RETRY_DELAY_MS,
				label: "Transform-load",
				sleepImpl: ctx.sleepImpl,
			},
		);

		return { extraction, extractionError, run, attempts };
	});

	log.info("ETL cycle completed", {
		extracted: result.extraction?.recordCount ?? 0,
		runId: result.run.runId,
		status: result.run.status,
		attempts: result.attempts,
		duration,
	});

	return { ...result, duration };
}

/**
 * Plain summary posted from the worker thread; structured-clone safe.
 */
export interface CycleMessage {
	extractionId: string | null;
	extracted: number;
	extractionError: string | null;
	runId: string;
	batchRef: string | null;
	status: RunSummary["status"];
	accepted: number;
	rejected: number;
	upsertedStations: number;
	insertedFacts: number;
	skippedDuplicateFacts: number;
	errors: RunSummaryError[];
	failure: { state: RunState; message: string } | null;
	attempts: number;
	duration: number;
}

export function toCycleMessage(result: CycleResult): CycleMessage {
	const { run } = result;
	return {
		extractionId: result.extraction?.extractionId ?? null,
		extracted: result.extraction?.recordCount ?? 0,
		extractionError: result.extractionError,
		runId: run.runId,
		batchRef: run.batchRef,
		status: run.status,
		accepted: run.accepted,
		rejected: run.rejected,
		upsertedStations: run.upsertedStations,
		insertedFacts: run.insertedFacts,
		skippedDuplicateFacts: run.skippedDuplicateFacts,
		errors: run.errors.map((e) => ({ recordRef: e.recordRef, reason: e.reason })),
		// cause is not structured-clone safe
		failure: run.failure
			? { state: run.failure.state, message: run.failure.message }
			: null,
		attempts: result.attempts,
		duration: result.duration,
	};
}
