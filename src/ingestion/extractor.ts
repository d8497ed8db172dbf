/**
 * Station Status Extractor
 *
 * Pulls the real-time Vélib' station status dataset from the OpenDataSoft
 * records API and writes it to staging as one extraction. Records are kept
 * as delivered; validation happens in the transform-load run.
 */

import { z } from "zod";
import type { PipelineEnv } from "@/config/schemas";
import { generatePrefixedId } from "@/utils/id";
import { createLogger } from "@/utils/logger";
import { type FetchLike, fetchWithRetry } from "./core/fetch";
import type { ExtractedSnapshot, StagingStore } from "./core/types";

const log = createLogger("extract");

export const EXTRACTION_SOURCE = "velib_opendatasoft_api";

// ============================================================================
// API Response Schema
// ============================================================================

// A field of the wrong type becomes null instead of failing the whole pull
const scalar = z.union([z.string(), z.number()]).nullish().catch(null);
const text = z.string().nullish().catch(null);
const flag = z.union([z.string(), z.boolean(), z.number()]).nullish().catch(null);

const stationFieldsSchema = z.object({
	stationcode: scalar,
	name: text,
	coordonnees_geo: z.array(z.union([z.number(), z.string()])).nullish().catch(null),
	capacity: scalar,
	nom_arrondissement_communes: text,
	code_insee_commune: scalar,
	mechanical: scalar,
	ebike: scalar,
	numdocksavailable: scalar,
	is_installed: flag,
	is_renting: flag,
	is_returning: flag,
	duedate: scalar,
});

const recordsResponseSchema = z.object({
	nhits: z.number().optional(),
	records: z.array(
		z.object({
			recordid: z.string().optional(),
			fields: stationFieldsSchema,
		}),
	),
});

export type StationFields = z.infer<typeof stationFieldsSchema>;
export type RecordsResponse = z.infer<typeof recordsResponseSchema>;

// ============================================================================
// Mapping
// ============================================================================

/**
 * Map one API record to the staging snapshot contract.
 */
export function toExtractedSnapshot(
	fields: StationFields,
	extractedAt: Date,
): ExtractedSnapshot {
	const coords = fields.coordonnees_geo ?? [];
	const insee = fields.code_insee_commune;

	return {
		station_code: fields.stationcode ?? null,
		name: fields.name ?? null,
		latitude: coords[0] ?? null,
		longitude: coords[1] ?? null,
		capacity: fields.capacity ?? null,
		arrondissement: fields.nom_arrondissement_communes ?? null,
		insee_code: insee === null || insee === undefined ? null : String(insee),
		mechanical_bikes: fields.mechanical ?? null,
		electric_bikes: fields.ebike ?? null,
		docks_available: fields.numdocksavailable ?? null,
		is_installed: fields.is_installed ?? null,
		is_renting: fields.is_renting ?? null,
		is_returning: fields.is_returning ?? null,
		last_reported: fields.duedate ?? null,
		extracted_at: extractedAt.toISOString(),
	};
}

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractorSettings {
	apiUrl: string;
	dataset: string;
	rows: number;
	timeoutMs: number;
}

export interface ExtractorContext {
	staging: StagingStore;
	settings: ExtractorSettings;
	fetchImpl?: FetchLike;
	sleepImpl?: (ms: number) => Promise<void>;
	now?: () => Date;
}

export interface ExtractionResult {
	extractionId: string;
	extractedAt: Date;
	recordCount: number;
	/** Total hits the API reported; can exceed recordCount when rows is too small */
	reportedHits: number | null;
	source: string;
}

export function resolveExtractorSettings(config: PipelineEnv): ExtractorSettings {
	return {
		apiUrl: config.VELIB_API_URL,
		dataset: config.VELIB_DATASET,
		rows: config.VELIB_ROWS,
		timeoutMs: config.FETCH_TIMEOUT_MS,
	};
}

export function buildRequestUrl(settings: ExtractorSettings): string {
	const url = new URL(settings.apiUrl);
	url.searchParams.set("dataset", settings.dataset);
	url.searchParams.set("rows", String(settings.rows));
	url.searchParams.set("format", "json");
	return url.toString();
}

/**
 * Fetch the dataset once and stage it.
 */
export async function extractStationStatus(
	ctx: ExtractorContext,
): Promise<ExtractionResult> {
	const url = buildRequestUrl(ctx.settings);
	log.info("Fetching station status", { url });

	const response = await fetchWithRetry(url, {
		config: { timeoutMs: ctx.settings.timeoutMs },
		fetchImpl: ctx.fetchImpl,
		sleepImpl: ctx.sleepImpl,
		init: { headers: { Accept: "application/json" } },
	});

	const body: unknown = await response.json();
	const parsed = recordsResponseSchema.safeParse(body);
	if (!parsed.success) {
		throw new Error(`Unexpected response from ${url}: ${parsed.error.message}`);
	}

	const extractedAt = (ctx.now ?? (() => new Date()))();
	const snapshots = parsed.data.records.map((record) =>
		toExtractedSnapshot(record.fields, extractedAt),
	);

	const extractionId = generatePrefixedId("ext", extractedAt);
	await ctx.staging.stageExtraction({
		id: extractionId,
		source: EXTRACTION_SOURCE,
		extractedAt,
		snapshots,
	});

	const result: ExtractionResult = {
		extractionId,
		extractedAt,
		recordCount: snapshots.length,
		reportedHits: parsed.data.nhits ?? null,
		source: EXTRACTION_SOURCE,
	};

	if (result.reportedHits !== null && result.reportedHits > result.recordCount) {
		log.warn("API reported more stations than were returned", {
			reportedHits: result.reportedHits,
			recordCount: result.recordCount,
		});
	}

	log.info("Extraction staged", { ...result });
	return result;
}
