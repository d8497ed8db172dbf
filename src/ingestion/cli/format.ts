/**
 * Console output for CLI commands.
 */

import type { LoadRunRow } from "@/db/schema";
import type { RunSummary } from "../core/types";
import type { ExtractionResult } from "../extractor";

const MAX_LISTED_ERRORS = 10;

export function formatExtraction(result: ExtractionResult): string[] {
	return [
		"Extraction:",
		`  Id:         ${result.extractionId}`,
		`  Captured:   ${result.extractedAt.toISOString()}`,
		`  Records:    ${result.recordCount}`,
		`  Source:     ${result.source}`,
	];
}

export function formatRunSummary(summary: RunSummary): string[] {
	const lines = [
		"Transform-load run:",
		`  Run:        ${summary.runId}`,
		`  Batch:      ${summary.batchRef ?? "(none)"}`,
		`  Status:     ${summary.status}`,
		`  Accepted:   ${summary.accepted}`,
		`  Rejected:   ${summary.rejected}`,
		`  Stations:   ${summary.upsertedStations} upserted`,
		`  Facts:      ${summary.insertedFacts} inserted, ${summary.skippedDuplicateFacts} skipped`,
		`  Duration:   ${summary.completedAt.getTime() - summary.startedAt.getTime()}ms`,
	];

	if (summary.failure) {
		lines.push(`  Failed in:  ${summary.failure.state}: ${summary.failure.message}`);
	}

	if (summary.errors.length > 0) {
		lines.push("", `Rejections (${summary.errors.length}):`);
		for (const err of summary.errors.slice(0, MAX_LISTED_ERRORS)) {
			lines.push(`  ${err.recordRef}  ${err.reason}`);
		}
		if (summary.errors.length > MAX_LISTED_ERRORS) {
			lines.push(`  ... and ${summary.errors.length - MAX_LISTED_ERRORS} more`);
		}
	}

	return lines;
}

export function formatRunsTable(runs: LoadRunRow[]): string[] {
	if (runs.length === 0) {
		return ["No runs recorded."];
	}

	const header = ["RUN", "STATUS", "STARTED", "ACCEPTED", "REJECTED", "INSERTED", "SKIPPED"];
	const rows = runs.map((run) => [
		run.id,
		run.status,
		run.startedAt.toISOString(),
		String(run.accepted),
		String(run.rejected),
		String(run.insertedFacts),
		String(run.skippedDuplicateFacts),
	]);

	const widths = header.map((title, i) =>
		Math.max(title.length, ...rows.map((row) => row[i]?.length ?? 0)),
	);
	const render = (cells: string[]) =>
		cells
			.map((cell, i) => cell.padEnd(widths[i] ?? cell.length))
			.join("  ")
			.trimEnd();

	return [render(header), ...rows.map(render)];
}
