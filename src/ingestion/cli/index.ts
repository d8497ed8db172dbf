#!/usr/bin/env npx tsx

/**
 * Pipeline CLI Entry Point
 *
 * Usage:
 *   npm run cli -- <command> [options]
 *
 * Commands:
 *   migrate     Create warehouse and staging tables
 *   extract     Fetch one snapshot into staging
 *   transform   Transform-load the next (or a named) batch
 *   cycle       Extract, then transform-load
 *   runs        List recent transform-load runs
 *   schedule    Run the cycle on its cron schedule until stopped
 */

import { Command, InvalidArgumentError } from "commander";
import { getPipelineConfig } from "@/config/pipelineConfig";
import { startScheduler, stopScheduler } from "@/jobs/scheduler";
import {
	getWarehouseConnector,
	migrateConfiguredDatabases,
	openStagingStore,
} from "@/utils/bindings";
import { createLogger } from "@/utils/logger";
import { listRecentRuns } from "../core/run-stats";
import type { StagingStore } from "../core/types";
import { runEtlCycle } from "../cycle";
import { extractStationStatus, resolveExtractorSettings } from "../extractor";
import { resolveTransformLoadOptions, runTransformLoad } from "../processor";
import { formatExtraction, formatRunSummary, formatRunsTable } from "./format";

const log = createLogger("cli");

function print(lines: string[]): void {
	for (const line of lines) {
		console.log(line);
	}
}

function parsePositiveInt(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

/**
 * Run a command body with the staging store open, closing it afterwards.
 */
async function withStaging<T>(
	fn: (staging: StagingStore) => Promise<T>,
): Promise<T> {
	const staging = openStagingStore();
	try {
		return await fn(staging.store);
	} finally {
		staging.close();
	}
}

const program = new Command();

program
	.name("bikeshare")
	.description("Bike-share station status ETL pipeline")
	.version("1.0.0");

program
	.command("migrate")
	.description("Create warehouse and staging tables")
	.action(() => {
		migrateConfiguredDatabases();
		const config = getPipelineConfig();
		console.log(`Warehouse: ${config.WAREHOUSE_DATABASE_PATH}`);
		console.log(`Staging:   ${config.STAGING_DATABASE_PATH}`);
		console.log("Migrations applied.");
	});

program
	.command("extract")
	.description("Fetch the current station status into staging")
	.action(async () => {
		const config = getPipelineConfig();
		const result = await withStaging((staging) =>
			extractStationStatus({ staging, settings: resolveExtractorSettings(config) }),
		);
		print(formatExtraction(result));
	});

program
	.command("transform")
	.description("Transform-load the oldest pending batch")
	.option("--batch <ref>", "Reprocess the batch with this reference")
	.action(async (options: { batch?: string }) => {
		const config = getPipelineConfig();
		const summary = await withStaging((staging) =>
			runTransformLoad(
				{
					staging,
					warehouse: getWarehouseConnector(),
					options: resolveTransformLoadOptions(config),
				},
				options.batch,
			),
		);
		print(formatRunSummary(summary));
		if (summary.status === "FAILED") {
			process.exitCode = 1;
		}
	});

program
	.command("cycle")
	.description("Extract, then transform-load with retry")
	.action(async () => {
		const config = getPipelineConfig();
		const result = await withStaging((staging) =>
			runEtlCycle({ config, staging, warehouse: getWarehouseConnector() }),
		);
		if (result.extraction) {
			print(formatExtraction(result.extraction));
		} else {
			console.log(`Extraction failed: ${result.extractionError ?? "unknown error"}`);
		}
		console.log("");
		print(formatRunSummary(result.run));
	});

program
	.command("runs")
	.description("List recent transform-load runs")
	.option("--limit <n>", "Number of runs to show", parsePositiveInt, 20)
	.action((options: { limit: number }) => {
		const handle = getWarehouseConnector().open();
		try {
			print(formatRunsTable(listRecentRuns(handle.db, options.limit)));
		} finally {
			handle.release();
		}
	});

program
	.command("schedule")
	.description("Run the ETL cycle on its cron schedule until interrupted")
	.action(async () => {
		await startScheduler();

		const shutdown = (signal: string) => {
			log.info("Received shutdown signal", { signal });
			stopScheduler().then(
				() => process.exit(0),
				(error: unknown) => {
					log.error("Scheduler did not stop cleanly", {}, error);
					process.exit(1);
				},
			);
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));
	});

program.parseAsync().catch((error: unknown) => {
	log.error("Command failed", {}, error);
	process.exit(1);
});
