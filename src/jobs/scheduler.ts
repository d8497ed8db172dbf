/**
 * Job Scheduler for the ETL Cycle
 *
 * Bree runs the etl-cycle worker on a cron schedule. Bree does not start a
 * job that is still running, so at most one cycle is active at a time.
 */

import Bree from "bree";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { getPipelineConfig } from "@/config/pipelineConfig";
import { createLogger } from "@/utils/logger";

const log = createLogger("scheduler");

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const ETL_JOB_NAME = "etl-cycle";

let bree: Bree | null = null;

/**
 * Initialize and start the job scheduler.
 * Workers are TypeScript files, loaded through tsx.
 */
export async function startScheduler(): Promise<void> {
	if (bree) {
		log.warn("Scheduler already running");
		return;
	}

	const config = getPipelineConfig();

	bree = new Bree({
		root: path.join(__dirname, "workers"),
		defaultExtension: "ts",
		acceptedExtensions: [".ts", ".js"],
		worker: { execArgv: ["--import", "tsx"] },
		hasSeconds: false,
		jobs: [
			{
				name: ETL_JOB_NAME,
				cron: config.ETL_CRON,
			},
		],
		workerMessageHandler: (metadata) => {
			log.info("Worker message received", {
				name: metadata.name,
				message: metadata.message,
			});
		},
		errorHandler: (error, workerMetadata) => {
			log.error("Worker error", { name: workerMetadata.name }, error);
		},
	});

	bree.on("worker created", (name) => {
		log.info("Worker created", { name });
	});

	bree.on("worker deleted", (name) => {
		log.info("Worker deleted", { name });
	});

	await bree.start();
	log.info("Scheduler started", { jobs: [ETL_JOB_NAME], cron: config.ETL_CRON });
}

/**
 * Stop the job scheduler gracefully.
 */
export async function stopScheduler(): Promise<void> {
	if (!bree) {
		return;
	}

	log.info("Stopping scheduler...");
	await bree.stop();
	bree = null;
	log.info("Scheduler stopped");
}
