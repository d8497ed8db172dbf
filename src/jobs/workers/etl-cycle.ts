/**
 * ETL Cycle Worker
 *
 * Bree worker: extracts one snapshot and transform-loads the oldest
 * pending batch, retrying the transform-load on failure.
 */

import { parentPort } from "node:worker_threads";
import { getPipelineConfig } from "@/config/pipelineConfig";
import { runEtlCycle, toCycleMessage } from "@/ingestion/cycle";
import { getWarehouseConnector, openStagingStore } from "@/utils/bindings";
import { createLogger } from "@/utils/logger";

const log = createLogger("scheduler");

async function main(): Promise<void> {
	log.info("Starting ETL cycle job");

	const config = getPipelineConfig();
	const staging = openStagingStore();
	try {
		const result = await runEtlCycle({
			config,
			staging: staging.store,
			warehouse: getWarehouseConnector(),
		});

		if (parentPort) {
			parentPort.postMessage({ type: "completed", summary: toCycleMessage(result) });
		}
	} finally {
		staging.close();
	}
}

main().catch((error) => {
	log.error("ETL cycle job failed", {}, error);
	process.exit(1);
});
