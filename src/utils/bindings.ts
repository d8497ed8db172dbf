import * as fs from "node:fs";
import * as path from "node:path";
import { createDb, type Database, openSqlite } from "@/db";
import { upStaging, upWarehouse } from "@/db/tasks/migrate";
import { getPipelineConfig } from "@/config/pipelineConfig";
import { SqliteStagingStore } from "@/ingestion/core/staging";
import type { StagingStore } from "@/ingestion/core/types";

/**
 * Pipeline environment as read from process.env.
 * Values stay raw strings here; src/config/schemas.ts types and defaults them.
 */
export interface AppEnv {
	/** Warehouse SQLite file (or ":memory:") */
	WAREHOUSE_DATABASE_PATH?: string;
	/** Staging SQLite file (or ":memory:") */
	STAGING_DATABASE_PATH?: string;
	VELIB_API_URL?: string;
	VELIB_DATASET?: string;
	VELIB_ROWS?: string;
	BATCH_MAX_EXTRACTIONS?: string;
	BATCH_WINDOW_MINUTES?: string;
	DEDUP_POLICY?: string;
	RETRY_ATTEMPTS?: string;
	RETRY_DELAY_MS?: string;
	SQLITE_BUSY_TIMEOUT_MS?: string;
	FETCH_TIMEOUT_MS?: string;
	ETL_CRON?: string;
}

/**
 * Get environment configuration.
 * Empty strings count as unset so defaults apply.
 */
export function getEnv(): AppEnv {
	const read = (key: keyof AppEnv): string | undefined => {
		const value = process.env[key];
		return value === undefined || value === "" ? undefined : value;
	};

	return {
		WAREHOUSE_DATABASE_PATH: read("WAREHOUSE_DATABASE_PATH"),
		STAGING_DATABASE_PATH: read("STAGING_DATABASE_PATH"),
		VELIB_API_URL: read("VELIB_API_URL"),
		VELIB_DATASET: read("VELIB_DATASET"),
		VELIB_ROWS: read("VELIB_ROWS"),
		BATCH_MAX_EXTRACTIONS: read("BATCH_MAX_EXTRACTIONS"),
		BATCH_WINDOW_MINUTES: read("BATCH_WINDOW_MINUTES"),
		DEDUP_POLICY: read("DEDUP_POLICY"),
		RETRY_ATTEMPTS: read("RETRY_ATTEMPTS"),
		RETRY_DELAY_MS: read("RETRY_DELAY_MS"),
		SQLITE_BUSY_TIMEOUT_MS: read("SQLITE_BUSY_TIMEOUT_MS"),
		FETCH_TIMEOUT_MS: read("FETCH_TIMEOUT_MS"),
		ETL_CRON: read("ETL_CRON"),
	};
}

/**
 * A database connection scoped to its holder; release() closes it.
 */
export interface DatabaseHandle {
	db: Database;
	release(): void;
}

export interface WarehouseConnector {
	open(): DatabaseHandle;
}

function openFileDatabase(file: string, busyTimeoutMs: number): DatabaseHandle {
	if (file !== ":memory:") {
		fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
	}
	const sqlite = openSqlite(file, { busyTimeoutMs });
	return {
		db: createDb(sqlite),
		release: () => sqlite.close(),
	};
}

/**
 * Warehouse connector for the configured SQLite file.
 * Every open() returns a fresh connection for one run.
 */
export function getWarehouseConnector(): WarehouseConnector {
	const config = getPipelineConfig();
	return {
		open: () =>
			openFileDatabase(config.WAREHOUSE_DATABASE_PATH, config.SQLITE_BUSY_TIMEOUT_MS),
	};
}

/**
 * Open the staging store. The caller closes it when the process is done with it.
 */
export function openStagingStore(): { store: StagingStore; close: () => void } {
	const config = getPipelineConfig();
	const handle = openFileDatabase(
		config.STAGING_DATABASE_PATH,
		config.SQLITE_BUSY_TIMEOUT_MS,
	);
	return { store: new SqliteStagingStore(handle.db), close: handle.release };
}

/**
 * Create all tables in the configured warehouse and staging files.
 */
export function migrateConfiguredDatabases(): void {
	const config = getPipelineConfig();

	const warehouse = openFileDatabase(
		config.WAREHOUSE_DATABASE_PATH,
		config.SQLITE_BUSY_TIMEOUT_MS,
	);
	try {
		upWarehouse(warehouse.db);
	} finally {
		warehouse.release();
	}

	const staging = openFileDatabase(
		config.STAGING_DATABASE_PATH,
		config.SQLITE_BUSY_TIMEOUT_MS,
	);
	try {
		upStaging(staging.db);
	} finally {
		staging.release();
	}
}
