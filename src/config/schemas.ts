import { z } from "zod";

export const DEDUP_POLICIES = ["latest-extraction", "earliest-extraction"] as const;

export const pipelineEnvSchema = z.object({
	WAREHOUSE_DATABASE_PATH: z.string().min(1).default("./data/warehouse.db"),
	STAGING_DATABASE_PATH: z.string().min(1).default("./data/staging.db"),
	VELIB_API_URL: z
		.string()
		.url()
		.default("https://data.opendatasoft.com/api/records/1.0/search/"),
	VELIB_DATASET: z
		.string()
		.min(1)
		.default("velib-disponibilite-en-temps-reel@parisdata"),
	VELIB_ROWS: z.coerce.number().int().positive().default(10000),
	BATCH_MAX_EXTRACTIONS: z.coerce.number().int().positive().default(12),
	BATCH_WINDOW_MINUTES: z.coerce.number().positive().default(60),
	DEDUP_POLICY: z.enum(DEDUP_POLICIES).default("latest-extraction"),
	RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(2),
	RETRY_DELAY_MS: z.coerce.number().int().min(0).default(60000),
	SQLITE_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
	FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
	ETL_CRON: z.string().min(1).default("*/5 * * * *"),
});

export type PipelineEnv = z.infer<typeof pipelineEnvSchema>;
export type DedupPolicy = (typeof DEDUP_POLICIES)[number];
