import { z } from "zod";

const numberFromEnv = (defaultValue: number) =>
	z.preprocess((value: unknown) => {
		if (typeof value === "string" && value.trim() !== "") {
			const parsed = Number(value);
			return Number.isFinite(parsed) ? parsed : value;
		}
		return value ?? defaultValue;
	}, z.number().default(defaultValue));

const booleanFromEnv = (defaultValue: boolean) =>
	z.preprocess((value: unknown) => {
		if (typeof value === "string" && value.trim() !== "") {
			return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
		}
		return value ?? defaultValue;
	}, z.boolean().default(defaultValue));

const envSchema = z.object({
	NODE_ENV: z
		.enum(["development", "test", "production"])
		.default("development"),
	PORT: numberFromEnv(3000),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.optional(),
	RPC_URL: z.string().url().default("https://testnet-rpc.daodiseo.chaintools.tech"),
	API_URL: z.string().url().default("https://testnet-api.daodiseo.chaintools.tech"),
	CHAIN_ID: z.string().default("ithaca-1"),
	STAKING_DENOM: z.string().default("uodis"),
	DENOM_DECIMALS: numberFromEnv(6).pipe(z.number().int().min(0).max(36)),
	PRICE_API_BASE: z.string().url().default("https://api.coingecko.com/api/v3"),
	PRICE_API_KEY: z.string().optional().default(""),
	TOKEN_PRICE_ID: z.string().default("odiseo"),
	ASSET_REGISTRY_URL: z
		.string()
		.url()
		.default("http://localhost:5000/api/assets"),
	AI_API_URL: z.string().url().default("https://api.openai.com/v1/completions"),
	AI_MODEL: z.string().default("gpt-3.5-turbo-instruct"),
	OPENAI_API_KEY: z.string().optional().default(""),
	UPSTREAM_TIMEOUT_MS: numberFromEnv(5_000),
	AI_TIMEOUT_MS: numberFromEnv(30_000),
	RETRY_MAX_ATTEMPTS: numberFromEnv(3),
	RETRY_BACKOFF_BASE_MS: numberFromEnv(250),
	RETRY_MAX_DELAY_MS: numberFromEnv(2_000),
	FALLBACK_WINDOW_MS: numberFromEnv(10 * 60 * 1000),
	TTL_NETWORK_MS: numberFromEnv(30_000),
	TTL_TOKEN_MS: numberFromEnv(15_000),
	TTL_STAKING_MS: numberFromEnv(30_000),
	TTL_ASSETS_MS: numberFromEnv(60_000),
	WARMUP_ENABLED: booleanFromEnv(true),
	HISTORY_DB_PATH: z.string().optional().default(""),
	HISTORY_SNAPSHOT_MS: numberFromEnv(5 * 60 * 1000),
	ALLOWED_ORIGINS: z.string().optional().default(""),
	RATE_LIMIT_WINDOW_MS: numberFromEnv(60_000),
	RATE_LIMIT_MAX: numberFromEnv(120),
	CACHE_CONTROL: z
		.string()
		.optional()
		.default("public, max-age=15, stale-while-revalidate=60"),
	SENTRY_DSN: z.string().optional().default(""),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse({
	NODE_ENV: process.env.NODE_ENV,
	PORT: process.env.PORT,
	LOG_LEVEL: process.env.LOG_LEVEL,
	RPC_URL: process.env.RPC_URL,
	API_URL: process.env.API_URL,
	CHAIN_ID: process.env.CHAIN_ID,
	STAKING_DENOM: process.env.STAKING_DENOM,
	DENOM_DECIMALS: process.env.DENOM_DECIMALS,
	PRICE_API_BASE: process.env.PRICE_API_BASE,
	PRICE_API_KEY: process.env.PRICE_API_KEY,
	TOKEN_PRICE_ID: process.env.TOKEN_PRICE_ID,
	ASSET_REGISTRY_URL: process.env.ASSET_REGISTRY_URL,
	AI_API_URL: process.env.AI_API_URL,
	AI_MODEL: process.env.AI_MODEL,
	OPENAI_API_KEY: process.env.OPENAI_API_KEY,
	UPSTREAM_TIMEOUT_MS: process.env.UPSTREAM_TIMEOUT_MS,
	AI_TIMEOUT_MS: process.env.AI_TIMEOUT_MS,
	RETRY_MAX_ATTEMPTS: process.env.RETRY_MAX_ATTEMPTS,
	RETRY_BACKOFF_BASE_MS: process.env.RETRY_BACKOFF_BASE_MS,
	RETRY_MAX_DELAY_MS: process.env.RETRY_MAX_DELAY_MS,
	FALLBACK_WINDOW_MS: process.env.FALLBACK_WINDOW_MS,
	TTL_NETWORK_MS: process.env.TTL_NETWORK_MS,
	TTL_TOKEN_MS: process.env.TTL_TOKEN_MS,
	TTL_STAKING_MS: process.env.TTL_STAKING_MS,
	TTL_ASSETS_MS: process.env.TTL_ASSETS_MS,
	WARMUP_ENABLED: process.env.WARMUP_ENABLED,
	HISTORY_DB_PATH: process.env.HISTORY_DB_PATH,
	HISTORY_SNAPSHOT_MS: process.env.HISTORY_SNAPSHOT_MS,
	ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
	RATE_LIMIT_WINDOW_MS: process.env.RATE_LIMIT_WINDOW_MS,
	RATE_LIMIT_MAX: process.env.RATE_LIMIT_MAX,
	CACHE_CONTROL: process.env.CACHE_CONTROL,
	SENTRY_DSN: process.env.SENTRY_DSN,
});
