import { CATEGORY_DEFAULTS, categoryTtls } from "./config/categories";
import type { Env } from "./config/env";
import type { Logger } from "./lib/logger";
import { createAssetSource } from "./services/assetService";
import {
	createAnalysisStore,
	createBimAnalysisService,
	type BimAnalysisService,
} from "./services/bimAnalysisService";
import { createCacheLayer, type CacheLayer } from "./services/cacheLayer";
import { createChainSources } from "./services/chainService";
import {
	createDashboardAssembler,
	type DashboardAssembler,
} from "./services/dashboardAssembler";
import {
	ASSETS_DERIVED,
	NETWORK_DERIVED,
	STAKING_DERIVED,
	TOKEN_DERIVED,
} from "./services/derivations";
import { createHistoryStore, type HistoryStore } from "./services/historyStore";
import {
	createMetricsAggregator,
	type CategoryDefinitions,
} from "./services/metricsAggregator";
import { createPriceSource } from "./services/priceService";
import type { RetryOptions } from "./services/retryPolicy";
import {
	createHttpUpstreamClient,
	type UpstreamClient,
} from "./services/upstreamClient";

export interface UpstreamClients {
	rpc: UpstreamClient;
	rest: UpstreamClient;
	price: UpstreamClient;
	assets: UpstreamClient;
	ai: UpstreamClient;
}

export interface Services {
	cache: CacheLayer;
	assembler: DashboardAssembler;
	bim: BimAnalysisService;
	history: HistoryStore;
	logger: Logger;
}

export interface ServiceOverrides {
	clients?: Partial<UpstreamClients>;
	retry?: Partial<RetryOptions>;
	now?: () => number;
}

export type ServiceConfig = Omit<Env, "NODE_ENV" | "PORT" | "LOG_LEVEL">;

export function createUpstreamClients(config: ServiceConfig): UpstreamClients {
	const timeoutMs = config.UPSTREAM_TIMEOUT_MS;
	return {
		rpc: createHttpUpstreamClient({ name: "rpc", baseUrl: config.RPC_URL, timeoutMs }),
		rest: createHttpUpstreamClient({ name: "rest", baseUrl: config.API_URL, timeoutMs }),
		price: createHttpUpstreamClient({
			name: "price",
			baseUrl: config.PRICE_API_BASE,
			timeoutMs,
		}),
		assets: createHttpUpstreamClient({
			name: "assets",
			baseUrl: config.ASSET_REGISTRY_URL,
			timeoutMs,
		}),
		ai: createHttpUpstreamClient({
			name: "ai",
			baseUrl: config.AI_API_URL,
			timeoutMs: config.AI_TIMEOUT_MS,
			headers: config.OPENAI_API_KEY
				? { Authorization: `Bearer ${config.OPENAI_API_KEY}` }
				: {},
		}),
	};
}

/** Wires each category to the upstream sources that fill its fields. */
export function createCategoryDefinitions(
	clients: UpstreamClients,
	config: ServiceConfig,
	bim: Pick<BimAnalysisService, "fetchLatest">
): CategoryDefinitions {
	const chain = createChainSources({
		rpc: clients.rpc,
		rest: clients.rest,
		chainId: config.CHAIN_ID,
		denom: config.STAKING_DENOM,
		decimals: config.DENOM_DECIMALS,
	});
	return {
		network: {
			sources: [
				{
					name: "rpc.status",
					fields: [
						"block_height",
						"latest_block_time",
						"chain_id",
						"catching_up",
						"moniker",
						"node_version",
					],
					fetch: chain.fetchStatus,
				},
				{ name: "rpc.net_info", fields: ["peer_count"], fetch: chain.fetchNetInfo },
				{
					name: "rpc.validators",
					fields: ["validator_count", "total_voting_power"],
					fetch: chain.fetchValidators,
				},
			],
			defaults: CATEGORY_DEFAULTS.network,
			derived: NETWORK_DERIVED,
		},
		token: {
			sources: [
				{
					name: "price",
					fields: ["price_usd", "price_change_24h", "market_cap", "volume_24h"],
					fetch: createPriceSource({
						client: clients.price,
						coingeckoId: config.TOKEN_PRICE_ID,
						apiKey: config.PRICE_API_KEY || undefined,
					}),
				},
				{ name: "rest.supply", fields: ["total_supply"], fetch: chain.fetchSupply },
			],
			defaults: CATEGORY_DEFAULTS.token,
			derived: TOKEN_DERIVED,
		},
		staking: {
			sources: [
				{
					name: "rest.staking_pool",
					fields: ["bonded_tokens", "not_bonded_tokens"],
					fetch: chain.fetchStakingPool,
				},
				{
					name: "rest.bonded_validators",
					fields: ["active_validators", "avg_commission_rate"],
					fetch: chain.fetchBondedValidators,
				},
			],
			defaults: CATEGORY_DEFAULTS.staking,
			derived: STAKING_DERIVED,
		},
		assets: {
			sources: [
				{
					name: "asset_registry",
					fields: [
						"total_value_locked",
						"assets_in_pipeline",
						"pipeline_value",
						"active_properties",
						"completed_tokenizations",
						"verified_value",
						"unverified_value",
						"hot_asset",
					],
					fetch: createAssetSource(clients.assets),
				},
			],
			defaults: CATEGORY_DEFAULTS.assets,
			derived: ASSETS_DERIVED,
		},
		bim_analysis: {
			sources: [
				{
					name: "analysis_store",
					fields: Object.keys(CATEGORY_DEFAULTS.bim_analysis),
					fetch: bim.fetchLatest,
					maxAttempts: 1,
				},
			],
			defaults: CATEGORY_DEFAULTS.bim_analysis,
		},
	};
}

export function createServices(
	config: ServiceConfig,
	logger: Logger,
	overrides: ServiceOverrides = {}
): Services {
	const clients: UpstreamClients = {
		...createUpstreamClients(config),
		...overrides.clients,
	};
	const retry: RetryOptions = {
		maxAttempts: config.RETRY_MAX_ATTEMPTS,
		backoffBaseMs: config.RETRY_BACKOFF_BASE_MS,
		maxDelayMs: config.RETRY_MAX_DELAY_MS,
		...overrides.retry,
	};

	const bim = createBimAnalysisService({
		ai: clients.ai,
		model: config.AI_MODEL,
		store: createAnalysisStore(),
		retry,
		timeoutMs: config.AI_TIMEOUT_MS,
		now: overrides.now,
	});

	const definitions = createCategoryDefinitions(clients, config, bim);

	const aggregator = createMetricsAggregator({
		definitions,
		retry,
		fallbackWindowMs: config.FALLBACK_WINDOW_MS,
		logger,
		now: overrides.now,
	});
	const history = createHistoryStore({
		path: config.HISTORY_DB_PATH,
		snapshotIntervalMs: config.HISTORY_SNAPSHOT_MS,
		now: overrides.now,
	});
	const cache = createCacheLayer({
		refresh: aggregator.refresh,
		ttlMs: categoryTtls(config),
		logger,
		now: overrides.now,
		onRecord: (record) => {
			history.record(record);
		},
	});

	return {
		cache,
		assembler: createDashboardAssembler(cache),
		bim,
		history,
		logger,
	};
}
