import type { Env } from "./env";
import type { MetricCategory, MetricFields } from "../types";

/**
 * Static values served when neither a live call nor an eligible cached value
 * is available. Key order is the order the dashboard payload uses.
 */
export const CATEGORY_DEFAULTS: Record<MetricCategory, MetricFields> = {
	network: {
		block_height: 0,
		latest_block_time: null,
		chain_id: "ithaca-1",
		catching_up: true,
		moniker: "unknown",
		node_version: "unknown",
		peer_count: 0,
		validator_count: 0,
		total_voting_power: 0,
		health_score: 50,
		status: "syncing",
	},
	token: {
		price_usd: 0.000125,
		price_change_24h: 0,
		market_cap: 1_250_000,
		volume_24h: 45_000,
		total_supply: 0,
		trend: "stable",
		volatility: "unknown",
		liquidity_score: 0,
		is_bullish: false,
		fully_diluted_valuation: 0,
	},
	staking: {
		bonded_tokens: 0,
		not_bonded_tokens: 0,
		active_validators: 15,
		avg_commission_rate: 0.05,
		total_staked: 0,
		bonded_ratio: 0,
		avg_commission: 5,
		apy: 11.25,
	},
	assets: {
		total_value_locked: 0,
		assets_in_pipeline: 0,
		pipeline_value: 0,
		active_properties: 0,
		completed_tokenizations: 0,
		verified_value: 0,
		unverified_value: 0,
		hot_asset: null,
		verified_percentage: 0,
	},
	bim_analysis: {
		model_id: null,
		project_name: null,
		total_elements: 0,
		completeness_score: 0,
		quality_score: null,
		roi_potential: null,
		confidence_score: null,
		recommendation: null,
		investment_grade: null,
		risk_level: null,
		key_insights: [],
		critical_issues: [],
		analyzed_at: null,
	},
};

export const CATEGORY_FIELDS: Record<MetricCategory, readonly string[]> = {
	network: Object.keys(CATEGORY_DEFAULTS.network),
	token: Object.keys(CATEGORY_DEFAULTS.token),
	staking: Object.keys(CATEGORY_DEFAULTS.staking),
	assets: Object.keys(CATEGORY_DEFAULTS.assets),
	bim_analysis: Object.keys(CATEGORY_DEFAULTS.bim_analysis),
};

// BIM analysis runs on demand, so its entry only expires through invalidation.
export const categoryTtls = (
	config: Pick<Env, "TTL_NETWORK_MS" | "TTL_TOKEN_MS" | "TTL_STAKING_MS" | "TTL_ASSETS_MS">
): Record<MetricCategory, number> => ({
	network: config.TTL_NETWORK_MS,
	token: config.TTL_TOKEN_MS,
	staking: config.TTL_STAKING_MS,
	assets: config.TTL_ASSETS_MS,
	bim_analysis: Number.POSITIVE_INFINITY,
});
