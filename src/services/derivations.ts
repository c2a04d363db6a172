import type { MetricFields, MetricValue } from "../types";

export const asNumber = (value: MetricValue | undefined): number =>
	typeof value === "number" && Number.isFinite(value) ? value : 0;

export const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Coarse network health heuristic kept for dashboard compatibility. It is a
 * clamped linear placeholder, not a validated model.
 */
export const healthScore = (validatorCount: number, peerCount: number): number =>
	Math.min(95, Math.max(50, validatorCount * 10 + peerCount * 2));

export const networkStatus = (catchingUp: boolean): "syncing" | "healthy" =>
	catchingUp ? "syncing" : "healthy";

export const priceTrend = (changePct: number): "up" | "down" | "stable" => {
	if (changePct > 0) return "up";
	if (changePct < 0) return "down";
	return "stable";
};

export const priceVolatility = (
	priceUsd: number,
	changePct: number
): "unknown" | "low" | "medium" | "high" => {
	if (priceUsd <= 0) {
		return "unknown";
	}
	const magnitude = Math.abs(changePct);
	if (magnitude < 2) return "low";
	if (magnitude < 5) return "medium";
	return "high";
};

export const liquidityScore = (volume24h: number, marketCap: number): number => {
	if (marketCap <= 0) {
		return 0;
	}
	const ratio = volume24h / marketCap;
	if (ratio > 0.1) return 10;
	if (ratio > 0.05) return 8;
	if (ratio > 0.02) return 6;
	if (ratio > 0.01) return 4;
	return 2;
};

// Staking yield estimate from the average validator commission.
export const estimatedApy = (avgCommissionRate: number): number =>
	round2((1 - avgCommissionRate) * 12.5);

export const ratioPercent = (part: number, other: number): number => {
	const total = part + other;
	return total > 0 ? round2((part / total) * 100) : 0;
};

export interface DerivedField {
	field: string;
	inputs: readonly string[];
	compute: (fields: MetricFields) => MetricValue;
}

export const NETWORK_DERIVED: readonly DerivedField[] = [
	{
		field: "health_score",
		inputs: ["validator_count", "peer_count"],
		compute: (fields) =>
			healthScore(asNumber(fields.validator_count), asNumber(fields.peer_count)),
	},
	{
		field: "status",
		inputs: ["catching_up"],
		compute: (fields) => networkStatus(fields.catching_up === true),
	},
];

export const TOKEN_DERIVED: readonly DerivedField[] = [
	{
		field: "trend",
		inputs: ["price_change_24h"],
		compute: (fields) => priceTrend(asNumber(fields.price_change_24h)),
	},
	{
		field: "volatility",
		inputs: ["price_usd", "price_change_24h"],
		compute: (fields) =>
			priceVolatility(asNumber(fields.price_usd), asNumber(fields.price_change_24h)),
	},
	{
		field: "liquidity_score",
		inputs: ["volume_24h", "market_cap"],
		compute: (fields) =>
			liquidityScore(asNumber(fields.volume_24h), asNumber(fields.market_cap)),
	},
	{
		field: "is_bullish",
		inputs: ["price_change_24h"],
		compute: (fields) => asNumber(fields.price_change_24h) > 2,
	},
	{
		field: "fully_diluted_valuation",
		inputs: ["price_usd", "total_supply"],
		compute: (fields) => asNumber(fields.price_usd) * asNumber(fields.total_supply),
	},
];

export const STAKING_DERIVED: readonly DerivedField[] = [
	{
		field: "total_staked",
		inputs: ["bonded_tokens"],
		compute: (fields) => asNumber(fields.bonded_tokens),
	},
	{
		field: "bonded_ratio",
		inputs: ["bonded_tokens", "not_bonded_tokens"],
		compute: (fields) =>
			ratioPercent(asNumber(fields.bonded_tokens), asNumber(fields.not_bonded_tokens)),
	},
	{
		field: "avg_commission",
		inputs: ["avg_commission_rate"],
		compute: (fields) => round2(asNumber(fields.avg_commission_rate) * 100),
	},
	{
		field: "apy",
		inputs: ["avg_commission_rate"],
		compute: (fields) => estimatedApy(asNumber(fields.avg_commission_rate)),
	},
];

export const ASSETS_DERIVED: readonly DerivedField[] = [
	{
		field: "verified_percentage",
		inputs: ["verified_value", "unverified_value"],
		compute: (fields) =>
			ratioPercent(asNumber(fields.verified_value), asNumber(fields.unverified_value)),
	},
];
