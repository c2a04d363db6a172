import { z } from "zod";

import { nonNegative } from "../lib/schema";
import { failure, type MetricFields, type MetricValue, type UpstreamResult } from "../types";
import { round2 } from "./derivations";
import type { UpstreamClient } from "./upstreamClient";

const ASSET_STATUSES = ["active", "pipeline", "completed"] as const;

type AssetStatus = (typeof ASSET_STATUSES)[number];

// Older registry exports label live listings "tokenized" and queued ones "pending".
const STATUS_ALIASES: Partial<Record<string, AssetStatus>> = {
	tokenized: "active",
	pending: "pipeline",
};

export const MAX_ROI_PERCENTAGE = 100;

const assetSchema = z.object({
	id: z.union([z.string(), z.number()]).transform(String),
	name: z.string(),
	location: z.string().optional().default(""),
	asset_type: z.string().optional().default("Unknown"),
	status: z
		.string()
		.transform((value) => value.trim().toLowerCase())
		.transform((value) => STATUS_ALIASES[value] ?? value)
		.pipe(z.enum(ASSET_STATUSES)),
	verified: z.boolean().optional().default(false),
	valuation_usd: nonNegative,
	roi_percentage: nonNegative.optional().default(0),
	funded_amount: nonNegative.optional().default(0),
	target_amount: nonNegative.optional().default(0),
});

// Rows are checked one by one so a single bad listing does not discard the registry.
const registrySchema = z.object({
	assets: z.array(z.unknown()),
});

export type RegistryAsset = z.infer<typeof assetSchema>;

export interface ParsedRegistry {
	assets: RegistryAsset[];
	rejected: number;
}

export function parseRegistryAssets(rows: readonly unknown[]): ParsedRegistry {
	const assets: RegistryAsset[] = [];
	for (const row of rows) {
		const parsed = assetSchema.safeParse(row);
		if (parsed.success) {
			assets.push(parsed.data);
		}
	}
	return { assets, rejected: rows.length - assets.length };
}

export interface AssetSummary {
	total_value_locked: number;
	assets_in_pipeline: number;
	pipeline_value: number;
	active_properties: number;
	completed_tokenizations: number;
	verified_value: number;
	unverified_value: number;
	hot_asset: { [key: string]: MetricValue } | null;
}

const fundedPercentage = (asset: RegistryAsset): number =>
	asset.target_amount > 0
		? round2((asset.funded_amount / asset.target_amount) * 100)
		: 0;

// Highest in-range ROI among active properties; the first listed wins a tie.
export const pickHotAsset = (assets: RegistryAsset[]): RegistryAsset | null =>
	assets
		.filter(
			(asset) => asset.status === "active" && asset.roi_percentage <= MAX_ROI_PERCENTAGE
		)
		.reduce<RegistryAsset | null>(
			(best, asset) =>
				best === null || asset.roi_percentage > best.roi_percentage ? asset : best,
			null
		);

export function summarizeAssets(assets: RegistryAsset[]): AssetSummary {
	const sumValuation = (items: RegistryAsset[]) =>
		items.reduce((sum, asset) => sum + asset.valuation_usd, 0);

	const active = assets.filter((asset) => asset.status === "active");
	const pipeline = assets.filter((asset) => asset.status === "pipeline");
	const completed = assets.filter((asset) => asset.status === "completed");
	const tokenized = [...active, ...completed];
	const hot = pickHotAsset(assets);

	return {
		total_value_locked: sumValuation(tokenized),
		assets_in_pipeline: pipeline.length,
		pipeline_value: sumValuation(pipeline),
		active_properties: active.length,
		completed_tokenizations: completed.length,
		verified_value: sumValuation(tokenized.filter((asset) => asset.verified)),
		unverified_value: sumValuation(tokenized.filter((asset) => !asset.verified)),
		hot_asset: hot
			? {
				id: hot.id,
				name: hot.name,
				location: hot.location,
				asset_type: hot.asset_type,
				roi_percentage: hot.roi_percentage,
				funded_amount: hot.funded_amount,
				target_amount: hot.target_amount,
				funded_percentage: fundedPercentage(hot),
			}
			: null,
	};
}

export function createAssetSource(
	client: UpstreamClient
): () => Promise<UpstreamResult<MetricFields>> {
	return async () => {
		const result = await client.fetch({ path: "", schema: registrySchema });
		if (!result.ok) {
			return result;
		}
		const { assets, rejected } = parseRegistryAssets(result.value.assets);
		if (assets.length === 0 && rejected > 0) {
			return failure(
				"malformed_response",
				`asset registry returned ${rejected} rows and none were valid`
			);
		}
		const summary: MetricFields = { ...summarizeAssets(assets) };
		return { ok: true, value: summary };
	};
}
