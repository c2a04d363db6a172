import { describe, expect, it } from "vitest";

import {
	createAssetSource,
	parseRegistryAssets,
	pickHotAsset,
	summarizeAssets,
	type RegistryAsset,
} from "../services/assetService";
import { createPriceSource } from "../services/priceService";
import { createFakeClient } from "./helpers";

describe("createPriceSource", () => {
	it("returns the quote for the configured token id", async () => {
		const client = createFakeClient("price", {
			"/simple/price": {
				data: {
					odiseo: {
						usd: 0.0002,
						usd_24h_change: 3.5,
						usd_market_cap: 2_000_000,
						usd_24h_vol: 150_000,
					},
				},
			},
		});
		const fetchPrice = createPriceSource({
			client,
			coingeckoId: "odiseo",
			apiKey: "test-secret",
		});

		const result = await fetchPrice();

		expect(result).toEqual({
			ok: true,
			value: {
				price_usd: 0.0002,
				price_change_24h: 3.5,
				market_cap: 2_000_000,
				volume_24h: 150_000,
			},
		});
		expect(client.calls[0]?.headers).toEqual({ "x-cg-demo-api-key": "test-secret" });
		expect(client.calls[0]?.query?.ids).toBe("odiseo");
	});

	it("defaults missing optional quote fields to zero", async () => {
		const client = createFakeClient("price", {
			"/simple/price": { data: { odiseo: { usd: "0.5", usd_24h_change: null } } },
		});

		const result = await createPriceSource({ client, coingeckoId: "odiseo" })();

		expect(result).toEqual({
			ok: true,
			value: { price_usd: 0.5, price_change_24h: 0, market_cap: 0, volume_24h: 0 },
		});
		expect(client.calls[0]?.headers).toEqual({});
	});

	it("treats a response without the token as malformed", async () => {
		const client = createFakeClient("price", {
			"/simple/price": { data: { bitcoin: { usd: 60_000 } } },
		});

		const result = await createPriceSource({ client, coingeckoId: "odiseo" })();

		expect(result).toEqual({
			ok: false,
			kind: "malformed_response",
			message: "price response missing quote for odiseo",
		});
	});

	it("rejects a negative price", async () => {
		const client = createFakeClient("price", {
			"/simple/price": { data: { odiseo: { usd: -1 } } },
		});

		const result = await createPriceSource({ client, coingeckoId: "odiseo" })();

		expect(result).toEqual({
			ok: false,
			kind: "malformed_response",
			message: "token price cannot be negative",
		});
	});
});

const registry = [
	{
		id: 1,
		name: "Harbour Lofts",
		location: "Lisbon",
		asset_type: "Residential",
		status: "active",
		verified: true,
		valuation_usd: 1_000_000,
		roi_percentage: 8,
		funded_amount: 250_000,
		target_amount: 1_000_000,
	},
	{
		id: "2",
		name: "Canal Offices",
		status: "active",
		verified: false,
		valuation_usd: "500000",
		roi_percentage: 12,
		funded_amount: 100_000,
		target_amount: 300_000,
	},
	{
		id: 3,
		name: "Riverside Plots",
		status: "pipeline",
		valuation_usd: 2_000_000,
	},
	{
		id: 4,
		name: "Old Mill",
		status: "completed",
		verified: true,
		valuation_usd: 750_000,
		roi_percentage: 20,
	},
];

describe("asset registry", () => {
	it("summarises tokenized value, pipeline and verification", async () => {
		const client = createFakeClient("assets", { "": { data: { assets: registry } } });

		const result = await createAssetSource(client)();

		expect(result).toEqual({
			ok: true,
			value: {
				total_value_locked: 2_250_000,
				assets_in_pipeline: 1,
				pipeline_value: 2_000_000,
				active_properties: 2,
				completed_tokenizations: 1,
				verified_value: 1_750_000,
				unverified_value: 500_000,
				hot_asset: {
					id: "2",
					name: "Canal Offices",
					location: "",
					asset_type: "Unknown",
					roi_percentage: 12,
					funded_amount: 100_000,
					target_amount: 300_000,
					funded_percentage: 33.33,
				},
			},
		});
	});

	it("picks the first active asset on an ROI tie and ignores completed ones", () => {
		const asset = (id: string, status: RegistryAsset["status"], roi: number): RegistryAsset => ({
			id,
			name: `Asset ${id}`,
			location: "",
			asset_type: "Unknown",
			status,
			verified: false,
			valuation_usd: 1,
			roi_percentage: roi,
			funded_amount: 0,
			target_amount: 0,
		});

		const hot = pickHotAsset([
			asset("a", "active", 12),
			asset("b", "active", 12),
			asset("c", "completed", 30),
		]);

		expect(hot?.id).toBe("a");
	});

	it("has no hot asset when nothing is active", () => {
		expect(summarizeAssets([]).hot_asset).toBeNull();
		expect(summarizeAssets([]).total_value_locked).toBe(0);
	});

	it("skips a bad row and keeps the rest of the registry live", async () => {
		const client = createFakeClient("assets", {
			"": {
				data: {
					assets: [
						{ id: 1, name: "Harbour Lofts", status: "active", valuation_usd: 1_000, roi_percentage: 12 },
						{ id: 2, name: "Ghost Tower", status: "demolished", valuation_usd: 9_000 },
						{ id: 3, name: "No Valuation", status: "active" },
					],
				},
			},
		});

		const result = await createAssetSource(client)();

		expect(result.ok).toBe(true);
		expect(result.ok && result.value.total_value_locked).toBe(1_000);
		expect(result.ok && result.value.active_properties).toBe(1);
	});

	it("counts an out-of-range ROI but never makes it the hot asset", async () => {
		const client = createFakeClient("assets", {
			"": {
				data: {
					assets: [
						{ id: 1, name: "Harbour Lofts", status: "active", valuation_usd: 1_000, roi_percentage: 12 },
						{ id: 2, name: "Typo Heights", status: "active", valuation_usd: 500, roi_percentage: 140 },
					],
				},
			},
		});

		const result = await createAssetSource(client)();

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.total_value_locked).toBe(1_500);
			expect(result.value.hot_asset).toMatchObject({ id: "1", roi_percentage: 12 });
		}
	});

	it("maps tokenized and pending statuses onto active and pipeline", () => {
		const { assets, rejected } = parseRegistryAssets([
			{ id: 1, name: "Harbour Lofts", status: "Tokenized", valuation_usd: 1_000 },
			{ id: 2, name: "Riverside Plots", status: "pending", valuation_usd: 2_000 },
		]);

		expect(rejected).toBe(0);
		expect(assets.map((asset) => asset.status)).toEqual(["active", "pipeline"]);
	});

	it("fails as malformed when no row is valid", async () => {
		const client = createFakeClient("assets", {
			"": { data: { assets: [{ id: 9, name: "Bad", status: "unknown", valuation_usd: 1 }] } },
		});

		expect(await createAssetSource(client)()).toEqual({
			ok: false,
			kind: "malformed_response",
			message: "asset registry returned 1 rows and none were valid",
		});
	});

	it("serves an empty registry as an empty summary", async () => {
		const client = createFakeClient("assets", { "": { data: { assets: [] } } });

		const result = await createAssetSource(client)();

		expect(result.ok && result.value.assets_in_pipeline).toBe(0);
	});
});
