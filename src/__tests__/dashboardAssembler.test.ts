import { describe, expect, it } from "vitest";

import { CATEGORY_DEFAULTS, CATEGORY_FIELDS } from "../config/categories";
import { logger } from "../lib/logger";
import { createCacheLayer } from "../services/cacheLayer";
import {
	UnknownCategoryError,
	createDashboardAssembler,
	parseCategories,
	toDashboardCategory,
} from "../services/dashboardAssembler";
import { defaultRecord, freezeRecord } from "../services/metricsAggregator";
import type { MetricCategory, MetricRecord } from "../types";

const FETCHED_AT = "2026-03-01T12:00:00.000Z";

describe("parseCategories", () => {
	it("defaults to every category", () => {
		expect(parseCategories(undefined)).toEqual([
			"network",
			"token",
			"staking",
			"assets",
			"bim_analysis",
		]);
		expect(parseCategories("")).toHaveLength(5);
	});

	it("splits, trims and dedupes a comma separated list", () => {
		expect(parseCategories(" Token,network,token ")).toEqual(["token", "network"]);
		expect(parseCategories(["staking", "assets,staking"])).toEqual(["staking", "assets"]);
	});

	it("rejects unknown names", () => {
		expect(() => parseCategories("network,weather")).toThrow(UnknownCategoryError);
		expect(() => parseCategories("weather")).toThrow("Unknown metric categories: weather");
	});
});

describe("toDashboardCategory", () => {
	it("fills canonical keys the record lacks from defaults", () => {
		const record = freezeRecord({
			category: "staking",
			fields: { apy: 12, bonded_tokens: 10 },
			freshness: {
				apy: { source: "live", observed_at: FETCHED_AT },
				bonded_tokens: { source: "live", observed_at: FETCHED_AT },
			},
			fetched_at: FETCHED_AT,
			source: "live",
			stale: false,
		});

		const flattened = toDashboardCategory(record);

		expect(Object.keys(flattened)).toEqual([
			...CATEGORY_FIELDS.staking,
			"fetched_at",
			"source",
			"stale",
			"freshness",
		]);
		expect(flattened.apy).toBe(12);
		expect(flattened.active_validators).toBe(15);
		expect(flattened.freshness.active_validators).toEqual({
			source: "default",
			observed_at: null,
		});
		expect(flattened.source).toBe("live");
	});
});

describe("createDashboardAssembler", () => {
	const refresh = async (category: MetricCategory): Promise<MetricRecord> =>
		defaultRecord(category, CATEGORY_DEFAULTS[category], FETCHED_AT);
	const assembler = createDashboardAssembler(
		createCacheLayer({
			refresh,
			ttlMs: { network: 1, token: 1, staking: 1, assets: 1, bim_analysis: 1 },
			logger,
			now: () => 0,
		})
	);

	it("returns exactly the requested categories", async () => {
		const payload = await assembler.assemble(["token", "assets", "token"]);

		expect(Object.keys(payload)).toEqual(["token", "assets"]);
		expect(payload.token?.price_usd).toBe(0.000125);
		expect(payload.token?.stale).toBe(true);
		expect(payload.assets?.hot_asset).toBeNull();
		expect(payload.assets?.source).toBe("default");
	});

	it("returns one flattened category", async () => {
		const network = await assembler.category("network");

		expect(network.health_score).toBe(50);
		expect(network.fetched_at).toBe(FETCHED_AT);
	});
});
