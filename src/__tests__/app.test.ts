import type { Server } from "node:http";

import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";

import { createApp } from "../app";
import { createServices, type Services } from "../bootstrap";
import { logger } from "../lib/logger";
import {
	RPC_NET_INFO,
	RPC_STATUS,
	RPC_VALIDATORS,
	createFakeClient,
	testConfig,
} from "./helpers";

const ANALYSIS_TEXT = [
	"Quality Score: 7",
	"ROI Potential: 9.5",
	"Confidence: 0.7",
	"Investment Grade: B",
	"Recommendation: HOLD",
	"Key Insights:",
	"- Envelope fully modelled",
	"Critical Issues:",
	"- No HVAC equipment",
].join("\n");

const config = testConfig();

let server: Server;
let services: Services;
let baseUrl: string;

const get = (path: string) => fetch(`${baseUrl}${path}`);

const readBody = async (response: Response): Promise<Record<string, unknown>> =>
	z.record(z.unknown()).parse(await response.json());

const post = (path: string, body: string) =>
	fetch(`${baseUrl}${path}`, {
		method: "POST",
		headers: { "Content-Type": "application/json" },
		body,
	});

beforeAll(async () => {
	services = createServices(config, logger, {
		retry: { backoffBaseMs: 0, maxDelayMs: 0 },
		clients: {
			rpc: createFakeClient("rpc", {
				"/status": { data: RPC_STATUS },
				"/net_info": { data: RPC_NET_INFO },
				"/validators": { data: RPC_VALIDATORS },
			}),
			rest: createFakeClient("rest", {
				"/cosmos/staking/v1beta1/pool": {
					data: { pool: { bonded_tokens: "3000000", not_bonded_tokens: "1000000" } },
				},
				"/cosmos/staking/v1beta1/validators": {
					data: {
						validators: [{ commission: { commission_rates: { rate: "0.1" } } }],
						pagination: { total: "1" },
					},
				},
				"/cosmos/bank/v1beta1/supply/by_denom": {
					data: { amount: { denom: "uodis", amount: "1000000000000" } },
				},
			}),
			price: createFakeClient("price", {
				"/simple/price": {
					data: {
						odiseo: {
							usd: 0.0002,
							usd_24h_change: 3,
							usd_market_cap: 1_000_000,
							usd_24h_vol: 30_000,
						},
					},
				},
			}),
			assets: createFakeClient("assets", {}),
			ai: createFakeClient("ai", {
				"": (request) =>
					JSON.stringify(request.body).includes("Broken Tower")
						? { fail: "unreachable" }
						: { data: { text: ANALYSIS_TEXT } },
			}),
		},
	});
	const app = createApp(services, config);
	server = app.listen(0);
	await new Promise<void>((resolve) => {
		server.once("listening", resolve);
	});
	const address = server.address();
	const port = typeof address === "object" && address !== null ? address.port : 0;
	baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
	await new Promise<void>((resolve, reject) => {
		server.close((error) => (error ? reject(error) : resolve()));
	});
	services.history.close();
});

describe("HTTP API", () => {
	it("reports health", async () => {
		const response = await get("/health");
		const body = await readBody(response);

		expect(response.status).toBe(200);
		expect(body.status).toBe("ok");
	});

	it("serves the requested dashboard categories", async () => {
		const response = await get("/api/dashboard?categories=network,staking");
		const body = await readBody(response);

		expect(response.status).toBe(200);
		expect(response.headers.get("cache-control")).toBe(config.CACHE_CONTROL);
		expect(Object.keys(body)).toEqual(["network", "staking"]);
		expect(body.network).toMatchObject({ health_score: 95, source: "live", stale: false });
		expect(body.staking).toMatchObject({
			bonded_tokens: 3,
			not_bonded_tokens: 1,
			active_validators: 1,
			total_staked: 3,
			bonded_ratio: 75,
			avg_commission: 10,
			apy: 11.25,
			source: "live",
		});
	});

	it("serves every category with defaults for a failing upstream", async () => {
		const response = await get("/api/dashboard");
		const body = await readBody(response);

		expect(Object.keys(body)).toEqual(["network", "token", "staking", "assets", "bim_analysis"]);
		expect(body.token).toMatchObject({ fully_diluted_valuation: 200, trend: "up", source: "live" });
		expect(body.assets).toMatchObject({ source: "default", stale: true, total_value_locked: 0 });
		expect(body.bim_analysis).toMatchObject({ model_id: null });
	});

	it("rejects unknown dashboard categories", async () => {
		const response = await get("/api/dashboard?categories=network,weather");

		expect(response.status).toBe(400);
		expect(await readBody(response)).toEqual({
			error: "Unknown metric categories: weather",
			categories: ["weather"],
		});
	});

	it("returns 404 for an unknown single category", async () => {
		const response = await get("/api/dashboard/weather");

		expect(response.status).toBe(404);
	});

	it("validates the building model summary", async () => {
		const response = await post("/api/bim-analysis", JSON.stringify({ model_id: "" }));
		const body = await readBody(response);

		expect(response.status).toBe(400);
		expect(body.error).toBe("Invalid building model summary");
	});

	it("answers malformed JSON with 400", async () => {
		const response = await post("/api/bim-analysis", "{not json");

		expect(response.status).toBe(400);
	});

	it("analyses a model and refreshes the analysis category", async () => {
		const response = await post(
			"/api/bim-analysis",
			JSON.stringify({
				model_id: "tower-a",
				project_name: "Harbour Tower",
				element_summary: { IfcWall: 200, IfcSlab: 50 },
			})
		);
		const analysis = await readBody(response);

		expect(response.status).toBe(200);
		expect(analysis).toMatchObject({
			total_elements: 250,
			completeness_score: 0.25,
			risk_level: "Medium",
			critical_issues: ["No HVAC equipment"],
		});

		const category = await readBody(await get("/api/dashboard/bim_analysis"));
		expect(category).toMatchObject({ model_id: "tower-a", recommendation: "HOLD", source: "live" });

		const stored = await get("/api/bim-analysis/tower-a");
		expect(stored.status).toBe(200);
		expect(await readBody(stored)).toMatchObject({ project_name: "Harbour Tower" });
	});

	it("reports an AI failure as a bad gateway", async () => {
		const response = await post(
			"/api/bim-analysis",
			JSON.stringify({
				model_id: "tower-b",
				project_name: "Broken Tower",
				element_summary: { IfcWall: 1 },
			})
		);

		expect(response.status).toBe(502);
		expect(await readBody(response)).toEqual({ error: "BIM analysis failed", kind: "unreachable" });
		expect((await get("/api/bim-analysis/tower-b")).status).toBe(404);
	});

	it("serves recorded history", async () => {
		const response = await get("/api/history/network?hours=1");
		const body = await readBody(response);

		expect(response.status).toBe(200);
		expect(body).toMatchObject({
			category: "network",
			points: [{ values: { block_height: 100, peer_count: 5, health_score: 95 } }],
		});
		expect((await get("/api/history/weather")).status).toBe(404);
	});

	it("reports cache status", async () => {
		const response = await get("/api/cache/status");
		const body = await readBody(response);

		expect(response.headers.get("cache-control")).toBe("no-store");
		expect(body.categories).toHaveLength(5);
		expect(body.categories).toMatchObject([
			{ category: "network", cached: true },
			{ category: "token", cached: true },
			{ category: "staking", cached: true },
			{ category: "assets", cached: true, source: "default" },
			{ category: "bim_analysis", cached: true, expires_at: null },
		]);
	});
});
