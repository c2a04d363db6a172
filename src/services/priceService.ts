import { z } from "zod";

import { numeric } from "../lib/schema";
import { failure, type MetricFields, type UpstreamResult } from "../types";
import type { UpstreamClient } from "./upstreamClient";

const simplePriceSchema = z.record(
	z.object({
		usd: numeric,
		usd_24h_change: numeric.nullable().optional(),
		usd_market_cap: numeric.nullable().optional(),
		usd_24h_vol: numeric.nullable().optional(),
	})
);

export interface PriceSourceOptions {
	client: UpstreamClient;
	coingeckoId: string;
	apiKey?: string;
}

export function createPriceSource(
	options: PriceSourceOptions
): () => Promise<UpstreamResult<MetricFields>> {
	const headers: Record<string, string> = options.apiKey
		? { "x-cg-demo-api-key": options.apiKey }
		: {};

	return async () => {
		const result = await options.client.fetch({
			path: "/simple/price",
			query: {
				ids: options.coingeckoId,
				vs_currencies: "usd",
				include_24hr_change: true,
				include_market_cap: true,
				include_24hr_vol: true,
			},
			headers,
			schema: simplePriceSchema,
		});
		if (!result.ok) {
			return result;
		}

		const quote = result.value[options.coingeckoId];
		if (!quote) {
			return failure(
				"malformed_response",
				`price response missing quote for ${options.coingeckoId}`
			);
		}
		if (quote.usd < 0) {
			return failure("malformed_response", "token price cannot be negative");
		}

		return {
			ok: true,
			value: {
				price_usd: quote.usd,
				price_change_24h: quote.usd_24h_change ?? 0,
				market_cap: quote.usd_market_cap ?? 0,
				volume_24h: quote.usd_24h_vol ?? 0,
			},
		};
	};
}
