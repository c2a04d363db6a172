import type { ServiceConfig } from "../bootstrap";
import { env } from "../config/env";
import type { UpstreamClient, UpstreamRequest } from "../services/upstreamClient";
import {
	failure,
	success,
	type UpstreamFailureKind,
	type UpstreamResult,
} from "../types";

export type FakeResponse =
	| { data: unknown }
	| { fail: UpstreamFailureKind; message?: string };

export type FakeRoute = FakeResponse | ((request: UpstreamRequest<unknown>) => FakeResponse);

/**
 * In-process upstream keyed by request path. Responses go through the
 * request's schema the same way the HTTP client validates them.
 */
export function createFakeClient(
	name: string,
	routes: Record<string, FakeRoute>
): UpstreamClient & { calls: UpstreamRequest<unknown>[] } {
	const calls: UpstreamRequest<unknown>[] = [];

	const fetch = async <T>(request: UpstreamRequest<T>): Promise<UpstreamResult<T>> => {
		calls.push(request);
		const route = routes[request.path];
		if (route === undefined) {
			return failure("unreachable", `${name} has no route for ${request.path}`);
		}
		const response = typeof route === "function" ? route(request) : route;
		if ("fail" in response) {
			return failure(response.fail, response.message ?? `${name} ${response.fail}`);
		}
		const parsed = request.schema.safeParse(response.data);
		return parsed.success
			? success(parsed.data)
			: failure("malformed_response", `${name} response failed validation`);
	};

	return { name, fetch, calls };
}

export const fixedClock = (start: number) => {
	let current = start;
	return {
		now: () => current,
		advance: (ms: number) => {
			current += ms;
		},
		set: (ms: number) => {
			current = ms;
		},
	};
};

export const noSleep = async (_ms: number): Promise<void> => undefined;

export const testConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
	...env,
	HISTORY_DB_PATH: ":memory:",
	...overrides,
});

export const RPC_STATUS = {
	result: {
		node_info: { network: "ithaca-1", moniker: "validator-a", version: "0.38.12" },
		sync_info: {
			latest_block_height: "100",
			latest_block_time: "2026-03-01T11:59:55Z",
			catching_up: false,
		},
	},
};

export const RPC_NET_INFO = { result: { n_peers: "5" } };

export const RPC_VALIDATORS = {
	result: {
		validators: Array.from({ length: 10 }, () => ({ voting_power: "100" })),
		total: "10",
	},
};
