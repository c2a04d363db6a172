import axios, { type AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";

import { failure, success, type UpstreamResult } from "../types";

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 5_000;

export interface UpstreamRequest<T> {
	path: string;
	method?: "GET" | "POST";
	query?: Record<string, string | number | boolean>;
	body?: unknown;
	headers?: Record<string, string>;
	timeoutMs?: number;
	schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * One external data source. Implementations marshal the request, validate the
 * response against the request's schema and report every failure as a value.
 * They never retry.
 */
export interface UpstreamClient {
	readonly name: string;
	fetch<T>(request: UpstreamRequest<T>): Promise<UpstreamResult<T>>;
}

export interface HttpUpstreamClientOptions {
	name: string;
	baseUrl: string;
	timeoutMs?: number;
	headers?: Record<string, string>;
	http?: AxiosInstance;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

const joinUrl = (baseUrl: string, path: string): string => {
	if (!path) {
		return baseUrl;
	}
	return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
};

const describeIssues = (error: z.ZodError): string =>
	error.issues
		.slice(0, 3)
		.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
		.join("; ");

export function createHttpUpstreamClient(
	options: HttpUpstreamClientOptions
): UpstreamClient {
	const http = options.http ?? axios.create();
	const defaultTimeoutMs = options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;

	const fetch = async <T>(
		request: UpstreamRequest<T>
	): Promise<UpstreamResult<T>> => {
		const url = joinUrl(options.baseUrl, request.path);
		const label = `${options.name} ${request.method ?? "GET"} ${url}`;

		let status: number;
		let data: unknown;
		try {
			const response = await http.request({
				url,
				method: request.method ?? "GET",
				params: request.query,
				data: request.body,
				headers: {
					Accept: "application/json",
					...options.headers,
					...request.headers,
				},
				timeout: request.timeoutMs ?? defaultTimeoutMs,
				validateStatus: () => true,
			});
			status = response.status;
			data = response.data;
		} catch (error) {
			if (isAxiosError(error)) {
				if (error.code && TIMEOUT_CODES.has(error.code)) {
					return failure("timeout", `${label} timed out: ${error.message}`);
				}
				if (error.response) {
					status = error.response.status;
					data = error.response.data;
				} else {
					return failure("unreachable", `${label} unreachable: ${error.message}`);
				}
			} else {
				const message = error instanceof Error ? error.message : String(error);
				return failure("unreachable", `${label} failed: ${message}`);
			}
		}

		if (status === 429) {
			return failure("rate_limited", `${label} rate limited (429)`);
		}
		if (status >= 500) {
			return failure("unreachable", `${label} returned ${status}`);
		}
		if (status < 200 || status >= 300) {
			return failure("malformed_response", `${label} returned ${status}`);
		}

		const parsed = request.schema.safeParse(data);
		if (!parsed.success) {
			return failure(
				"malformed_response",
				`${label} response failed validation: ${describeIssues(parsed.error)}`
			);
		}
		return success(parsed.data);
	};

	return { name: options.name, fetch };
}
