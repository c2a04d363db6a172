import type { Logger } from "../lib/logger";
import type {
	FieldFreshness,
	FieldSource,
	MetricCategory,
	MetricFields,
	MetricRecord,
	MetricValue,
	UpstreamResult,
} from "../types";
import type { DerivedField } from "./derivations";
import { executeWithRetry, type RetryOptions } from "./retryPolicy";

export interface SourceDefinition {
	name: string;
	/** Base fields this source provides when it succeeds. */
	fields: readonly string[];
	fetch: () => Promise<UpstreamResult<MetricFields>>;
	maxAttempts?: number;
}

export interface CategoryDefinition {
	sources: readonly SourceDefinition[];
	defaults: MetricFields;
	derived?: readonly DerivedField[];
}

export type CategoryDefinitions = Record<MetricCategory, CategoryDefinition>;

export interface MetricsAggregatorOptions {
	definitions: CategoryDefinitions;
	retry: RetryOptions;
	fallbackWindowMs: number;
	logger: Logger;
	now?: () => number;
}

export interface MetricsAggregator {
	/**
	 * Builds a new record for the category. `previous` is the last record the
	 * cache holds, used to fill fields of failed sources. Never rejects.
	 */
	refresh(category: MetricCategory, previous?: MetricRecord): Promise<MetricRecord>;
}

const SOURCE_RANK: Record<FieldSource, number> = { live: 0, cache: 1, default: 2 };

const deepFreeze = <T>(value: T): T => {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const nested of Object.values(value)) {
			deepFreeze(nested);
		}
	}
	return value;
};

const cloneValue = (value: MetricValue): MetricValue =>
	value !== null && typeof value === "object" ? structuredClone(value) : value;

export const freezeRecord = (record: MetricRecord): MetricRecord => deepFreeze(record);

export function defaultRecord(
	category: MetricCategory,
	defaults: MetricFields,
	fetchedAt: string
): MetricRecord {
	const fields: MetricFields = {};
	const freshness: Record<string, FieldFreshness> = {};
	for (const [field, value] of Object.entries(defaults)) {
		fields[field] = cloneValue(value);
		freshness[field] = { source: "default", observed_at: null };
	}
	return freezeRecord({
		category,
		fields,
		freshness,
		fetched_at: fetchedAt,
		source: "default",
		stale: true,
	});
}

const worstOf = (inputs: FieldFreshness[]): FieldFreshness => {
	let source: FieldSource = "live";
	let observedAt: string | null = null;
	for (const input of inputs) {
		if (SOURCE_RANK[input.source] > SOURCE_RANK[source]) {
			source = input.source;
		}
		if (input.observed_at !== null && (observedAt === null || input.observed_at < observedAt)) {
			observedAt = input.observed_at;
		}
	}
	return { source, observed_at: source === "default" ? null : observedAt };
};

export function createMetricsAggregator(
	options: MetricsAggregatorOptions
): MetricsAggregator {
	const now = options.now ?? Date.now;
	const log = options.logger.child({ component: "metrics-aggregator" });

	const eligibleFallback = (
		previous: MetricRecord | undefined,
		field: string,
		nowMs: number
	): { value: MetricValue; freshness: FieldFreshness } | null => {
		if (!previous || !(field in previous.fields)) {
			return null;
		}
		const freshness = previous.freshness[field];
		if (!freshness || freshness.source === "default" || freshness.observed_at === null) {
			return null;
		}
		const age = nowMs - Date.parse(freshness.observed_at);
		if (!Number.isFinite(age) || age > options.fallbackWindowMs) {
			return null;
		}
		const value = previous.fields[field];
		return value === undefined
			? null
			: { value, freshness: { source: "cache", observed_at: freshness.observed_at } };
	};

	const reissueCached = (previous: MetricRecord): MetricRecord => {
		const freshness: Record<string, FieldFreshness> = {};
		for (const [field, entry] of Object.entries(previous.freshness)) {
			freshness[field] =
				entry.source === "live" ? { source: "cache", observed_at: entry.observed_at } : entry;
		}
		return freezeRecord({
			category: previous.category,
			fields: previous.fields,
			freshness,
			fetched_at: previous.fetched_at,
			source: "cache",
			stale: true,
		});
	};

	const refresh = async (
		category: MetricCategory,
		previous?: MetricRecord
	): Promise<MetricRecord> => {
		const definition = options.definitions[category];
		const startedAt = now();

		// Fan out; every settled value is a result, never an exception.
		const results = await Promise.all(
			definition.sources.map((source) =>
				executeWithRetry(source.fetch, {
					...options.retry,
					maxAttempts: source.maxAttempts ?? options.retry.maxAttempts,
					onRetry: (failed, attempt, delayMs) => {
						log.debug(
							{ category, source: source.name, kind: failed.kind, attempt, delayMs },
							"retrying upstream call"
						);
					},
				})
			)
		);

		const settledAt = now();
		const observedAt = new Date(settledAt).toISOString();
		const succeeded = results.filter((result) => result.ok).length;

		results.forEach((result, index) => {
			if (!result.ok) {
				log.warn(
					{ category, source: definition.sources[index]?.name, kind: result.kind },
					result.message
				);
			}
		});

		if (succeeded === 0) {
			if (previous && previous.source !== "default") {
				log.warn({ category }, "all sources failed; serving previous record");
				return reissueCached(previous);
			}
			log.warn({ category }, "all sources failed; serving defaults");
			return defaultRecord(category, definition.defaults, observedAt);
		}

		const fields: MetricFields = {};
		const freshness: Record<string, FieldFreshness> = {};
		const assign = (field: string, value: MetricValue, entry: FieldFreshness) => {
			fields[field] = value;
			freshness[field] = entry;
		};
		const assignFallback = (field: string) => {
			const cached = eligibleFallback(previous, field, settledAt);
			if (cached) {
				assign(field, cached.value, cached.freshness);
				return;
			}
			assign(field, cloneValue(definition.defaults[field] ?? null), {
				source: "default",
				observed_at: null,
			});
		};

		definition.sources.forEach((source, index) => {
			const result = results[index];
			for (const field of source.fields) {
				const value = result?.ok ? result.value[field] : undefined;
				if (value === undefined) {
					assignFallback(field);
				} else {
					assign(field, value, { source: "live", observed_at: observedAt });
				}
			}
		});

		for (const derived of definition.derived ?? []) {
			const inputs = derived.inputs.map(
				(input) => freshness[input] ?? { source: "default" as const, observed_at: null }
			);
			assign(derived.field, derived.compute(fields), worstOf(inputs));
		}

		// Order keys the way the defaults declare them.
		const ordered: MetricFields = {};
		const orderedFreshness: Record<string, FieldFreshness> = {};
		for (const field of [...Object.keys(definition.defaults), ...Object.keys(fields)]) {
			const value = fields[field];
			const entry = freshness[field];
			if (value !== undefined && entry && !(field in ordered)) {
				ordered[field] = value;
				orderedFreshness[field] = entry;
			}
		}

		const degraded = Object.values(orderedFreshness).some(
			(entry) => entry.source !== "live"
		);
		log.debug(
			{ category, succeeded, total: results.length, durationMs: settledAt - startedAt },
			"category refreshed"
		);

		return freezeRecord({
			category,
			fields: ordered,
			freshness: orderedFreshness,
			fetched_at: observedAt,
			source: degraded ? "fallback" : "live",
			stale: degraded,
		});
	};

	return { refresh };
}
