import type { Logger } from "../lib/logger";
import { METRIC_CATEGORIES, type MetricCategory, type MetricRecord } from "../types";

interface CacheEntry {
	record: MetricRecord;
	expiresAt: number;
}

export interface CacheStatus {
	category: MetricCategory;
	cached: boolean;
	fetched_at: string | null;
	expires_at: string | null;
	source: MetricRecord["source"] | null;
	stale: boolean | null;
	refreshing: boolean;
}

export interface CacheLayerOptions {
	refresh: (category: MetricCategory, previous?: MetricRecord) => Promise<MetricRecord>;
	ttlMs: Record<MetricCategory, number>;
	logger: Logger;
	now?: () => number;
	onRecord?: (record: MetricRecord) => void;
}

export interface CacheLayer {
	getOrRefresh(category: MetricCategory): Promise<MetricRecord>;
	/** Refreshes regardless of expiry, joining a refresh already in flight. */
	refresh(category: MetricCategory): Promise<MetricRecord>;
	peek(category: MetricCategory): MetricRecord | undefined;
	invalidate(category: MetricCategory): void;
	status(): CacheStatus[];
}

/**
 * Process-wide record store. Entries are replaced whole; at most one refresh
 * per category is in flight and every concurrent caller awaits that one.
 */
export function createCacheLayer(options: CacheLayerOptions): CacheLayer {
	const now = options.now ?? Date.now;
	const log = options.logger.child({ component: "cache" });
	const entries = new Map<MetricCategory, CacheEntry>();
	const inFlight = new Map<MetricCategory, Promise<MetricRecord>>();
	const generations = new Map<MetricCategory, number>();

	const generationOf = (category: MetricCategory) => generations.get(category) ?? 0;

	const notify = (record: MetricRecord) => {
		if (!options.onRecord) {
			return;
		}
		try {
			options.onRecord(record);
		} catch (error) {
			log.error({ err: error, category: record.category }, "record hook failed");
		}
	};

	const startRefresh = (category: MetricCategory): Promise<MetricRecord> => {
		const generation = generationOf(category);
		const previous = entries.get(category)?.record;

		const pending = options
			.refresh(category, previous)
			.then((record) => {
				// Invalidated mid-flight: keep the record but let the next read refresh.
				const expiresAt =
					generationOf(category) === generation
						? now() + options.ttlMs[category]
						: 0;
				entries.set(category, { record, expiresAt });
				notify(record);
				return record;
			})
			.finally(() => {
				inFlight.delete(category);
			});

		inFlight.set(category, pending);
		return pending;
	};

	const getOrRefresh = async (category: MetricCategory): Promise<MetricRecord> => {
		const entry = entries.get(category);
		if (entry && now() < entry.expiresAt) {
			return entry.record;
		}
		return inFlight.get(category) ?? startRefresh(category);
	};

	const refresh = (category: MetricCategory): Promise<MetricRecord> =>
		inFlight.get(category) ?? startRefresh(category);

	const invalidate = (category: MetricCategory) => {
		generations.set(category, generationOf(category) + 1);
		const entry = entries.get(category);
		if (entry) {
			entries.set(category, { record: entry.record, expiresAt: 0 });
		}
		log.debug({ category }, "cache entry invalidated");
	};

	const status = (): CacheStatus[] =>
		METRIC_CATEGORIES.map((category) => {
			const entry = entries.get(category);
			return {
				category,
				cached: entry !== undefined,
				fetched_at: entry?.record.fetched_at ?? null,
				expires_at:
					entry && Number.isFinite(entry.expiresAt)
						? new Date(entry.expiresAt).toISOString()
						: null,
				source: entry?.record.source ?? null,
				stale: entry?.record.stale ?? null,
				refreshing: inFlight.has(category),
			};
		});

	return {
		getOrRefresh,
		refresh,
		peek: (category) => entries.get(category)?.record,
		invalidate,
		status,
	};
}
