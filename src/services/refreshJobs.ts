import type { Logger } from "../lib/logger";
import { METRIC_CATEGORIES, type MetricCategory } from "../types";
import type { CacheLayer } from "./cacheLayer";

export type RefreshIntervals = Partial<Record<MetricCategory, number>>;

/**
 * Warms the listed categories and keeps them refreshed in the background so
 * dashboard requests rarely wait on upstreams. Returns a stop function.
 */
export function startRefreshJobs(
	cache: CacheLayer,
	intervals: RefreshIntervals,
	logger: Logger
): () => void {
	const log = logger.child({ component: "refresh-jobs" });
	const timers: NodeJS.Timeout[] = [];

	const run = (category: MetricCategory, phase: "warmup" | "refresh") => {
		cache
			.refresh(category)
			.then((record) => {
				log.debug({ category, phase, source: record.source }, "category refreshed");
			})
			.catch((error: unknown) => {
				log.warn({ err: error, category, phase }, "background refresh failed");
			});
	};

	for (const category of METRIC_CATEGORIES) {
		const intervalMs = intervals[category];
		if (intervalMs === undefined || !Number.isFinite(intervalMs) || intervalMs <= 0) {
			continue;
		}
		run(category, "warmup");
		const timer = setInterval(() => run(category, "refresh"), intervalMs);
		timer.unref();
		timers.push(timer);
	}

	return () => {
		for (const timer of timers) {
			clearInterval(timer);
		}
	};
}
