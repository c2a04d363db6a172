import { CATEGORY_DEFAULTS, CATEGORY_FIELDS } from "../config/categories";
import {
	METRIC_CATEGORIES,
	isMetricCategory,
	type DashboardCategory,
	type DashboardPayload,
	type FieldFreshness,
	type MetricCategory,
	type MetricFields,
	type MetricRecord,
} from "../types";
import type { CacheLayer } from "./cacheLayer";

export class UnknownCategoryError extends Error {
	constructor(readonly categories: string[]) {
		super(`Unknown metric categories: ${categories.join(", ")}`);
		this.name = "UnknownCategoryError";
	}
}

/** Parses a comma separated category list; an empty list means every category. */
export function parseCategories(raw: unknown): MetricCategory[] {
	if (raw === undefined || raw === null || raw === "") {
		return [...METRIC_CATEGORIES];
	}
	const list: unknown[] = Array.isArray(raw) ? raw : [raw];
	const values = list
		.flatMap((value) => String(value).split(","))
		.map((value) => value.trim().toLowerCase())
		.filter(Boolean);
	if (values.length === 0) {
		return [...METRIC_CATEGORIES];
	}
	const unknown = values.filter((value) => !isMetricCategory(value));
	if (unknown.length > 0) {
		throw new UnknownCategoryError(unknown);
	}
	return [...new Set(values.filter(isMetricCategory))];
}

// Canonical keys in canonical order, whatever upstream produced the record.
export function toDashboardCategory(record: MetricRecord): DashboardCategory {
	const canonical = CATEGORY_FIELDS[record.category];
	const fields: MetricFields = {};
	const freshness: Record<string, FieldFreshness> = {};
	for (const field of canonical) {
		const value = record.fields[field];
		const entry = record.freshness[field];
		if (value === undefined || !entry) {
			fields[field] = CATEGORY_DEFAULTS[record.category][field] ?? null;
			freshness[field] = { source: "default", observed_at: null };
		} else {
			fields[field] = value;
			freshness[field] = entry;
		}
	}
	return {
		...fields,
		fetched_at: record.fetched_at,
		source: record.source,
		stale: record.stale,
		freshness,
	};
}

export interface DashboardAssembler {
	assemble(categories: Iterable<MetricCategory>): Promise<DashboardPayload>;
	category(category: MetricCategory): Promise<DashboardCategory>;
}

export function createDashboardAssembler(cache: CacheLayer): DashboardAssembler {
	const assemble = async (
		categories: Iterable<MetricCategory>
	): Promise<DashboardPayload> => {
		const requested = [...new Set(categories)];
		const records = await Promise.all(
			requested.map((category) => cache.getOrRefresh(category))
		);
		const payload: DashboardPayload = {};
		requested.forEach((category, index) => {
			const record = records[index];
			if (record) {
				payload[category] = toDashboardCategory(record);
			}
		});
		return payload;
	};

	return {
		assemble,
		category: async (category) => toDashboardCategory(await cache.getOrRefresh(category)),
	};
}
