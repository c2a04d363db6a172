export const METRIC_CATEGORIES = [
	"network",
	"token",
	"staking",
	"assets",
	"bim_analysis",
] as const;

export type MetricCategory = (typeof METRIC_CATEGORIES)[number];

export type MetricValue =
	| number
	| string
	| boolean
	| null
	| MetricValue[]
	| { [key: string]: MetricValue };

export type MetricFields = Record<string, MetricValue>;

// Ordered from best to worst; derived fields take the worst of their inputs.
export type FieldSource = "live" | "cache" | "default";

export type RecordSource = "live" | "fallback" | "cache" | "default";

export type FieldFreshness = {
	source: FieldSource;
	observed_at: string | null;
};

export interface MetricRecord {
	readonly category: MetricCategory;
	readonly fields: Readonly<MetricFields>;
	readonly freshness: Readonly<Record<string, FieldFreshness>>;
	readonly fetched_at: string;
	readonly source: RecordSource;
	readonly stale: boolean;
}

export type UpstreamFailureKind =
	| "timeout"
	| "unreachable"
	| "malformed_response"
	| "rate_limited";

export interface UpstreamSuccess<T> {
	ok: true;
	value: T;
}

export interface UpstreamFailure {
	ok: false;
	kind: UpstreamFailureKind;
	message: string;
}

export type UpstreamResult<T> = UpstreamSuccess<T> | UpstreamFailure;

export type DashboardCategory = MetricFields & {
	fetched_at: string;
	source: RecordSource;
	stale: boolean;
	freshness: Record<string, FieldFreshness>;
};

export type DashboardPayload = Partial<Record<MetricCategory, DashboardCategory>>;

export const success = <T>(value: T): UpstreamSuccess<T> => ({ ok: true, value });

export const failure = (
	kind: UpstreamFailureKind,
	message: string
): UpstreamFailure => ({ ok: false, kind, message });

const CATEGORY_NAMES: ReadonlySet<string> = new Set(METRIC_CATEGORIES);

export const isMetricCategory = (value: string): value is MetricCategory =>
	CATEGORY_NAMES.has(value);
