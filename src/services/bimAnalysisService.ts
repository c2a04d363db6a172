import { z } from "zod";

import {
	failure,
	success,
	type MetricFields,
	type UpstreamResult,
} from "../types";
import { executeWithRetry, type RetryOptions } from "./retryPolicy";
import type { UpstreamClient } from "./upstreamClient";

export const buildingModelSummarySchema = z.object({
	model_id: z.string().trim().min(1).max(128),
	project_name: z.string().trim().min(1).optional().default("Unknown Project"),
	schema_version: z.string().optional().default("Unknown"),
	element_summary: z.record(z.number().int().nonnegative()),
});

export type BuildingModelSummary = z.infer<typeof buildingModelSummarySchema>;

// Completion, chat-completion and plain `{ text }` responses are all accepted.
const aiResponseSchema = z
	.union([
		z.object({ text: z.string() }),
		z.object({ choices: z.array(z.object({ text: z.string() })).min(1) }),
		z.object({
			choices: z
				.array(z.object({ message: z.object({ content: z.string() }) }))
				.min(1),
		}),
	])
	.transform((response) => {
		if ("text" in response) {
			return response.text;
		}
		const [first] = response.choices;
		if (first && "text" in first) {
			return first.text;
		}
		return first?.message.content ?? "";
	});

export interface ElementCategories {
	structural: Record<string, number>;
	architectural: Record<string, number>;
	mechanical: Record<string, number>;
}

export type RiskLevel = "Low" | "Medium" | "High";

export interface AnalysisInsights {
	quality_score: number | null;
	roi_potential: number | null;
	confidence_score: number | null;
	recommendation: string | null;
	investment_grade: string | null;
	key_insights: string[];
	critical_issues: string[];
}

export interface BimAnalysis extends AnalysisInsights {
	model_id: string;
	project_name: string;
	schema_version: string;
	total_elements: number;
	completeness_score: number;
	element_categories: ElementCategories;
	risk_level: RiskLevel;
	analysis_text: string;
	model_used: string;
	analyzed_at: string;
}

const ELEMENT_GROUPS: Record<keyof ElementCategories, Record<string, string>> = {
	structural: {
		walls: "IfcWall",
		slabs: "IfcSlab",
		columns: "IfcColumn",
		beams: "IfcBeam",
	},
	architectural: {
		doors: "IfcDoor",
		windows: "IfcWindow",
		stairs: "IfcStair",
		spaces: "IfcSpace",
	},
	mechanical: {
		hvac_equipment: "IfcFlowTerminal",
		pipes: "IfcPipeSegment",
		ducts: "IfcDuctSegment",
	},
};

export const categorizeElements = (
	summary: Record<string, number>
): ElementCategories => {
	const pick = (group: Record<string, string>) =>
		Object.fromEntries(
			Object.entries(group).map(([label, ifcType]) => [label, summary[ifcType] ?? 0])
		);
	return {
		structural: pick(ELEMENT_GROUPS.structural),
		architectural: pick(ELEMENT_GROUPS.architectural),
		mechanical: pick(ELEMENT_GROUPS.mechanical),
	};
};

export const completenessScore = (totalElements: number): number =>
	Math.min(1, totalElements / 1000);

export const buildAnalysisPrompt = (
	summary: BuildingModelSummary,
	totalElements: number,
	categories: ElementCategories
): string =>
	[
		"Assess this building model for real-estate tokenization.",
		`Project: ${summary.project_name} (IFC ${summary.schema_version})`,
		`Elements: ${totalElements}, completeness ${completenessScore(totalElements).toFixed(2)}`,
		`Structural: ${JSON.stringify(categories.structural)}`,
		`Architectural: ${JSON.stringify(categories.architectural)}`,
		`Mechanical: ${JSON.stringify(categories.mechanical)}`,
		"",
		"Answer using exactly these labels:",
		"Quality Score: [0-10]",
		"ROI Potential: [percentage]",
		"Confidence: [0-1]",
		"Investment Grade: [A/B/C/D]",
		"Recommendation: [BUY/HOLD/AVOID]",
		"Key Insights:",
		"- [insight]",
		"Critical Issues:",
		"- [issue]",
	].join("\n");

const escapeLabel = (label: string) => label.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const extractNumber = (text: string, label: string): number | null => {
	const match = new RegExp(`${escapeLabel(label)}:\\s*([0-9]+(?:\\.[0-9]+)?)`, "i").exec(
		text
	);
	return match?.[1] ? Number(match[1]) : null;
};

const extractBullets = (text: string, heading: string, until?: string): string[] => {
	const pattern = until
		? new RegExp(`${heading}:([\\s\\S]*?)(?:${until}:|$)`, "i")
		: new RegExp(`${heading}:([\\s\\S]*)$`, "i");
	const section = pattern.exec(text)?.[1];
	if (!section) {
		return [];
	}
	return section
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.startsWith("-"))
		.map((line) => line.replace(/^-+\s*/, "").trim())
		.filter(Boolean);
};

export function parseAnalysisInsights(text: string): AnalysisInsights {
	const recommendation = /Recommendation:\s*(BUY|HOLD|AVOID)\b/i.exec(text)?.[1];
	const grade = /Investment Grade:\s*([A-D])\b/i.exec(text)?.[1];
	return {
		quality_score: extractNumber(text, "Quality Score"),
		roi_potential: extractNumber(text, "ROI Potential"),
		confidence_score: extractNumber(text, "Confidence"),
		recommendation: recommendation ? recommendation.toUpperCase() : null,
		investment_grade: grade ? grade.toUpperCase() : null,
		key_insights: extractBullets(text, "Key Insights", "Critical Issues"),
		critical_issues: extractBullets(text, "Critical Issues"),
	};
}

export function riskLevel(insights: AnalysisInsights): RiskLevel {
	const confidence = insights.confidence_score ?? 0;
	const quality = insights.quality_score ?? 0;
	const issues = insights.critical_issues.length;
	if (confidence >= 0.8 && quality >= 8 && issues === 0) {
		return "Low";
	}
	if (confidence >= 0.6 && quality >= 6 && issues <= 2) {
		return "Medium";
	}
	return "High";
}

export interface AnalysisStore {
	save(analysis: BimAnalysis): void;
	get(modelId: string): BimAnalysis | undefined;
	latest(): BimAnalysis | undefined;
}

export function createAnalysisStore(): AnalysisStore {
	const analyses = new Map<string, BimAnalysis>();
	let latestModelId: string | null = null;
	return {
		save(analysis) {
			analyses.set(analysis.model_id, analysis);
			latestModelId = analysis.model_id;
		},
		get(modelId) {
			return analyses.get(modelId);
		},
		latest() {
			return latestModelId === null ? undefined : analyses.get(latestModelId);
		},
	};
}

export const toAnalysisFields = (analysis: BimAnalysis): MetricFields => ({
	model_id: analysis.model_id,
	project_name: analysis.project_name,
	total_elements: analysis.total_elements,
	completeness_score: analysis.completeness_score,
	quality_score: analysis.quality_score,
	roi_potential: analysis.roi_potential,
	confidence_score: analysis.confidence_score,
	recommendation: analysis.recommendation,
	investment_grade: analysis.investment_grade,
	risk_level: analysis.risk_level,
	key_insights: analysis.key_insights,
	critical_issues: analysis.critical_issues,
	analyzed_at: analysis.analyzed_at,
});

export interface BimAnalysisServiceOptions {
	ai: UpstreamClient;
	model: string;
	store: AnalysisStore;
	retry: RetryOptions;
	timeoutMs?: number;
	now?: () => number;
}

export interface BimAnalysisService {
	analyze(summary: BuildingModelSummary): Promise<UpstreamResult<BimAnalysis>>;
	get(modelId: string): BimAnalysis | undefined;
	fetchLatest(): Promise<UpstreamResult<MetricFields>>;
}

export function createBimAnalysisService(
	options: BimAnalysisServiceOptions
): BimAnalysisService {
	const now = options.now ?? Date.now;

	const analyze = async (
		summary: BuildingModelSummary
	): Promise<UpstreamResult<BimAnalysis>> => {
		const totalElements = Object.values(summary.element_summary).reduce(
			(sum, count) => sum + count,
			0
		);
		const categories = categorizeElements(summary.element_summary);
		const prompt = buildAnalysisPrompt(summary, totalElements, categories);

		const result = await executeWithRetry(
			() =>
				options.ai.fetch({
					path: "",
					method: "POST",
					body: { model: options.model, prompt, max_tokens: 500 },
					timeoutMs: options.timeoutMs,
					schema: aiResponseSchema,
				}),
			options.retry
		);
		if (!result.ok) {
			return result;
		}

		const insights = parseAnalysisInsights(result.value);
		const analysis: BimAnalysis = {
			model_id: summary.model_id,
			project_name: summary.project_name,
			schema_version: summary.schema_version,
			total_elements: totalElements,
			completeness_score: completenessScore(totalElements),
			element_categories: categories,
			...insights,
			risk_level: riskLevel(insights),
			analysis_text: result.value,
			model_used: options.model,
			analyzed_at: new Date(now()).toISOString(),
		};
		options.store.save(analysis);
		return success(analysis);
	};

	const fetchLatest = async (): Promise<UpstreamResult<MetricFields>> => {
		const latest = options.store.latest();
		if (!latest) {
			return failure("unreachable", "no building model has been analysed yet");
		}
		return success(toAnalysisFields(latest));
	};

	return {
		analyze,
		get: (modelId) => options.store.get(modelId),
		fetchLatest,
	};
}
