import express, {
	type NextFunction,
	type Request,
	type RequestHandler,
	type Response,
} from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import pinoHttp from "pino-http";
import * as Sentry from "@sentry/node";

import type { Services } from "./bootstrap";
import type { Env } from "./config/env";
import { buildingModelSummarySchema } from "./services/bimAnalysisService";
import { UnknownCategoryError, parseCategories } from "./services/dashboardAssembler";
import { clampHours } from "./services/historyStore";
import { isMetricCategory } from "./types";

export type AppConfig = Pick<
	Env,
	"ALLOWED_ORIGINS" | "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX" | "CACHE_CONTROL" | "SENTRY_DSN"
>;

const DEFAULT_HISTORY_HOURS = 24;

type HttpError = Error & { status?: number };

export function createApp(services: Services, config: AppConfig): express.Express {
	const { cache, assembler, bim, history } = services;
	const app = express();

	app.disable("x-powered-by");
	app.set("trust proxy", 1);

	const allowedOrigins = config.ALLOWED_ORIGINS.split(",")
		.map((origin: string) => origin.trim())
		.filter(Boolean);

	const helmetMiddleware = helmet({
		crossOriginResourcePolicy: { policy: "cross-origin" },
		contentSecurityPolicy: false,
	}) as RequestHandler;

	app.use(helmetMiddleware);
	app.use(
		cors({
			origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
				if (!origin || allowedOrigins.length === 0) {
					return callback(null, true);
				}
				if (allowedOrigins.includes(origin)) {
					return callback(null, true);
				}
				return callback(new Error("Not allowed by CORS"));
			},
			methods: ["GET", "POST", "OPTIONS"],
			allowedHeaders: ["Content-Type", "Authorization"],
			maxAge: 600,
		})
	);

	app.use(
		pinoHttp({
			logger: services.logger,
			customLogLevel: (_req: Request, res: Response) => {
				if (res.statusCode >= 500) return "error";
				if (res.statusCode >= 400) return "warn";
				return "info";
			},
		})
	);

	app.use(
		"/api",
		rateLimit({
			windowMs: config.RATE_LIMIT_WINDOW_MS,
			max: config.RATE_LIMIT_MAX,
			standardHeaders: true,
			legacyHeaders: false,
		})
	);

	app.use("/api", (_req, res, next) => {
		res.setHeader("Cache-Control", config.CACHE_CONTROL);
		next();
	});

	app.use(express.json({ limit: "1mb" }));

	app.get("/health", (_req, res) => {
		res.json({ status: "ok", uptime: process.uptime(), timestamp: Date.now() });
	});

	app.get("/api/dashboard", async (req, res) => {
		try {
			const categories = parseCategories(req.query.categories);
			res.json(await assembler.assemble(categories));
		} catch (error) {
			if (error instanceof UnknownCategoryError) {
				res.status(400).json({ error: error.message, categories: error.categories });
				return;
			}
			req.log.error({ err: error }, "Failed to assemble dashboard");
			res.status(500).json({ error: "Failed to assemble dashboard" });
		}
	});

	app.get("/api/dashboard/:category", async (req, res) => {
		const { category } = req.params;
		if (!isMetricCategory(category)) {
			res.status(404).json({ error: `Unknown metric category: ${category}` });
			return;
		}
		try {
			res.json(await assembler.category(category));
		} catch (error) {
			req.log.error({ err: error, category }, "Failed to refresh category");
			res.status(500).json({ error: "Failed to refresh category" });
		}
	});

	app.post("/api/bim-analysis", async (req, res) => {
		const parsed = buildingModelSummarySchema.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json({
				error: "Invalid building model summary",
				issues: parsed.error.issues.map((issue) => ({
					path: issue.path.join("."),
					message: issue.message,
				})),
			});
			return;
		}
		try {
			const result = await bim.analyze(parsed.data);
			if (!result.ok) {
				req.log.warn({ kind: result.kind }, result.message);
				res.status(502).json({ error: "BIM analysis failed", kind: result.kind });
				return;
			}
			cache.invalidate("bim_analysis");
			res.json(result.value);
		} catch (error) {
			req.log.error({ err: error }, "Failed to analyse building model");
			res.status(500).json({ error: "Failed to analyse building model" });
		}
	});

	app.get("/api/bim-analysis/:modelId", (req, res) => {
		const analysis = bim.get(req.params.modelId);
		if (!analysis) {
			res.status(404).json({ error: "Analysis not found" });
			return;
		}
		res.json(analysis);
	});

	app.get("/api/history/:category", (req, res) => {
		const { category } = req.params;
		if (!isMetricCategory(category)) {
			res.status(404).json({ error: `Unknown metric category: ${category}` });
			return;
		}
		try {
			const hoursParam = req.query.hours;
			const hours = typeof hoursParam === "string" ? Number(hoursParam) : DEFAULT_HISTORY_HOURS;
			res.json({
				category,
				hours: clampHours(hours),
				points: history.query(category, hours),
				generatedAt: new Date().toISOString(),
			});
		} catch (error) {
			req.log.error({ err: error, category }, "Failed to read metric history");
			res.status(500).json({
				category,
				points: [],
				generatedAt: new Date().toISOString(),
			});
		}
	});

	app.get("/api/cache/status", (_req, res) => {
		res.setHeader("Cache-Control", "no-store");
		res.json({ categories: cache.status(), generatedAt: new Date().toISOString() });
	});

	app.use((err: HttpError, req: Request, res: Response, _next: NextFunction) => {
		// Body parser rejections carry a 4xx status.
		if (err.status !== undefined && err.status >= 400 && err.status < 500) {
			res.status(err.status).json({ error: err.message });
			return;
		}
		if (config.SENTRY_DSN) {
			Sentry.captureException(err);
		}
		req.log.error({ err }, "Unhandled error");
		res.status(500).json({ error: "Internal server error" });
	});

	return app;
}
