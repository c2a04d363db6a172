import pino from "pino";

import { env } from "../config/env";

export const logger = pino({
	level: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info"),
	base: { service: "dashboard-metrics" },
});

export type Logger = pino.Logger;
