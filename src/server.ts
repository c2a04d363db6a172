import "dotenv/config";

import * as Sentry from "@sentry/node";

import { createApp } from "./app";
import { createServices } from "./bootstrap";
import { categoryTtls } from "./config/categories";
import { env } from "./config/env";
import { logger } from "./lib/logger";
import { startRefreshJobs } from "./services/refreshJobs";

if (env.SENTRY_DSN) {
	Sentry.init({ dsn: env.SENTRY_DSN, environment: env.NODE_ENV });
}

const services = createServices(env, logger);
const app = createApp(services, env);

const server = app.listen(env.PORT, () => {
	logger.info({ port: env.PORT }, "Tokenization dashboard server running");

	const ttls = categoryTtls(env);
	const stopRefreshJobs = env.WARMUP_ENABLED
		? startRefreshJobs(
				services.cache,
				{
					network: ttls.network,
					token: ttls.token,
					staking: ttls.staking,
					assets: ttls.assets,
				},
				logger
			)
		: () => undefined;

	const shutdown = (signal: string) => {
		logger.info({ signal }, "Shutting down");
		stopRefreshJobs();
		server.close(() => {
			services.history.close();
			logger.info("Server closed");
			process.exit(0);
		});
	};

	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
});
