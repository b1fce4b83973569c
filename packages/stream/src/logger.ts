import { createNodeLogger, type Logger, parseLogLevel } from "@feedline/logger";

export const log: Logger = createNodeLogger({
	service: "stream",
	level: parseLogLevel(process.env.LOG_LEVEL),
	environment: process.env.NODE_ENV ?? "production",
	pretty: process.env.NODE_ENV === "development",
});
