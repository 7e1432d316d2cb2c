import pino, { type LoggerOptions } from "pino";

const env = process.env.NODE_ENV;
const isDevelopment = env !== "production" && env !== "test";

const options: LoggerOptions = {
	level: process.env.LOG_LEVEL || (isDevelopment ? "debug" : "info"),

	// Base context for all logs
	base: {
		service: "diffpress",
	},

	// Redact sensitive fields
	redact: {
		paths: ["github.token", "*.token", "headers.authorization"],
		censor: "[REDACTED]",
	},
};

// Logs go to stderr; stdout carries the compressed diff
export const logger = isDevelopment
	? pino({
			...options,
			// Pretty print in development
			transport: {
				target: "pino-pretty",
				options: { colorize: true, destination: 2 },
			},
		})
	: pino(options, pino.destination(2));

// Child loggers for different components
export const githubLogger = logger.child({ component: "github" });
export const pipelineLogger = logger.child({ component: "pipeline" });
export const cliLogger = logger.child({ component: "cli" });
