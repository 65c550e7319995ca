import { createLogger as createWinstonLogger, format, type Logger, transports } from "winston";
import { jsonReplacer } from "./json.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";

export type LoggingOptions = {
	level?: LogLevel;
	pretty?: boolean;
};

const prettyFormat = format.combine(
	format.colorize(),
	format.timestamp(),
	format.printf(({ timestamp, level, message, ...meta }) => {
		const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, jsonReplacer)}` : "";
		return `${timestamp} ${level}: ${message}${details}`;
	}),
);

const jsonFormat = format.combine(format.timestamp(), format.json({ replacer: jsonReplacer }));

export const createLogger = ({ level = "info", pretty = false }: LoggingOptions = {}): Logger =>
	createWinstonLogger({
		level: level === "silent" ? "error" : level,
		silent: level === "silent",
		format: pretty ? prettyFormat : jsonFormat,
		transports: [new transports.Console()],
	});
