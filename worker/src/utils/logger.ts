import winston from "winston";

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const pretty = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${ts} [worker] ${level}: ${stack ?? message}${extra}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format:
    process.env.NODE_ENV === "production"
      ? combine(timestamp(), errors({ stack: true }), json())
      : combine(colorize(), timestamp(), errors({ stack: true }), pretty),
  transports: [new winston.transports.Console()],
});

export default logger;
