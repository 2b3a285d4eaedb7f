import winston from "winston";

export function createLogger(level: string = "info"): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.json(),
    defaultMeta: { service: "oplog-vectorizer" },
    transports: [new winston.transports.Console()],
  });
}
