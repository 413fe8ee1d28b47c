import { createLogger, format, transports, type Logger } from "winston";

const { combine, timestamp, errors, json } = format;

const productionLogger = (): Logger =>
  createLogger({
    level: "info",
    format: combine(timestamp(), errors({ stack: true }), json()),
    defaultMeta: { service: "campus-assistant" },
    transports: [new transports.Console()],
  });

export default productionLogger;
