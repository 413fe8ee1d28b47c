import { createLogger, format, transports, type Logger } from "winston";

const { combine, colorize, timestamp, errors, printf } = format;

// Error instances nested in metadata serialise to {} otherwise
const metaReplacer = (_key: string, value: unknown) =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

const devFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const rest = Object.keys(meta).length
    ? ` ${JSON.stringify(meta, metaReplacer)}`
    : "";
  return `${timestamp} ${level}: ${stack ?? message}${rest}`;
});

const developmentLogger = (options: { silent?: boolean } = {}): Logger =>
  createLogger({
    level: "debug",
    silent: options.silent ?? false,
    format: combine(
      colorize(),
      timestamp({ format: "HH:mm:ss" }),
      errors({ stack: true }),
      devFormat
    ),
    transports: [new transports.Console()],
  });

export default developmentLogger;
