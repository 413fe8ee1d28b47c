import cors from "cors";
import { EnvLoader } from "../util/EnvLoader";
import logger from "../logger";

export class CorsRejectedError extends Error {
  constructor(readonly origin: string) {
    super(`Origin ${origin} is not allowed by CORS`);
    this.name = "CorsRejectedError";
  }
}

export const buildAllowedOrigins = (): string[] =>
  [EnvLoader.get("CLIENT_URL"), EnvLoader.get("API_URL")].filter(
    (origin): origin is string => Boolean(origin)
  );

export const createCorsMiddleware = (allowedOrigins: string[]) => {
  const allowList = new Set(allowedOrigins);

  return cors({
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    optionsSuccessStatus: 204,

    origin(origin, callback) {
      // Same-origin requests and curl carry no Origin header
      if (!origin) return callback(null, true);

      if (allowList.has(origin)) {
        return callback(null, true);
      }

      logger.warn(`Blocked by CORS: ${origin}`);
      return callback(new CorsRejectedError(origin));
    },
  });
};
