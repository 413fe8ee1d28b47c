import type { Logger } from "winston";
import developmentLogger from "./developmentLogger";
import productionLogger from "./productionLogger";
import { NODE_ENV, isProduction, isTest } from "../env/detector";

let logger: Logger;

if (isProduction()) {
  logger = productionLogger();
} else {
  logger = developmentLogger({ silent: isTest() });
}

logger.debug(`Logger initialized for environment: ${NODE_ENV}`);

export default logger;
