export { loggerMiddleware, createLogger } from "./logger";
