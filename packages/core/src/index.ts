/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./priceTable";
export * from "./config";
export { loadEnvFile, loadEnvFiles } from "./env";
export {
	createLogger,
	log,
	normalizeLevel,
	sanitizeValue,
	type BaseLogPayload,
	type LogLevel,
	type ModuleLogger,
} from "./utils/logger";
