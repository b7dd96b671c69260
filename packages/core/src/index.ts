export * from "./errors.ts";
export * from "./logger.ts";
export * from "./process-runner.ts";
