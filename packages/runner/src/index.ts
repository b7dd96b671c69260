export * from "./config.ts";
export * from "./context.ts";
export * from "./e2e-runner.ts";
export * from "./execution.ts";
export * from "./fetch-tests.ts";
export * from "./report.ts";
export * from "./suites.ts";
export * from "./toolchain.ts";
export * from "./workspace.ts";
export { main, runCli } from "./cli.ts";
