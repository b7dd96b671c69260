import type { Logger, ProcessRunner } from "@e2e-harness/core";
import type { RunOptions } from "./config.ts";

/**
 * State shared by the steps of a run. `env` is the environment handed to
 * every subprocess; steps add to it (nvm's bin directory, dotenv values).
 */
export type RunContext = {
    options: RunOptions;
    runner: ProcessRunner;
    logger: Logger;
    env: NodeJS.ProcessEnv;
};
