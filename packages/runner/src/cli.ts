import { fileURLToPath } from "node:url";
import { Logger, type ProcessRunner, createProcessRunner, isRunnerError } from "@e2e-harness/core";
import { USAGE, loadRunOptions, parseCliArgs } from "./config.ts";
import { runSuite } from "./e2e-runner.ts";

export type CliDeps = {
    env?: NodeJS.ProcessEnv;
    runner?: ProcessRunner;
    logger?: Logger;
    stdout?: { write: (chunk: string) => unknown };
    /** Set when the process is asked to stop; running children are terminated. */
    signal?: AbortSignal;
};

export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
    const env = deps.env ?? process.env;
    let logger = deps.logger ?? Logger.create("e2e-runner");

    try {
        const defaults = loadRunOptions(env);
        if (!deps.logger) {
            logger = new Logger({
                level: defaults.logLevel,
                service: "e2e-runner",
                colorize: process.stderr.isTTY === true,
            });
        }

        const parsed = parseCliArgs(argv, defaults);
        if (parsed.kind === "help") {
            (deps.stdout ?? process.stdout).write(USAGE);
            return 0;
        }

        return await runSuite(parsed.options, {
            runner: deps.runner ?? createProcessRunner({ signal: deps.signal }),
            logger,
            env,
            signal: deps.signal,
        });
    } catch (error) {
        if (deps.signal?.aborted) {
            logger.warn("Run interrupted");
        } else if (isRunnerError(error)) {
            logger.error(error.message);
        } else {
            logger.error("Unexpected failure", error);
        }
        return 1;
    }
}

export const runCli = (): void => {
    const controller = new AbortController();
    let signalExitCode: number | null = null;

    // The first signal stops the run and lets the workspace be released once
    // the active child has exited; a second one exits at once.
    const onSignal = (exitCode: number) => (): void => {
        if (signalExitCode !== null) {
            process.exit(signalExitCode);
        }
        signalExitCode = exitCode;
        controller.abort();
    };
    process.on("SIGINT", onSignal(130));
    process.on("SIGTERM", onSignal(143));

    void main(process.argv.slice(2), { signal: controller.signal }).then((exitCode) => {
        process.exitCode = signalExitCode ?? exitCode;
    });
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    runCli();
}
