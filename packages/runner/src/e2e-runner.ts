import { InterruptedError, type Logger, type ProcessRunner } from "@e2e-harness/core";
import type { RunOptions } from "./config.ts";
import type { RunContext } from "./context.ts";
import { runTests } from "./execution.ts";
import { REQUIRED_COMMANDS, fetchTests, requireCommand } from "./fetch-tests.ts";
import { generateReport } from "./report.ts";
import { resolveSuite } from "./suites.ts";
import { allureBinPath, installTestDependencies } from "./toolchain.ts";
import { acquireWorkspace } from "./workspace.ts";

export type RunnerDeps = {
    runner: ProcessRunner;
    logger: Logger;
    env?: NodeJS.ProcessEnv;
    /** Checked between steps; an aborted run stops before the next one. */
    signal?: AbortSignal;
};

/**
 * Downloads the suite, provisions the toolchain, runs the Nx target and
 * renders the Allure report. Resolves with the test run's exit code; the
 * report step never changes it. The workspace is released on every path.
 */
export const runSuite = async (options: RunOptions, deps: RunnerDeps): Promise<number> => {
    const { runner, logger } = deps;
    const checkpoint = (): void => {
        if (deps.signal?.aborted) {
            throw new InterruptedError();
        }
    };
    const context: RunContext = {
        options,
        runner,
        logger,
        env: { ...(deps.env ?? process.env) },
    };
    const suite = resolveSuite(options.suite, {
        nxTarget: options.nxTarget,
        allureResultsPath: options.allureResultsPath,
    });
    logger.debug(`Resolved suite ${suite.name}`, {
        suite: suite.name,
        nxTarget: suite.nxTarget,
        allureResultsPath: suite.allureResultsPath,
        known: suite.known,
    });

    for (const command of REQUIRED_COMMANDS) {
        requireCommand(runner, command, context.env);
    }

    const workspace = await acquireWorkspace({
        testsDir: options.testsDir,
        keepTestsDir: options.keepTestsDir,
        tempRoot: options.tempRoot,
        logger: logger.child({ component: "workspace" }),
    });
    const releaseOnExit = (): void => workspace.releaseSync();
    process.once("exit", releaseOnExit);

    try {
        checkpoint();
        await fetchTests(context, workspace.dir);
        checkpoint();
        await installTestDependencies(
            { ...context, logger: logger.child({ component: "toolchain" }) },
            workspace.dir,
        );
        checkpoint();
        const exitCode = await runTests(context, workspace.dir, suite.nxTarget);
        checkpoint();

        const report = await generateReport(
            { ...context, logger: logger.child({ component: "report" }) },
            {
                workspaceDir: workspace.dir,
                suite: suite.name,
                allureResultsPath: suite.allureResultsPath,
                allureBin: allureBinPath(options),
            },
        );
        if (report.status === "missing-results") {
            logger.warn(
                `Allure results directory ${suite.allureResultsPath} not found; skipping report generation`,
            );
        } else if (report.status === "failed") {
            logger.warn(`Allure report generation failed with exit code ${report.exitCode}`);
        } else {
            logger.info(`Allure report written to ${report.outputDir}`);
        }

        return exitCode;
    } finally {
        process.removeListener("exit", releaseOnExit);
        await workspace.release();
    }
};
