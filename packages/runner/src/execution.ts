import { readFileSync, statSync } from "node:fs";
import path from "node:path";
import { formatCommand } from "@e2e-harness/core";
import * as dotenv from "dotenv";
import type { RunContext } from "./context.ts";

const isFile = (filePath: string): boolean => {
    try {
        return statSync(filePath).isFile();
    } catch {
        return false;
    }
};

/**
 * Loads the suite's dotenv file into the subprocess environment. Values from
 * the file replace inherited ones. Returns the names that were set.
 */
export const loadDotenv = (context: RunContext, workspaceDir: string): string[] => {
    const { options, logger, env } = context;
    const envFile = path.join(workspaceDir, options.dotenvFile);
    if (!isFile(envFile)) {
        logger.warn(`Dotenv file ${options.dotenvFile} not found in ${workspaceDir}`);
        return [];
    }
    const values = dotenv.parse(readFileSync(envFile));
    Object.assign(env, values);
    const names = Object.keys(values);
    logger.debug(`Loaded ${names.length} variables from ${options.dotenvFile}`);
    return names;
};

export const buildNxArgs = (nxTarget: string, extraArgs: readonly string[]): string[] => [
    "nx",
    "run",
    nxTarget,
    "--configuration=production",
    "--output-style=stream",
    "--skipInstall",
    ...extraArgs,
];

/** Runs the Nx target and resolves with its exit code; a failing run is not an error here. */
export const runTests = async (
    context: RunContext,
    workspaceDir: string,
    nxTarget: string,
): Promise<number> => {
    const { options, runner, logger, env } = context;
    loadDotenv(context, workspaceDir);

    const spec = {
        command: "npx",
        args: buildNxArgs(nxTarget, options.nxExtraArgs),
        cwd: workspaceDir,
        env,
    };
    logger.info(`Executing ${formatCommand(spec)}`);
    const exitCode = await runner.run(spec);
    if (exitCode === 0) {
        logger.info("Test run passed", { suite: options.suite });
    } else {
        logger.warn(`Test run finished with exit code ${exitCode}`, { suite: options.suite });
    }
    return exitCode;
};
