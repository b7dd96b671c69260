import { statSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import type { RunContext } from "./context.ts";

export type ReportOutcome =
    | { status: "generated"; outputDir: string }
    | { status: "missing-results"; resultsDir: string }
    | { status: "failed"; outputDir: string; exitCode: number };

export type ReportRequest = {
    workspaceDir: string;
    suite: string;
    allureResultsPath: string;
    allureBin: string;
};

export const resolveResultsDir = (workspaceDir: string, resultsPath: string): string =>
    path.join(workspaceDir, resultsPath.replace(/^\.\//, ""));

const isDirectory = (dirPath: string): boolean => {
    try {
        return statSync(dirPath).isDirectory();
    } catch {
        return false;
    }
};

export const generateReport = async (
    context: RunContext,
    request: ReportRequest,
): Promise<ReportOutcome> => {
    const { options, runner, logger, env } = context;
    const resultsDir = resolveResultsDir(request.workspaceDir, request.allureResultsPath);
    if (!isDirectory(resultsDir)) {
        return { status: "missing-results", resultsDir };
    }

    const outputDir = path.join(options.artifactsDir, request.suite);
    await mkdir(outputDir, { recursive: true });
    logger.info(`Generating Allure report for ${request.suite}`);
    const exitCode = await runner.run({
        command: request.allureBin,
        args: ["generate", resultsDir, "-o", outputDir, "--clean"],
        env,
    });
    return exitCode === 0
        ? { status: "generated", outputDir }
        : { status: "failed", outputDir, exitCode };
};
