import { CommandFailedError, MissingCommandError, type ProcessRunner } from "@e2e-harness/core";
import type { RunContext } from "./context.ts";

export const REQUIRED_COMMANDS = ["curl", "tar"] as const;

export const CURL_ARGS = ["-fsSL", "--retry", "5", "--retry-delay", "2"] as const;

export const requireCommand = (
    runner: ProcessRunner,
    command: string,
    env: NodeJS.ProcessEnv,
): void => {
    if (!runner.exists(command, env)) {
        throw new MissingCommandError(command);
    }
};

export type DownloadRequest = {
    url: string;
    tarArgs: readonly string[];
};

/** `curl <url> | tar <tarArgs>`; a failure on either side is fatal. */
export const downloadAndExtract = async (
    context: RunContext,
    request: DownloadRequest,
): Promise<void> => {
    const result = await context.runner.pipe(
        { command: "curl", args: [...CURL_ARGS, request.url], env: context.env },
        { command: "tar", args: request.tarArgs, env: context.env },
    );
    if (result.exitCode !== 0) {
        throw new CommandFailedError(result.failedCommand ?? `curl ${request.url}`, result.exitCode);
    }
};

export const fetchTests = async (context: RunContext, workspaceDir: string): Promise<void> => {
    const { options, logger } = context;
    logger.info(`Downloading test sources from ${options.tarballUrl}`);
    await downloadAndExtract(context, {
        url: options.tarballUrl,
        tarArgs: ["-xzf", "-", "--strip-components=1", "-C", workspaceDir],
    });
};
