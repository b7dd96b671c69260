import { statSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { CommandFailedError, ToolchainError, formatCommand, isExecutableFile, runOrThrow } from "@e2e-harness/core";
import type { RunOptions } from "./config.ts";
import type { RunContext } from "./context.ts";
import { downloadAndExtract } from "./fetch-tests.ts";

export const allureBinPath = (options: Pick<RunOptions, "toolsDir" | "allureVersion">): string =>
    path.join(options.toolsDir, `allure-${options.allureVersion}`, "bin", "allure");

export const allureDownloadUrl = (version: string): string =>
    `https://github.com/allure-framework/allure2/releases/download/${version}/allure-${version}.tgz`;

// Sources nvm, installs and selects the version, then prints the bin directory of the selected node.
const NVM_SCRIPT = [
    '. "$NVM_DIR/nvm.sh"',
    'nvm install "$1" >/dev/null',
    'nvm use "$1" >/dev/null',
    'dirname "$(nvm which current)"',
].join(" && ");

const hasContent = (filePath: string): boolean => {
    try {
        const stats = statSync(filePath);
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
};

const lastLine = (output: string): string => {
    const lines = output.split("\n").map((line) => line.trim()).filter((line) => line.length > 0);
    return lines[lines.length - 1] ?? "";
};

export type NodeSelection =
    | { source: "nvm"; binDir: string }
    | { source: "system"; version: string };

export const ensureNode = async (context: RunContext): Promise<NodeSelection> => {
    const { options, runner, logger, env } = context;
    const nvmScript = path.join(options.nvmDir, "nvm.sh");

    if (hasContent(nvmScript)) {
        logger.info(`Installing Node.js ${options.nodeVersion} via nvm`);
        const result = await runner.capture({
            command: "bash",
            args: ["-c", NVM_SCRIPT, "bash", options.nodeVersion],
            env: { ...env, NVM_DIR: options.nvmDir },
        });
        const binDir = lastLine(result.stdout);
        if (result.exitCode !== 0 || binDir.length === 0) {
            throw new ToolchainError(
                `nvm could not provide Node.js ${options.nodeVersion} (exit code ${result.exitCode})`,
                "node",
            );
        }
        env.PATH = env.PATH ? `${binDir}${path.delimiter}${env.PATH}` : binDir;
        return { source: "nvm", binDir };
    }

    logger.warn(`nvm not found in ${options.nvmDir}`);
    if (runner.exists("node", env) && runner.exists("npm", env)) {
        const result = await runner.capture({ command: "node", args: ["--version"], env });
        const version = result.stdout.trim();
        logger.warn(`nvm not found; falling back to system Node.js ${version}`);
        return { source: "system", version };
    }
    throw new ToolchainError("Node.js is not available and nvm could not be sourced", "node");
};

export const ensureJava = (context: RunContext): void => {
    const { runner, env } = context;
    if (!env.JAVA_HOME) {
        throw new ToolchainError("JAVA_HOME is not set", "java");
    }
    if (!runner.exists("java", env)) {
        throw new ToolchainError("Java installation is not found", "java");
    }
};

export const installAllure = async (context: RunContext): Promise<string> => {
    const { options, runner, logger, env } = context;
    const allureBin = allureBinPath(options);

    if (isExecutableFile(allureBin)) {
        logger.info(`Allure CLI already present at ${allureBin}`);
        return allureBin;
    }

    logger.info(`Installing Allure CLI ${options.allureVersion}`);
    await mkdir(options.toolsDir, { recursive: true });
    await downloadAndExtract(context, {
        url: allureDownloadUrl(options.allureVersion),
        tarArgs: ["-xzf", "-", "-C", options.toolsDir],
    });

    const versionCommand = { command: allureBin, args: ["--version"], env };
    const result = await runner.capture(versionCommand);
    if (result.exitCode !== 0) {
        throw new CommandFailedError(formatCommand(versionCommand), result.exitCode);
    }
    logger.info(`Allure CLI version: ${result.stdout.trim()}`);
    return allureBin;
};

export const readPlaywrightVersion = async (
    context: RunContext,
    workspaceDir: string,
    noInstall: boolean,
): Promise<string | null> => {
    const result = await context.runner.capture({
        command: "npx",
        args: noInstall ? ["--no-install", "playwright", "--version"] : ["playwright", "--version"],
        cwd: workspaceDir,
        env: context.env,
    });
    return result.exitCode === 0 ? result.stdout.trim() : null;
};

export const installPlaywright = async (context: RunContext, workspaceDir: string): Promise<void> => {
    const { options, runner, logger, env } = context;
    const wanted = options.playwrightVersion;
    const installed = await readPlaywrightVersion(context, workspaceDir, true);

    if (wanted !== "latest" && installed !== null && installed.includes(wanted)) {
        logger.info(`Playwright already installed with version ${installed}`);
        return;
    }

    logger.info(`Installing Playwright ${wanted}`);
    await runOrThrow(runner, {
        command: "npm",
        args: ["install", "-D", `@playwright/test@${wanted}`, "allure-playwright"],
        cwd: workspaceDir,
        env,
    });
    await runOrThrow(runner, {
        command: "npx",
        args: ["--no-install", "playwright", "--version"],
        cwd: workspaceDir,
        env,
    });
    await runOrThrow(runner, {
        command: "npx",
        args: ["playwright", "install", "--with-deps"],
        cwd: workspaceDir,
        env,
    });
    const version = await readPlaywrightVersion(context, workspaceDir, false);
    logger.info(`Playwright version: ${version ?? "unknown"}`);
};

export const installTestDependencies = async (
    context: RunContext,
    workspaceDir: string,
): Promise<void> => {
    const { options, logger } = context;
    if (options.skipTestInstall) {
        logger.warn("SKIP_TEST_INSTALL set; skipping dependency installation");
        return;
    }
    const stopTimer = logger.startTimer("install test dependencies");
    await ensureNode(context);
    ensureJava(context);
    await installAllure(context);
    await installPlaywright(context, workspaceDir);
    stopTimer();
};
