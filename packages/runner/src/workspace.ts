import { existsSync, rmSync } from "node:fs";
import { mkdir, mkdtemp, rm } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "@e2e-harness/core";

export type Workspace = {
    dir: string;
    retained: boolean;
    release: () => Promise<void>;
    /** For `process.on("exit")`, where only synchronous work runs. */
    releaseSync: () => void;
};

export type WorkspaceOptions = {
    testsDir: string;
    keepTestsDir: boolean;
    tempRoot: string;
    logger: Logger;
};

export const WORKSPACE_PREFIX = "tests.";

export const acquireWorkspace = async (options: WorkspaceOptions): Promise<Workspace> => {
    const { keepTestsDir, logger } = options;
    let dir = options.testsDir;

    if (dir.length === 0) {
        dir = await mkdtemp(path.join(options.tempRoot, WORKSPACE_PREFIX));
    } else if (!keepTestsDir) {
        // A reused directory starts empty so the download is not mixed with a previous one.
        await rm(dir, { recursive: true, force: true });
    }
    await mkdir(dir, { recursive: true });
    logger.info(`Using tests dir: ${dir}`);

    let released = keepTestsDir;

    const release = async (): Promise<void> => {
        if (released) return;
        released = true;
        await rm(dir, { recursive: true, force: true });
        logger.debug(`Removed tests dir: ${dir}`);
    };

    const releaseSync = (): void => {
        if (released) return;
        released = true;
        if (existsSync(dir)) {
            rmSync(dir, { recursive: true, force: true });
        }
    };

    return { dir, retained: keepTestsDir, release, releaseSync };
};
