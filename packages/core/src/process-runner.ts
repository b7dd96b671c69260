import { type ChildProcess, type StdioOptions, spawn } from "node:child_process";
import { accessSync, constants as fsConstants, statSync } from "node:fs";
import { constants as osConstants } from "node:os";
import path from "node:path";
import { CommandFailedError } from "./errors.ts";

export type CommandSpec = {
    command: string;
    args: readonly string[];
    cwd?: string;
    env?: NodeJS.ProcessEnv;
};

export type CaptureResult = {
    exitCode: number;
    stdout: string;
    stderr: string;
};

export type PipeResult = {
    exitCode: number;
    failedCommand?: string;
};

export type ProcessRunner = {
    /** Runs with inherited stdio and resolves with the exit code. */
    run: (spec: CommandSpec) => Promise<number>;
    capture: (spec: CommandSpec) => Promise<CaptureResult>;
    /** `from | to` with pipefail semantics: the last non-zero status wins. */
    pipe: (from: CommandSpec, to: CommandSpec) => Promise<PipeResult>;
    exists: (command: string, env?: NodeJS.ProcessEnv) => boolean;
};

export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export const formatCommand = (spec: Pick<CommandSpec, "command" | "args">): string =>
    [spec.command, ...spec.args].join(" ");

export const toExitCode = (code: number | null, signal: NodeJS.Signals | null): number => {
    if (code !== null) {
        return code;
    }
    if (signal !== null) {
        return 128 + osConstants.signals[signal];
    }
    return 1;
};

const isSpawnNotFound = (error: Error): boolean => "code" in error && error.code === "ENOENT";

const waitForExit = (child: ChildProcess): Promise<number> =>
    new Promise((resolve, reject) => {
        child.once("error", (error) => {
            if (isSpawnNotFound(error)) {
                resolve(COMMAND_NOT_FOUND_EXIT_CODE);
                return;
            }
            reject(error);
        });
        child.once("close", (code, signal) => {
            resolve(toExitCode(code, signal));
        });
    });

export const isExecutableFile = (filePath: string): boolean => {
    try {
        if (!statSync(filePath).isFile()) {
            return false;
        }
        accessSync(filePath, fsConstants.X_OK);
        return true;
    } catch {
        return false;
    }
};

export const findExecutable = (
    command: string,
    env: NodeJS.ProcessEnv = process.env,
): string | null => {
    if (command.includes(path.sep)) {
        return isExecutableFile(command) ? command : null;
    }
    const searchPath = env.PATH ?? "";
    for (const dir of searchPath.split(path.delimiter)) {
        if (dir.length === 0) {
            continue;
        }
        const candidate = path.join(dir, command);
        if (isExecutableFile(candidate)) {
            return candidate;
        }
    }
    return null;
};

export const runOrThrow = async (runner: ProcessRunner, spec: CommandSpec): Promise<void> => {
    const exitCode = await runner.run(spec);
    if (exitCode !== 0) {
        throw new CommandFailedError(formatCommand(spec), exitCode);
    }
};

export type ProcessRunnerOptions = {
    /** Aborting terminates every running child with SIGTERM. */
    signal?: AbortSignal;
};

export const createProcessRunner = (options: ProcessRunnerOptions = {}): ProcessRunner => {
    const { signal } = options;
    const active = new Set<ChildProcess>();

    const terminate = (child: ChildProcess): void => {
        if (child.exitCode === null && child.signalCode === null) {
            child.kill("SIGTERM");
        }
    };

    signal?.addEventListener("abort", () => {
        for (const child of active) {
            terminate(child);
        }
    });

    const start = (spec: CommandSpec, stdio: StdioOptions): ChildProcess => {
        const child = spawn(spec.command, [...spec.args], {
            cwd: spec.cwd ?? process.cwd(),
            env: spec.env ?? process.env,
            stdio,
        });
        active.add(child);
        const forget = (): void => {
            active.delete(child);
        };
        child.once("close", forget);
        child.once("error", forget);
        if (signal?.aborted) {
            terminate(child);
        }
        return child;
    };

    const run = (spec: CommandSpec): Promise<number> => waitForExit(start(spec, "inherit"));

    const capture = async (spec: CommandSpec): Promise<CaptureResult> => {
        const child = start(spec, ["ignore", "pipe", "pipe"]);
        let stdout = "";
        let stderr = "";
        child.stdout?.setEncoding("utf8").on("data", (chunk: string) => {
            stdout += chunk;
        });
        child.stderr?.setEncoding("utf8").on("data", (chunk: string) => {
            stderr += chunk;
        });
        const exitCode = await waitForExit(child);
        return { exitCode, stdout, stderr };
    };

    const pipe = async (from: CommandSpec, to: CommandSpec): Promise<PipeResult> => {
        const producer = start(from, ["ignore", "pipe", "inherit"]);
        const consumer = start(to, ["pipe", "inherit", "inherit"]);
        // Once the consumer is gone the producer's next write raises SIGPIPE.
        const closeProducerOutput = (): void => {
            producer.stdout?.unpipe();
            producer.stdout?.destroy();
        };
        consumer.stdin?.on("error", closeProducerOutput);
        consumer.once("exit", closeProducerOutput);
        consumer.once("error", closeProducerOutput);
        if (producer.stdout && consumer.stdin) {
            producer.stdout.pipe(consumer.stdin);
        }
        const [producerExit, consumerExit] = await Promise.all([
            waitForExit(producer),
            waitForExit(consumer),
        ]);
        if (consumerExit !== 0) {
            return { exitCode: consumerExit, failedCommand: formatCommand(to) };
        }
        if (producerExit !== 0) {
            return { exitCode: producerExit, failedCommand: formatCommand(from) };
        }
        return { exitCode: 0 };
    };

    return {
        run,
        capture,
        pipe,
        exists: (command, env) => findExecutable(command, env) !== null,
    };
};
