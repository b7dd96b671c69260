import { Logger, formatCommand, type CaptureResult, type CommandSpec, type ProcessRunner } from "@e2e-harness/core";
import { loadRunOptions, type RunOptions } from "./config.ts";
import type { RunContext } from "./context.ts";

export type FakeCall = {
    kind: "run" | "capture" | "pipe";
    line: string;
    spec: CommandSpec;
    /** Copy of the environment at call time. */
    env: NodeJS.ProcessEnv;
};

export type FakeResponse = {
    exitCode?: number;
    stdout?: string;
};

export type FakeHandler = (
    line: string,
    spec: CommandSpec,
) => FakeResponse | undefined | Promise<FakeResponse | undefined>;

export type FakeProcessRunner = ProcessRunner & {
    calls: FakeCall[];
    lines: () => string[];
};

/** In-process stand-in for the subprocess layer: records calls and answers from `handler`. */
export const createFakeProcessRunner = (
    options: { available?: readonly string[]; handler?: FakeHandler } = {},
): FakeProcessRunner => {
    const available = new Set(options.available ?? ["curl", "tar", "node", "npm", "java"]);
    const calls: FakeCall[] = [];

    const answer = async (
        kind: FakeCall["kind"],
        line: string,
        spec: CommandSpec,
    ): Promise<CaptureResult> => {
        calls.push({ kind, line, spec, env: { ...spec.env } });
        const response = (await options.handler?.(line, spec)) ?? {};
        return { exitCode: response.exitCode ?? 0, stdout: response.stdout ?? "", stderr: "" };
    };

    return {
        calls,
        lines: () => calls.map((call) => call.line),
        run: async (spec) => (await answer("run", formatCommand(spec), spec)).exitCode,
        capture: (spec) => answer("capture", formatCommand(spec), spec),
        pipe: async (from, to) => {
            const line = `${formatCommand(from)} | ${formatCommand(to)}`;
            const result = await answer("pipe", line, to);
            return result.exitCode === 0
                ? { exitCode: 0 }
                : { exitCode: result.exitCode, failedCommand: formatCommand(to) };
        },
        exists: (command) => available.has(command),
    };
};

export const quietLogger = (): Logger => new Logger({ level: "error", service: "e2e-runner-test" });

export const testOptions = (overrides: Partial<RunOptions> = {}): RunOptions => ({
    ...loadRunOptions({ HOME: "/home/tester" }),
    ...overrides,
});

export const testContext = (
    runner: ProcessRunner,
    overrides: Partial<RunOptions> = {},
    env: NodeJS.ProcessEnv = { PATH: "/usr/bin", JAVA_HOME: "/opt/java" },
): RunContext => ({
    options: testOptions(overrides),
    runner,
    logger: quietLogger(),
    env: { ...env },
});
