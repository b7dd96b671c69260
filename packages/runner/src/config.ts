import { homedir, tmpdir } from "node:os";
import path from "node:path";
import { ConfigError, type LogLevel, UsageError } from "@e2e-harness/core";
import { z } from "zod";

/**
 * Everything a single run needs. Built from environment defaults first and
 * then overridden by command-line flags.
 */
export type RunOptions = {
    suite: string;
    tarballUrl: string;
    dotenvFile: string;
    artifactsDir: string;
    keepTestsDir: boolean;
    /** Empty means a fresh temp directory is created for the run. */
    testsDir: string;
    tempRoot: string;
    toolsDir: string;
    nvmDir: string;
    nodeVersion: string;
    playwrightVersion: string;
    allureVersion: string;
    nxTarget: string | null;
    allureResultsPath: string | null;
    skipTestInstall: boolean;
    logLevel: LogLevel;
    nxExtraArgs: string[];
};

export type ParsedCli =
    | { kind: "help" }
    | { kind: "run"; options: RunOptions };

export const DEFAULT_TESTS_TARBALL =
    "https://github.com/nepalevov/ai-dial-chat/archive/refs/heads/development.tar.gz";

export const USAGE = `Usage: e2e-runner [options] [-- extra nx args]

Options:
  --suite <name>              Test suite to execute (chat, overlay, or nx target suffix)
  --keep-tests-dir            Do not delete downloaded test workspace on exit
  --tarball <url>             An URL to tar.gz with the tests source code
  --dotenv <path>             Relative path inside the tests repo containing env vars to be sourced
  --artifacts-dir <path>      Directory where Allure reports will be written
  --help                      Show this help message

Any arguments passed after \`--\` are forwarded to the \`npx nx run ...\` command.
`;

const FALSE_VALUES = ["", "0", "false", "no", "off"];

// Unset and empty variables both fall back to the default.
const emptyToUndefined = (value: unknown): unknown =>
    typeof value === "string" && value.trim().length === 0 ? undefined : value;

const withDefault = (fallback: string) => z.preprocess(emptyToUndefined, z.string().default(fallback));

const optionalValue = z.preprocess(emptyToUndefined, z.string().optional());

export const parseBooleanFlag = (value: string | undefined): boolean => {
    if (value === undefined) {
        return false;
    }
    return !FALSE_VALUES.includes(value.trim().toLowerCase());
};

export const EnvironmentSchema = z.object({
    TOOLS_DIR: withDefault("/tmp/e2e-tools"),
    NVM_DIR: optionalValue,
    HOME: optionalValue,
    ARTIFACTS_DIR: withDefault("/tmp/reports"),
    TESTS_DIR: z.string().default(""),
    TMPDIR: optionalValue,
    NODE_VERSION: withDefault("lts/*"),
    PLAYWRIGHT_VERSION: withDefault("1.57.0"),
    ALLURE_VERSION: withDefault("2.24.0"),
    TESTS_TARBALL: withDefault(DEFAULT_TESTS_TARBALL),
    DOTENV_FILE: withDefault("apps/chat-e2e/.env.ci"),
    TEST_SUITE: withDefault("chat"),
    KEEP_TESTS_DIR: z.string().optional().transform(parseBooleanFlag),
    NX_TARGET: optionalValue,
    ALLURE_RESULTS_PATH: optionalValue,
    SKIP_TEST_INSTALL: z
        .string()
        .optional()
        .transform((value) => value !== undefined && value.length > 0),
    LOG_LEVEL: z.preprocess(
        emptyToUndefined,
        z.enum(["debug", "info", "warn", "error"]).default("info"),
    ),
});

export const loadRunOptions = (env: NodeJS.ProcessEnv = process.env): RunOptions => {
    const parsed = EnvironmentSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const variable = issue?.path.join(".");
        throw new ConfigError(
            `Invalid environment${variable ? ` variable ${variable}` : ""}: ${issue?.message ?? "unknown error"}`,
            variable,
        );
    }
    const values = parsed.data;
    return {
        suite: values.TEST_SUITE,
        tarballUrl: values.TESTS_TARBALL,
        dotenvFile: values.DOTENV_FILE,
        artifactsDir: values.ARTIFACTS_DIR,
        keepTestsDir: values.KEEP_TESTS_DIR,
        testsDir: values.TESTS_DIR,
        tempRoot: values.TMPDIR ?? tmpdir(),
        toolsDir: values.TOOLS_DIR,
        nvmDir: values.NVM_DIR ?? path.join(values.HOME ?? homedir(), ".nvm"),
        nodeVersion: values.NODE_VERSION,
        playwrightVersion: values.PLAYWRIGHT_VERSION,
        allureVersion: values.ALLURE_VERSION,
        nxTarget: values.NX_TARGET ?? null,
        allureResultsPath: values.ALLURE_RESULTS_PATH ?? null,
        skipTestInstall: values.SKIP_TEST_INSTALL,
        logLevel: values.LOG_LEVEL,
        nxExtraArgs: [],
    };
};

const VALUE_FLAGS = {
    "--suite": "suite",
    "--tarball": "tarballUrl",
    "--dotenv": "dotenvFile",
    "--artifacts-dir": "artifactsDir",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

const isValueFlag = (value: string): value is ValueFlag => Object.hasOwn(VALUE_FLAGS, value);

const splitInlineValue = (arg: string): { flag: string; inline: string | undefined } => {
    const separator = arg.indexOf("=");
    if (!arg.startsWith("--") || separator === -1) {
        return { flag: arg, inline: undefined };
    }
    const flag = arg.slice(0, separator);
    return isValueFlag(flag)
        ? { flag, inline: arg.slice(separator + 1) }
        : { flag: arg, inline: undefined };
};

/**
 * Applies command-line flags on top of `defaults`. Unknown arguments are
 * forwarded to Nx, as is everything after `--`.
 */
export const parseCliArgs = (argv: readonly string[], defaults: RunOptions): ParsedCli => {
    const options: RunOptions = { ...defaults, nxExtraArgs: [...defaults.nxExtraArgs] };

    for (let index = 0; index < argv.length; index++) {
        const arg = argv[index];
        if (arg === "--") {
            options.nxExtraArgs.push(...argv.slice(index + 1));
            break;
        }

        const { flag, inline } = splitInlineValue(arg);
        if (isValueFlag(flag)) {
            let value: string | undefined = inline;
            if (value === undefined && index + 1 < argv.length) {
                index += 1;
                value = argv[index];
            }
            if (value === undefined || value.length === 0) {
                throw new UsageError(`${flag} requires a value`, flag);
            }
            options[VALUE_FLAGS[flag]] = value;
            continue;
        }

        switch (flag) {
            case "--keep-tests-dir":
                options.keepTestsDir = true;
                break;
            case "--help":
                return { kind: "help" };
            default:
                options.nxExtraArgs.push(arg);
        }
    }

    return { kind: "run", options };
};
