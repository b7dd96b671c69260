import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DEFAULT_TESTS_TARBALL, loadRunOptions, parseBooleanFlag, parseCliArgs } from "./config.ts";
import { testOptions } from "./test-utils.ts";

describe("loadRunOptions", () => {
    it("applies defaults for an empty environment", () => {
        const options = loadRunOptions({ HOME: "/home/tester" });

        assert.equal(options.suite, "chat");
        assert.equal(options.tarballUrl, DEFAULT_TESTS_TARBALL);
        assert.equal(options.dotenvFile, "apps/chat-e2e/.env.ci");
        assert.equal(options.artifactsDir, "/tmp/reports");
        assert.equal(options.toolsDir, "/tmp/e2e-tools");
        assert.equal(options.nvmDir, "/home/tester/.nvm");
        assert.equal(options.nodeVersion, "lts/*");
        assert.equal(options.playwrightVersion, "1.57.0");
        assert.equal(options.allureVersion, "2.24.0");
        assert.equal(options.testsDir, "");
        assert.equal(options.keepTestsDir, false);
        assert.equal(options.skipTestInstall, false);
        assert.equal(options.nxTarget, null);
        assert.equal(options.allureResultsPath, null);
        assert.equal(options.logLevel, "info");
        assert.deepEqual(options.nxExtraArgs, []);
    });

    it("reads overrides from the environment", () => {
        const options = loadRunOptions({
            HOME: "/home/tester",
            NVM_DIR: "/opt/nvm",
            TEST_SUITE: "overlay",
            TESTS_DIR: "/tmp/tests.fixed",
            KEEP_TESTS_DIR: "1",
            NX_TARGET: "chat-e2e:e2e:custom",
            ALLURE_RESULTS_PATH: "./custom-results",
            SKIP_TEST_INSTALL: "yes",
            LOG_LEVEL: "debug",
        });

        assert.equal(options.suite, "overlay");
        assert.equal(options.nvmDir, "/opt/nvm");
        assert.equal(options.testsDir, "/tmp/tests.fixed");
        assert.equal(options.keepTestsDir, true);
        assert.equal(options.nxTarget, "chat-e2e:e2e:custom");
        assert.equal(options.allureResultsPath, "./custom-results");
        assert.equal(options.skipTestInstall, true);
        assert.equal(options.logLevel, "debug");
    });

    it("treats empty variables as unset", () => {
        const options = loadRunOptions({
            HOME: "/home/tester",
            ARTIFACTS_DIR: "",
            TEST_SUITE: "",
            SKIP_TEST_INSTALL: "",
            KEEP_TESTS_DIR: "",
            NX_TARGET: "",
        });

        assert.equal(options.artifactsDir, "/tmp/reports");
        assert.equal(options.suite, "chat");
        assert.equal(options.skipTestInstall, false);
        assert.equal(options.keepTestsDir, false);
        assert.equal(options.nxTarget, null);
    });

    it("rejects an unknown log level", () => {
        assert.throws(() => loadRunOptions({ LOG_LEVEL: "verbose" }), {
            name: "ConfigError",
            code: "CONFIG_ERROR",
        });
    });
});

describe("parseBooleanFlag", () => {
    it("recognises false-like values", () => {
        for (const value of [undefined, "", "0", "false", "NO", "off"]) {
            assert.equal(parseBooleanFlag(value), false, String(value));
        }
    });

    it("treats any other value as true", () => {
        for (const value of ["1", "true", "yes", "2"]) {
            assert.equal(parseBooleanFlag(value), true, value);
        }
    });
});

describe("parseCliArgs", () => {
    it("applies flags on top of the defaults", () => {
        const parsed = parseCliArgs(
            ["--suite", "overlay", "--keep-tests-dir", "--dotenv", "apps/other/.env"],
            testOptions(),
        );

        assert.equal(parsed.kind, "run");
        if (parsed.kind === "run") {
            assert.equal(parsed.options.suite, "overlay");
            assert.equal(parsed.options.keepTestsDir, true);
            assert.equal(parsed.options.dotenvFile, "apps/other/.env");
            assert.deepEqual(parsed.options.nxExtraArgs, []);
        }
    });

    it("accepts inline values and lets the last flag win", () => {
        const parsed = parseCliArgs(
            ["--artifacts-dir=/out/one", "--tarball", "https://example.test/a.tgz", "--artifacts-dir", "/out/two"],
            testOptions(),
        );

        assert.equal(parsed.kind, "run");
        if (parsed.kind === "run") {
            assert.equal(parsed.options.artifactsDir, "/out/two");
            assert.equal(parsed.options.tarballUrl, "https://example.test/a.tgz");
        }
    });

    it("forwards unknown arguments and everything after --", () => {
        const parsed = parseCliArgs(
            ["--grep", "smoke", "--foo=bar", "--", "--suite", "ignored"],
            testOptions(),
        );

        assert.equal(parsed.kind, "run");
        if (parsed.kind === "run") {
            assert.equal(parsed.options.suite, "chat");
            assert.deepEqual(parsed.options.nxExtraArgs, ["--grep", "smoke", "--foo=bar", "--suite", "ignored"]);
        }
    });

    it("fails when a value flag has no value", () => {
        for (const flag of ["--suite", "--tarball", "--dotenv", "--artifacts-dir"]) {
            assert.throws(() => parseCliArgs([flag], testOptions()), {
                name: "UsageError",
                message: `${flag} requires a value`,
            });
        }
        assert.throws(() => parseCliArgs(["--suite="], testOptions()), {
            message: "--suite requires a value",
        });
    });

    it("stops at --help", () => {
        assert.deepEqual(parseCliArgs(["--help", "--suite"], testOptions()), { kind: "help" });
    });

    it("does not mutate the defaults", () => {
        const defaults = testOptions();
        parseCliArgs(["--suite", "overlay", "extra"], defaults);

        assert.equal(defaults.suite, "chat");
        assert.deepEqual(defaults.nxExtraArgs, []);
    });
});
