import assert from "node:assert/strict";
import { chmod, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import {
    createProcessRunner,
    findExecutable,
    formatCommand,
    isExecutableFile,
    toExitCode,
} from "./process-runner.ts";

describe("toExitCode", () => {
    it("passes exit codes through", () => {
        assert.equal(toExitCode(0, null), 0);
        assert.equal(toExitCode(3, null), 3);
    });

    it("maps termination signals to 128 + signal number", () => {
        assert.equal(toExitCode(null, "SIGINT"), 130);
        assert.equal(toExitCode(null, "SIGTERM"), 143);
    });

    it("treats a missing status as a failure", () => {
        assert.equal(toExitCode(null, null), 1);
    });
});

describe("formatCommand", () => {
    it("joins the command and its arguments", () => {
        assert.equal(
            formatCommand({ command: "npx", args: ["nx", "run", "chat-e2e:e2e:chat"] }),
            "npx nx run chat-e2e:e2e:chat",
        );
    });
});

describe("findExecutable", () => {
    let root: string;
    let binDir: string;
    let otherDir: string;

    before(async () => {
        root = await mkdtemp(path.join(tmpdir(), "e2e-harness-path-"));
        binDir = path.join(root, "bin");
        otherDir = path.join(root, "other");
        await mkdir(binDir);
        await mkdir(otherDir);
        await writeFile(path.join(binDir, "curl"), "#!/bin/sh\n");
        await chmod(path.join(binDir, "curl"), 0o755);
        await writeFile(path.join(otherDir, "tar"), "plain file\n");
        await chmod(path.join(otherDir, "tar"), 0o644);
        await mkdir(path.join(otherDir, "java"));
    });

    after(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it("finds executables on PATH", () => {
        const env = { PATH: [otherDir, binDir].join(path.delimiter) };
        assert.equal(findExecutable("curl", env), path.join(binDir, "curl"));
    });

    it("ignores files without the executable bit and directories", () => {
        const env = { PATH: [otherDir, binDir].join(path.delimiter) };
        assert.equal(findExecutable("tar", env), null);
        assert.equal(findExecutable("java", env), null);
    });

    it("checks paths directly when the command has a separator", () => {
        assert.equal(findExecutable(path.join(binDir, "curl"), { PATH: "" }), path.join(binDir, "curl"));
        assert.equal(isExecutableFile(path.join(binDir, "missing")), false);
    });

    it("returns null with an empty PATH", () => {
        assert.equal(findExecutable("curl", {}), null);
    });
});

describe("createProcessRunner", () => {
    const sh = (script: string) => ({ command: "sh", args: ["-c", script] });

    it("resolves run with the child's exit code", async () => {
        assert.equal(await createProcessRunner().run(sh("exit 5")), 5);
    });

    it("resolves a missing command with 127", async () => {
        const exitCode = await createProcessRunner().run({ command: "e2e-harness-no-such-command", args: [] });

        assert.equal(exitCode, 127);
    });

    it("maps a child killed by a signal to 128 + signal number", async () => {
        assert.equal(await createProcessRunner().run(sh("kill -TERM $$")), 143);
    });

    it("captures stdout and stderr", async () => {
        const result = await createProcessRunner().capture(sh("printf out; printf err >&2; exit 4"));

        assert.deepEqual(result, { exitCode: 4, stdout: "out", stderr: "err" });
    });

    it("succeeds when both sides of the pipe succeed", async () => {
        const result = await createProcessRunner().pipe(sh("printf data"), sh("cat > /dev/null"));

        assert.deepEqual(result, { exitCode: 0 });
    });

    it("reports a failing producer", async () => {
        const result = await createProcessRunner().pipe(sh("exit 22"), { command: "cat", args: [] });

        assert.deepEqual(result, { exitCode: 22, failedCommand: "sh -c exit 22" });
    });

    it("reports a failing consumer ahead of the producer", async () => {
        const result = await createProcessRunner().pipe(sh("printf data; exit 6"), sh("cat > /dev/null; exit 3"));

        assert.deepEqual(result, { exitCode: 3, failedCommand: "sh -c cat > /dev/null; exit 3" });
    });

    it("stops the producer when the consumer exits early", { timeout: 20_000 }, async () => {
        const result = await createProcessRunner().pipe(sh("head -c 50000000 /dev/zero"), sh("exit 2"));

        assert.deepEqual(result, { exitCode: 2, failedCommand: "sh -c exit 2" });
    });

    it("terminates running children when aborted", async () => {
        const controller = new AbortController();
        const runner = createProcessRunner({ signal: controller.signal });

        const pending = runner.run(sh("exec sleep 30"));
        controller.abort();

        assert.equal(await pending, 143);
    });

    it("terminates children started after the abort", async () => {
        const controller = new AbortController();
        controller.abort();

        const exitCode = await createProcessRunner({ signal: controller.signal }).run(sh("exec sleep 30"));

        assert.equal(exitCode, 143);
    });
});
