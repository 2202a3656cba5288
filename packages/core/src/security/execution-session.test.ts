import test from "node:test";
import assert from "node:assert/strict";
import { ExecutionSession, setupCommandsFor } from "./execution-session.js";
import { RetryPolicy } from "../faults/retry-policy.js";
import { FaultError } from "../faults/fault-error.js";
import { createSilentLogger } from "../utils/logger.js";
import { FakeSandboxProvider, ok } from "../testing/fakes.js";
import type { Sandbox, SandboxProvider } from "./sandbox.js";

const logger = createSilentLogger();
const retry = new RetryPolicy({ sleep: async () => {} });
const action = { command: "bash", args: ["make test"], raw: "make test", thought: "" };

test("setup clones when needed, checks out the commit, then runs the environment's commands", () => {
    assert.deepEqual(setupCommandsFor({ repo: "https://example.test/r.git", commit: "abc123", setupCommands: ["pip install -e ."] }), [
        "[ -d .git ] || git clone --quiet https://example.test/r.git .",
        "git checkout --quiet --force abc123 && git clean -fdq",
        "pip install -e .",
    ]);
    assert.deepEqual(setupCommandsFor({}), []);
});

test("a non-zero exit status is a normal result", async () => {
    const provider = new FakeSandboxProvider(() => ({ stdout: "", stderr: "2 failed\n", exitCode: 1 }));
    const session = await ExecutionSession.open(provider, {}, { retry, logger });

    const result = await session.execute(action, "make test");

    assert.deepEqual(
        { output: result.output, exitStatus: result.exitStatus, truncated: result.truncated, fault: result.fault },
        { output: "2 failed", exitStatus: 1, truncated: false, fault: undefined }
    );
    await session.close();
});

test("long output keeps its tail behind a truncation notice", async () => {
    const lines = Array.from({ length: 10 }, (_, i) => String(i + 1)).join("\n");
    const provider = new FakeSandboxProvider(() => ok(`${lines}\n`));
    const session = await ExecutionSession.open(provider, {}, { retry, logger, output: { maxLines: 3 } });

    const result = await session.execute(action, "seq 10");

    assert.equal(result.truncated, true);
    assert.equal(result.output, "[output truncated: showing the last 3 of 10 lines (20B total)]\n8\n9\n10");
    await session.close();
});

test("transient faults are retried and then reported in the result", async () => {
    let calls = 0;
    const provider = new FakeSandboxProvider(() => {
        calls += 1;
        throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    });
    const session = await ExecutionSession.open(provider, {}, { retry, logger });

    const result = await session.execute(action, "make test");

    assert.equal(calls, 3);
    assert.equal(result.exitStatus, null);
    assert.deepEqual(result.fault, { kind: "transient-network", message: "socket hang up", code: "ECONNRESET" });
    await session.close();
});

test("installed tools are uploaded and put on the PATH", async () => {
    const provider = new FakeSandboxProvider();
    const session = await ExecutionSession.open(provider, { workdir: "/repo" }, { retry, logger });

    await session.installTools([{ path: ".patchloop/bin/view", content: "#!/bin/sh\n", mode: 0o755 }], ".patchloop/bin");
    await session.execute(action, "view a.py");

    const sandbox = provider.sandboxes[0];
    assert.equal(sandbox?.files.get(".patchloop/bin/view")?.mode, 0o755);
    assert.deepEqual(sandbox?.scripts, ['export PATH=/repo/.patchloop/bin:"$PATH"\nview a.py']);
    await session.close();
});

test("a failing setup command is fatal to the session", async () => {
    const provider = new FakeSandboxProvider((command) => (command.startsWith("pip") ? { stdout: "", stderr: "no such package", exitCode: 1 } : ok()));
    const session = await ExecutionSession.open(provider, { setupCommands: ["pip install nope"] }, { retry, logger });

    await assert.rejects(session.reset(), (error: unknown) => {
        assert.ok(error instanceof FaultError);
        assert.equal(error.kind, "session-fatal");
        assert.match(error.message, /^Setup command failed \(exit 1\): pip install nope/);
        return true;
    });
    await session.close();
});

test("a sandbox that cannot be created is session-fatal", async () => {
    const provider: SandboxProvider = {
        name: "broken",
        createSandbox: () => Promise.reject(new Error("image not found")),
    };

    await assert.rejects(ExecutionSession.open(provider, {}, { retry, logger }), (error: unknown) => {
        assert.ok(error instanceof FaultError);
        assert.equal(error.kind, "session-fatal");
        assert.equal(error.message, "Could not open broken sandbox: image not found");
        return true;
    });
});

test("close is idempotent and a closed session refuses work", async () => {
    const provider = new FakeSandboxProvider();
    const session = await ExecutionSession.open(provider, {}, { retry, logger });

    await Promise.all([session.close(), session.close()]);

    assert.equal(session.isClosed, true);
    assert.equal(provider.sandboxes[0]?.destroyed, true);
    await assert.rejects(session.execute(action, "ls"), /Execution session is closed/);
});

test("close gives up on a sandbox that does not go away within the grace period", async () => {
    const stuck: Sandbox = {
        id: "stuck",
        workdir: "/w",
        exec: async () => ok(),
        upload: async () => {},
        destroy: () => new Promise<void>(() => {}),
    };
    const provider: SandboxProvider = { name: "stuck", createSandbox: async () => stuck };
    const session = await ExecutionSession.open(provider, {}, { retry, logger, closeGraceMs: 20 });

    await session.close();
    assert.equal(session.isClosed, true);
});
