/**
 * Intent: interactive wiring: commands read line by line, quit and end of input both persist an active session.
 * Non-Goals: terminal rendering of the elapsed line.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import { runTracker } from "../../../runtime/cli/run_tracker";
import type { TrackerIo } from "../../../runtime/cli/tracker.io";
import type { TrackerConfig } from "../../../runtime/config/tracker.config";
import type { VcsCollaborator } from "../../../runtime/vcs/git.collaborator";

function makeTempDir(t: test.TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "run-tracker-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}

function configFor(dir: string): TrackerConfig {
  return {
    dataFile: path.join(dir, "time_data.json"),
    repoPath: dir,
    commitIntervalMs: 15 * 60 * 1000,
    pollIntervalMs: 60 * 1000,
    autoCommit: true,
  };
}

function captureIo(): TrackerIo & { readonly logs: string[] } {
  const logs: string[] = [];
  return {
    logs,
    log: (message) => logs.push(message),
    error: (message) => logs.push(message),
  };
}

function idleVcs(): VcsCollaborator & { readonly probes: string[] } {
  const probes: string[] = [];
  return {
    probes,
    isRepository: async () => {
      probes.push("isRepository");
      return false;
    },
    hasPendingChanges: async () => false,
    commitAndPush: async () => {
      throw new Error("not expected");
    },
  };
}

function readRecord(dataFile: string): { sessions: unknown[]; last_session: unknown } {
  return JSON.parse(fs.readFileSync(dataFile, "utf8")) as {
    sessions: unknown[];
    last_session: unknown;
  };
}

test("runTracker: start then quit records one session and says goodbye", async (t) => {
  const dir = makeTempDir(t);
  const config = configFor(dir);
  const io = captureIo();
  const vcs = idleVcs();
  const input = new PassThrough();

  const running = runTracker(config, {
    io,
    vcs,
    input,
    output: new PassThrough(),
    displayTicker: () => () => undefined,
  });
  input.write("start\n");
  input.write("stats\n");
  input.write("quit\n");
  await running;

  const record = readRecord(config.dataFile);
  assert.equal(record.sessions.length, 1);
  assert.notEqual(record.last_session, null);
  assert.ok(io.logs.includes("\nStopping active session..."));
  assert.equal(io.logs.at(-1), "\nGoodbye!");
  assert.deepEqual(vcs.probes, []);
});

test("runTracker: end of input while running stops the session before exit", async (t) => {
  const dir = makeTempDir(t);
  const config = configFor(dir);
  const io = captureIo();
  const input = new PassThrough();

  const running = runTracker(config, {
    io,
    vcs: idleVcs(),
    input,
    output: new PassThrough(),
    displayTicker: () => () => undefined,
  });
  input.end("start\n");
  await running;

  assert.equal(readRecord(config.dataFile).sessions.length, 1);
  assert.equal(io.logs.at(-1), "\nGoodbye!");
});

test("runTracker: a corrupt data file is reported and replaced on the next save", async (t) => {
  const dir = makeTempDir(t);
  const config = configFor(dir);
  fs.writeFileSync(config.dataFile, "not json", "utf8");
  const io = captureIo();
  const input = new PassThrough();

  const running = runTracker(
    { ...config, autoCommit: false },
    { io, vcs: idleVcs(), input, output: new PassThrough(), displayTicker: () => () => undefined }
  );
  input.write("start\n");
  input.write("stop\n");
  input.write("quit\n");
  await running;

  assert.ok(
    io.logs.some(
      (line) =>
        line.startsWith(`[info] E_STORE_UNREADABLE ${config.dataFile}:`) &&
        line.endsWith("; starting from an empty session log")
    )
  );
  assert.ok(io.logs.includes("[info] Auto-commit disabled."));
  assert.equal(readRecord(config.dataFile).sessions.length, 1);
});

test("runTracker: quit does not wait for a commit that never finishes", async (t) => {
  const dir = makeTempDir(t);
  const config = { ...configFor(dir), commitIntervalMs: 1 };
  const io = captureIo();
  const input = new PassThrough();
  let commitCalls = 0;
  let markCommitStarted: () => void = () => undefined;
  const commitStarted = new Promise<void>((resolve) => {
    markCommitStarted = resolve;
  });
  const stalledVcs: VcsCollaborator = {
    isRepository: async () => true,
    hasPendingChanges: async () => true,
    commitAndPush: () => {
      commitCalls += 1;
      markCommitStarted();
      return new Promise<never>(() => undefined);
    },
  };

  const running = runTracker(config, {
    io,
    vcs: stalledVcs,
    input,
    output: new PassThrough(),
    displayTicker: () => () => undefined,
  });
  input.write("start\n");
  await new Promise((resolve) => setTimeout(resolve, 5));
  input.write("stop\n");
  await commitStarted;
  input.write("start\n");
  input.write("quit\n");
  await running;
  input.end();

  assert.equal(commitCalls, 1);
  assert.equal(readRecord(config.dataFile).sessions.length, 2);
  assert.ok(
    io.logs.includes("[info] An auto-commit is still running; exiting without waiting for it.")
  );
  assert.equal(io.logs.at(-1), "\nGoodbye!");
});

test("runTracker: end of input after a stalled commit still exits", async (t) => {
  const dir = makeTempDir(t);
  const config = { ...configFor(dir), commitIntervalMs: 1 };
  const io = captureIo();
  const input = new PassThrough();
  let markCommitStarted: () => void = () => undefined;
  const commitStarted = new Promise<void>((resolve) => {
    markCommitStarted = resolve;
  });

  const running = runTracker(config, {
    io,
    vcs: {
      isRepository: async () => true,
      hasPendingChanges: async () => true,
      commitAndPush: () => {
        markCommitStarted();
        return new Promise<never>(() => undefined);
      },
    },
    input,
    output: new PassThrough(),
    displayTicker: () => () => undefined,
  });
  input.write("start\n");
  await new Promise((resolve) => setTimeout(resolve, 5));
  input.write("stop\n");
  await commitStarted;
  input.end("start\n");
  await running;

  assert.equal(readRecord(config.dataFile).sessions.length, 2);
  assert.equal(io.logs.at(-1), "\nGoodbye!");
});
