import readline from "node:readline";
import { pathToFileURL } from "node:url";
import { AutoCommitScheduler } from "../../src/commit/auto_commit.scheduler";
import { ERROR_CODES } from "../../src/core/errors/canonical_error_codes";
import { nodeTicker, type TickerFactory } from "../../src/core/_shared/utils/ticker";
import { FileSessionStore } from "../../src/session/file_session.store";
import { SessionLifecycleController } from "../../src/session/session.lifecycle";
import { ConfigurationError } from "../config/config.errors";
import { resolveTrackerConfig, type TrackerConfig } from "../config/tracker.config";
import { ERROR_POLICY_REGISTRY, asMessage, formatNotice } from "../error";
import { runAutoCommit } from "../vcs/auto_commit.delegate";
import { createSimpleGitClient } from "../vcs/git.client";
import { GitCollaborator, type VcsCollaborator } from "../vcs/git.collaborator";
import { parseRunTrackerArgs, usage } from "./run_tracker.args";
import { consoleIo, type TrackerIo } from "./tracker.io";
import { IDLE_PROMPT, TrackerShell, bannerLines } from "./tracker.shell";

const DISPLAY_REFRESH_MS = 1000;

export interface RunTrackerDeps {
  readonly io?: TrackerIo;
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
  readonly vcs?: VcsCollaborator;
  readonly displayTicker?: TickerFactory;
}

/** Wires store, controller, scheduler and shell, then runs until quit, interrupt or end of input. */
export function runTracker(config: TrackerConfig, deps: RunTrackerDeps = {}): Promise<void> {
  const io = deps.io ?? consoleIo;
  const store = new FileSessionStore(config.dataFile, {
    onError: (message) => io.log(formatNotice(ERROR_CODES.E_STORE_UNREADABLE, message)),
  });
  const controller = new SessionLifecycleController({ store });

  const vcs = deps.vcs ?? new GitCollaborator(createSimpleGitClient(config.repoPath));
  const scheduler = config.autoCommit
    ? new AutoCommitScheduler({
        delegate: (at) => runAutoCommit(vcs, at, io),
        intervalMs: config.commitIntervalMs,
        pollIntervalMs: config.pollIntervalMs,
        shouldPoll: () => controller.state === "idle",
        onError: (message) => io.error(formatNotice(ERROR_CODES.E_VCS_COMMIT_FAILED, message)),
      })
    : undefined;
  const shell = new TrackerShell({ controller, io, scheduler });

  for (const line of bannerLines()) {
    io.log(line);
  }
  io.log(`[session] data file ${store.filePath} (${controller.getLog().sessions.length} sessions)`);
  if (!scheduler) {
    io.log("[info] Auto-commit disabled.");
  }

  let inputClosed = false;
  const output = deps.output ?? process.stdout;
  const interactive = "isTTY" in output && output.isTTY === true;
  const rl = readline.createInterface({
    input: deps.input ?? process.stdin,
    output,
    prompt: IDLE_PROMPT,
  });
  const refreshPrompt = (): void => {
    rl.setPrompt(shell.promptText());
  };
  // Redraws prompt and typed text in place; piped output gets no redraws.
  const stopDisplay = (deps.displayTicker ?? nodeTicker)(() => {
    if (!interactive || inputClosed || controller.state !== "running") {
      return;
    }
    refreshPrompt();
    rl.prompt(true);
  }, DISPLAY_REFRESH_MS);
  scheduler?.start();

  return new Promise<void>((resolve) => {
    let finished = false;
    let pending: Promise<void> = Promise.resolve();

    const finish = (): void => {
      if (finished) {
        return;
      }
      finished = true;
      stopDisplay();
      scheduler?.stop();
      if (!inputClosed) {
        inputClosed = true;
        rl.close();
      }
      resolve();
    };

    const enqueue = (task: () => Promise<void>): void => {
      pending = pending.then(task).catch((error: unknown) => {
        io.error(`[warning] ${asMessage(error)}`);
      });
    };

    const shutdown = (): void =>
      enqueue(async () => {
        if (finished) {
          return;
        }
        await shell.shutdown();
        finish();
      });

    rl.on("line", (line) =>
      enqueue(async () => {
        if (finished) {
          return;
        }
        const outcome = await shell.execute(line);
        if (outcome === "exit") {
          finish();
          return;
        }
        if (!inputClosed) {
          refreshPrompt();
          rl.prompt();
        }
      })
    );
    rl.on("SIGINT", shutdown);
    rl.on("close", () => {
      inputClosed = true;
      shutdown();
    });
    rl.prompt();
  });
}

async function main(): Promise<void> {
  try {
    const args = parseRunTrackerArgs(process.argv.slice(2));
    if (args.help) {
      console.log(usage());
      return;
    }
    await runTracker(resolveTrackerConfig(args));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`tracker configuration error: ${error.message}`);
      process.exitCode = ERROR_POLICY_REGISTRY[error.errorCode].cliExitCode;
      return;
    }
    console.error(`tracker failed: ${asMessage(error)}`);
    process.exitCode = 1;
  }
}

function isEntrypoint(): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return import.meta.url === pathToFileURL(scriptPath).href;
}

if (isEntrypoint()) {
  await main();
}
