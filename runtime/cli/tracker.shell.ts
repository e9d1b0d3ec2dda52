import type { AutoCommitScheduler } from "../../src/commit/auto_commit.scheduler";
import { ERROR_CODES } from "../../src/core/errors/canonical_error_codes";
import type { SessionLifecycleController, StopResult } from "../../src/session/session.lifecycle";
import { aggregateSessions } from "../../src/stats/statistics.aggregator";
import { renderStatisticsReport } from "../../src/stats/statistics.render";
import { formatDuration } from "../../src/time/duration.format";
import { formatLocalDateTime } from "../../src/time/local_time";
import { asMessage, formatNotice } from "../error";
import type { TrackerIo } from "./tracker.io";

export const TRACKER_COMMANDS = ["start", "stop", "stats", "quit"] as const;

export type TrackerCommand = (typeof TRACKER_COMMANDS)[number];

export type ShellOutcome = "continue" | "exit";

export const IDLE_PROMPT = "> ";

export const UNKNOWN_COMMAND_MESSAGE = "Unknown command. Use 'start', 'stop', 'stats', or 'quit'";

function isTrackerCommand(value: string): value is TrackerCommand {
  return (TRACKER_COMMANDS as readonly string[]).includes(value);
}

/** `null` for blank input, `"unknown"` for anything that is not a command. */
export function parseCommand(line: string): TrackerCommand | "unknown" | null {
  const normalized = line.trim().toLowerCase();
  if (normalized === "") {
    return null;
  }
  return isTrackerCommand(normalized) ? normalized : "unknown";
}

export function bannerLines(): string[] {
  const rule = "=".repeat(60);
  return [
    rule,
    "NIGHT SESSION TRACKER",
    rule,
    "Commands:",
    "  start  - Start tracking time",
    "  stop   - Stop tracking and save session",
    "  stats  - Show statistics",
    "  quit   - Exit the tracker",
    rule,
  ];
}

export interface TrackerShellDeps {
  readonly controller: SessionLifecycleController;
  readonly io: TrackerIo;
  /** Absent when auto-commit is disabled. */
  readonly scheduler?: AutoCommitScheduler;
  /** Upper bound on the commit check run by quit, interrupt and end of input. */
  readonly exitCheckTimeoutMs?: number;
}

export class TrackerShell {
  private readonly controller: SessionLifecycleController;
  private readonly io: TrackerIo;
  private readonly scheduler?: AutoCommitScheduler;
  private readonly exitCheckTimeoutMs?: number;

  constructor(deps: TrackerShellDeps) {
    this.controller = deps.controller;
    this.io = deps.io;
    this.scheduler = deps.scheduler;
    this.exitCheckTimeoutMs = deps.exitCheckTimeoutMs;
  }

  async execute(line: string): Promise<ShellOutcome> {
    const command = parseCommand(line);
    switch (command) {
      case null:
        return "continue";
      case "start":
        this.start();
        return "continue";
      case "stop":
        if (this.stop()) {
          this.requestCommitCheck();
        }
        return "continue";
      case "stats":
        this.stats();
        return "continue";
      case "quit":
        await this.shutdown();
        return "exit";
      case "unknown":
        this.io.log(UNKNOWN_COMMAND_MESSAGE);
        return "continue";
    }
  }

  /**
   * Implicit stop and a bounded commit check, used by quit, interrupt and end
   * of input. A commit already in flight is left behind rather than awaited.
   */
  async shutdown(): Promise<void> {
    if (this.controller.state === "running") {
      this.io.log("\nStopping active session...");
      if (this.stop() && this.scheduler) {
        const outcome = await this.scheduler.checkBeforeExit(this.exitCheckTimeoutMs);
        if (outcome === "skipped_busy") {
          this.io.log("[info] An auto-commit is still running; exiting without waiting for it.");
        } else if (outcome === "timed_out") {
          this.io.log("[info] Auto-commit did not finish in time; exiting without waiting for it.");
        }
      }
    }
    this.io.log("\nGoodbye!");
  }

  elapsedLine(): string | null {
    const elapsed = this.controller.elapsedSeconds();
    if (elapsed === null) {
      return null;
    }
    return `[Running] Elapsed: ${formatDuration(elapsed)}`;
  }

  /** The elapsed line rides in the prompt so redraws never overwrite typed input. */
  promptText(): string {
    const elapsed = this.elapsedLine();
    return elapsed === null ? IDLE_PROMPT : `${elapsed} ${IDLE_PROMPT}`;
  }

  private start(): void {
    const result = this.controller.start();
    if (!result.ok) {
      this.io.log(formatNotice(ERROR_CODES.E_USER_MISUSE, "Session is already running!"));
      return;
    }
    this.io.log(`Started tracking at ${formatLocalDateTime(result.startedAt)}`);
    this.io.log("Type 'stop' to end the session, or Ctrl+C to exit");
  }

  private stop(): boolean {
    let result: StopResult;
    try {
      result = this.controller.stop();
    } catch (error) {
      this.io.error(`[warning] Could not save session: ${asMessage(error)}`);
      return false;
    }
    if (!result.ok) {
      this.io.log(formatNotice(ERROR_CODES.E_USER_MISUSE, "No active session to stop!"));
      return false;
    }
    const { session, endedAt } = result;
    this.io.log(`\nSession ended at ${formatLocalDateTime(endedAt)}`);
    this.io.log(`Duration: ${formatDuration(session.durationSeconds)}`);
    this.io.log(`Date (night): ${session.nightKey}`);
    return true;
  }

  private stats(): void {
    const lines = renderStatisticsReport(aggregateSessions(this.controller.getLog().sessions));
    this.io.log(`\n${lines.join("\n")}`);
  }

  // Runs on the scheduler's queue so a slow push never holds up the prompt.
  private requestCommitCheck(): void {
    this.scheduler?.check().catch((error: unknown) => {
      this.io.error(formatNotice(ERROR_CODES.E_VCS_COMMIT_FAILED, asMessage(error)));
    });
  }
}
