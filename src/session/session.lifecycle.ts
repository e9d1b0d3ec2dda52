import { toDurationHours } from "../time/duration.format";
import { formatLocalIsoTimestamp } from "../time/local_time";
import { nightKey } from "../time/night_key";
import type { Session, SessionLog, SessionStore } from "./session.types";

export type LifecycleState = "idle" | "running";

export type StartResult =
  | { readonly ok: true; readonly startedAt: Date }
  | { readonly ok: false; readonly reason: "already_running"; readonly startedAt: Date };

export type StopResult =
  | { readonly ok: true; readonly session: Session; readonly endedAt: Date; readonly log: SessionLog }
  | { readonly ok: false; readonly reason: "not_running" };

export interface SessionLifecycleOptions {
  readonly store: SessionStore;
  readonly now?: () => Date;
  readonly initialLog?: SessionLog;
}

export function buildSession(startedAt: Date, endedAt: Date): Session {
  const elapsedMs = endedAt.getTime() - startedAt.getTime();
  const durationSeconds = Math.max(0, Math.trunc(elapsedMs / 1000));
  return Object.freeze({
    start: formatLocalIsoTimestamp(startedAt),
    end: formatLocalIsoTimestamp(endedAt),
    durationSeconds,
    durationHours: toDurationHours(durationSeconds),
    nightKey: nightKey(startedAt),
  });
}

/**
 * Start/stop state machine over the session log. Misuse (start while running,
 * stop while idle) leaves state untouched and is reported through the result.
 */
export class SessionLifecycleController {
  private readonly store: SessionStore;
  private readonly now: () => Date;
  private log: SessionLog;
  private startedAt: Date | null = null;

  constructor(options: SessionLifecycleOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.log = options.initialLog ?? this.store.load();
  }

  get state(): LifecycleState {
    return this.startedAt === null ? "idle" : "running";
  }

  get runningSince(): Date | null {
    return this.startedAt;
  }

  getLog(): SessionLog {
    return this.log;
  }

  start(): StartResult {
    if (this.startedAt !== null) {
      return { ok: false, reason: "already_running", startedAt: this.startedAt };
    }
    const startedAt = this.now();
    this.startedAt = startedAt;
    return { ok: true, startedAt };
  }

  stop(): StopResult {
    const startedAt = this.startedAt;
    if (startedAt === null) {
      return { ok: false, reason: "not_running" };
    }

    const endedAt = this.now();
    const session = buildSession(startedAt, endedAt);
    this.log = this.store.append(this.log, session);
    this.startedAt = null;
    return { ok: true, session, endedAt, log: this.log };
  }

  elapsedSeconds(): number | null {
    if (this.startedAt === null) {
      return null;
    }
    const elapsedMs = this.now().getTime() - this.startedAt.getTime();
    return Math.max(0, Math.trunc(elapsedMs / 1000));
  }
}
