import { unrefTicker, type TickerFactory } from "../core/_shared/utils/ticker";

export const DEFAULT_COMMIT_INTERVAL_MS = 15 * 60 * 1000;
export const DEFAULT_POLL_INTERVAL_MS = 60 * 1000;
const DEFAULT_EXIT_CHECK_TIMEOUT_MS = 30 * 1000;

/** How the last check before exit ended; anything but "checked" leaves git work behind. */
export type ExitCheckOutcome = "checked" | "skipped_busy" | "timed_out";

export interface CommitClock {
  readonly lastCommitAtMs: number;
  readonly intervalMs: number;
}

export type CommitDecision =
  | { readonly didCommit: false; readonly clock: CommitClock }
  | { readonly didCommit: true; readonly clock: CommitClock; readonly error?: unknown };

export type CommitDelegate = (at: Date) => Promise<unknown>;

export function createCommitClock(
  startedAtMs: number,
  intervalMs: number = DEFAULT_COMMIT_INTERVAL_MS
): CommitClock {
  return { lastCommitAtMs: startedAtMs, intervalMs };
}

export function isCommitDue(clock: CommitClock, nowMs: number): boolean {
  return nowMs - clock.lastCommitAtMs >= clock.intervalMs;
}

/**
 * Time-gated, not success-gated: once due, the clock advances to `nowMs`
 * whether or not the delegate succeeds.
 */
export async function maybeCommit(
  clock: CommitClock,
  nowMs: number,
  delegate: CommitDelegate
): Promise<CommitDecision> {
  if (!isCommitDue(clock, nowMs)) {
    return { didCommit: false, clock };
  }

  const next: CommitClock = { ...clock, lastCommitAtMs: nowMs };
  try {
    await delegate(new Date(nowMs));
  } catch (error) {
    return { didCommit: true, clock: next, error };
  }
  return { didCommit: true, clock: next };
}

export interface AutoCommitSchedulerOptions {
  readonly delegate: CommitDelegate;
  readonly onError: (message: string) => void;
  readonly intervalMs?: number;
  readonly pollIntervalMs?: number;
  readonly now?: () => number;
  readonly shouldPoll?: () => boolean;
  readonly ticker?: TickerFactory;
}

export class AutoCommitScheduler {
  private readonly delegate: CommitDelegate;
  private readonly onError: (message: string) => void;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly shouldPoll: () => boolean;
  private readonly ticker: TickerFactory;
  private clock: CommitClock;
  private queue: Promise<void> = Promise.resolve();
  private pendingChecks = 0;
  private stopTicker: (() => void) | null = null;

  constructor(options: AutoCommitSchedulerOptions) {
    this.delegate = options.delegate;
    this.onError = options.onError;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => Date.now());
    this.shouldPoll = options.shouldPoll ?? (() => true);
    this.ticker = options.ticker ?? unrefTicker;
    this.clock = createCommitClock(this.now(), options.intervalMs ?? DEFAULT_COMMIT_INTERVAL_MS);
  }

  get commitClock(): CommitClock {
    return this.clock;
  }

  get isTicking(): boolean {
    return this.stopTicker !== null;
  }

  /** True while a check is queued or running. */
  get isBusy(): boolean {
    return this.pendingChecks > 0;
  }

  /** Checks run one at a time; `nowMs` defaults to the time the check actually runs. */
  check(nowMs?: number): Promise<boolean> {
    this.pendingChecks += 1;
    const next = this.queue.then(() => this.runCheck(nowMs ?? this.now()));
    this.queue = next.then(
      () => {
        this.pendingChecks -= 1;
      },
      () => {
        this.pendingChecks -= 1;
      }
    );
    return next;
  }

  /**
   * Last check on the way out. Never queues behind a check that is still in
   * flight, and stops waiting after `timeoutMs`; abandoned work keeps running
   * in the background but no longer holds up the caller.
   */
  async checkBeforeExit(
    timeoutMs: number = DEFAULT_EXIT_CHECK_TIMEOUT_MS
  ): Promise<ExitCheckOutcome> {
    if (this.isBusy) {
      return "skipped_busy";
    }
    let cancelTimer: () => void = () => undefined;
    const timedOut = new Promise<ExitCheckOutcome>((resolve) => {
      const handle = setTimeout(() => resolve("timed_out"), timeoutMs);
      cancelTimer = () => clearTimeout(handle);
    });
    try {
      return await Promise.race([
        this.check().then((): ExitCheckOutcome => "checked"),
        timedOut,
      ]);
    } finally {
      cancelTimer();
    }
  }

  flush(): Promise<void> {
    return this.queue;
  }

  start(): void {
    if (this.stopTicker) {
      return;
    }
    this.stopTicker = this.ticker(() => this.tick(), this.pollIntervalMs);
  }

  stop(): void {
    this.stopTicker?.();
    this.stopTicker = null;
  }

  private tick(): void {
    if (!this.shouldPoll()) {
      return;
    }
    this.check().catch((error: unknown) => {
      this.onError(`background commit check failed: ${describe(error)}`);
    });
  }

  private async runCheck(nowMs: number): Promise<boolean> {
    const decision = await maybeCommit(this.clock, nowMs, this.delegate);
    this.clock = decision.clock;
    if (decision.didCommit && "error" in decision) {
      this.onError(`auto-commit failed: ${describe(decision.error)}`);
    }
    return decision.didCommit;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
