import path from "node:path";
import { DEFAULT_DATA_FILENAME } from "../../src/session/file_session.store";
import { ConfigurationError } from "./config.errors";

const DEFAULT_COMMIT_INTERVAL_MINUTES = 15;
const DEFAULT_POLL_INTERVAL_SECONDS = 60;

export const TRACKER_ENV = {
  DATA_FILE: "TIME_TRACKER_DATA_FILE",
  REPO: "TIME_TRACKER_REPO",
  COMMIT_INTERVAL_MINUTES: "TIME_TRACKER_COMMIT_INTERVAL_MINUTES",
  POLL_SECONDS: "TIME_TRACKER_POLL_SECONDS",
  AUTO_COMMIT: "TIME_TRACKER_AUTO_COMMIT",
} as const;

export interface TrackerConfig {
  readonly dataFile: string;
  readonly repoPath: string;
  readonly commitIntervalMs: number;
  readonly pollIntervalMs: number;
  readonly autoCommit: boolean;
}

export interface TrackerConfigInput {
  readonly dataFile?: string;
  readonly repoPath?: string;
  readonly commitIntervalMinutes?: string;
  readonly pollIntervalSeconds?: string;
  readonly autoCommit?: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

function firstNonEmpty(...candidates: Array<string | undefined>): string | undefined {
  for (const candidate of candidates) {
    if (typeof candidate === "string" && candidate.trim() !== "") {
      return candidate.trim();
    }
  }
  return undefined;
}

function parsePositive(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `CONFIGURATION_ERROR ${name} must be a positive number (got "${raw}")`
    );
  }
  return parsed;
}

function parseSwitch(raw: string | undefined, name: string): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const lowered = raw.toLowerCase();
  if (["1", "true", "on", "yes"].includes(lowered)) {
    return true;
  }
  if (["0", "false", "off", "no"].includes(lowered)) {
    return false;
  }
  throw new ConfigurationError(`CONFIGURATION_ERROR ${name} must be a boolean (got "${raw}")`);
}

/** Flags win over environment, environment over defaults. */
export function resolveTrackerConfig(
  input: TrackerConfigInput,
  env: Env = process.env,
  cwd: string = process.cwd()
): TrackerConfig {
  const repoPath = path.resolve(cwd, firstNonEmpty(input.repoPath, env[TRACKER_ENV.REPO]) ?? ".");
  const dataFile = path.resolve(
    repoPath,
    firstNonEmpty(input.dataFile, env[TRACKER_ENV.DATA_FILE]) ?? DEFAULT_DATA_FILENAME
  );

  const commitIntervalMinutes = parsePositive(
    firstNonEmpty(input.commitIntervalMinutes, env[TRACKER_ENV.COMMIT_INTERVAL_MINUTES]),
    DEFAULT_COMMIT_INTERVAL_MINUTES,
    "commit interval"
  );
  const pollIntervalSeconds = parsePositive(
    firstNonEmpty(input.pollIntervalSeconds, env[TRACKER_ENV.POLL_SECONDS]),
    DEFAULT_POLL_INTERVAL_SECONDS,
    "poll interval"
  );
  const autoCommit =
    input.autoCommit ??
    parseSwitch(firstNonEmpty(env[TRACKER_ENV.AUTO_COMMIT]), TRACKER_ENV.AUTO_COMMIT) ??
    true;

  return {
    dataFile,
    repoPath,
    commitIntervalMs: Math.round(commitIntervalMinutes * 60 * 1000),
    pollIntervalMs: Math.round(pollIntervalSeconds * 1000),
    autoCommit,
  };
}
