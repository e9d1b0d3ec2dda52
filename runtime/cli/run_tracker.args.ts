import { ConfigurationError } from "../config/config.errors";

export interface RunTrackerArgs {
  readonly dataFile?: string;
  readonly repoPath?: string;
  readonly commitIntervalMinutes?: string;
  readonly pollIntervalSeconds?: string;
  readonly autoCommit?: boolean;
  readonly help: boolean;
}

const VALUE_FLAGS = {
  "--data-file": "dataFile",
  "--repo": "repoPath",
  "--commit-interval": "commitIntervalMinutes",
  "--poll-interval": "pollIntervalSeconds",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(token: string): token is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, token);
}

export function usage(): string {
  return [
    "Usage: tracker [options]",
    "  --data-file <path>        session data file (default: time_data.json)",
    "  --repo <path>             git repository to auto-commit (default: cwd)",
    "  --commit-interval <min>   minutes between auto-commits (default: 15)",
    "  --poll-interval <sec>     seconds between background checks (default: 60)",
    "  --no-auto-commit          never run git",
    "  -h, --help                show this message",
  ].join("\n");
}

export function parseRunTrackerArgs(argv: readonly string[]): RunTrackerArgs {
  const values: { -readonly [K in (typeof VALUE_FLAGS)[ValueFlag]]?: string } = {};
  let autoCommit: boolean | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined || token === "--") {
      continue;
    }
    if (token === "-h" || token === "--help") {
      help = true;
      continue;
    }
    if (token === "--no-auto-commit") {
      autoCommit = false;
      continue;
    }
    if (isValueFlag(token)) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.trim() === "" || next.startsWith("--")) {
        throw new ConfigurationError(`CONFIGURATION_ERROR ${token} requires a value`);
      }
      values[VALUE_FLAGS[token]] = next.trim();
      i += 1;
      continue;
    }
    throw new ConfigurationError(`CONFIGURATION_ERROR unknown option "${token}". ${usage()}`);
  }

  return { ...values, autoCommit, help };
}
