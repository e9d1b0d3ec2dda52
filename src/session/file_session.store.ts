import fs from "node:fs";
import path from "node:path";
import { ERROR_CODES, type ErrorCode } from "../core/errors/canonical_error_codes";
import { toDurationHours } from "../time/duration.format";
import {
  emptySessionLog,
  type RetainedRecord,
  type Session,
  type SessionLog,
  type SessionLogRecord,
  type SessionRecord,
  type SessionStore,
} from "./session.types";

export const DEFAULT_DATA_FILENAME = "time_data.json";

const EMPTY_LOG_NOTE = "starting from an empty session log";

interface SessionStoreFs {
  readFileSync(path: string, encoding: BufferEncoding): string;
  writeFileSync(path: string, data: string, encoding: BufferEncoding): void;
  renameSync(oldPath: string, newPath: string): void;
  mkdirSync(path: string, options?: { recursive?: boolean }): void;
}

export interface FileSessionStoreOptions {
  readonly fsImpl?: SessionStoreFs;
  readonly onError?: (message: string) => void;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function toSession(value: unknown): Session | null {
  const row = asObject(value);
  if (!row) {
    return null;
  }
  const { start, end, duration_seconds, duration_hours, date } = row;
  if (typeof start !== "string" || typeof end !== "string" || typeof date !== "string") {
    return null;
  }
  if (
    typeof duration_seconds !== "number" ||
    !Number.isInteger(duration_seconds) ||
    duration_seconds < 0
  ) {
    return null;
  }
  const durationHours =
    typeof duration_hours === "number" && Number.isFinite(duration_hours)
      ? duration_hours
      : toDurationHours(duration_seconds);

  return Object.freeze({
    start,
    end,
    durationSeconds: duration_seconds,
    durationHours,
    nightKey: date,
  });
}

function isSameSession(a: Session, b: Session): boolean {
  return (
    a.start === b.start &&
    a.end === b.end &&
    a.durationSeconds === b.durationSeconds &&
    a.nightKey === b.nightKey
  );
}

function normalizeLog(value: unknown, onSkipped: (index: number) => void): SessionLog {
  const root = asObject(value);
  if (!root || !Array.isArray(root.sessions)) {
    return emptySessionLog();
  }

  const sessions: Session[] = [];
  const retained: RetainedRecord[] = [];
  root.sessions.forEach((entry: unknown, index: number) => {
    const session = toSession(entry);
    if (session) {
      sessions.push(session);
      return;
    }
    retained.push({ index, raw: entry });
    onSkipped(index);
  });

  // last_session must mirror the last readable session.
  const latest = sessions.at(-1) ?? null;
  const stored = toSession(root.last_session);
  const lastSession = stored && latest && isSameSession(stored, latest) ? stored : latest;

  return retained.length > 0 ? { sessions, lastSession, retained } : { sessions, lastSession };
}

function toRecord(session: Session): SessionRecord {
  return {
    start: session.start,
    end: session.end,
    duration_seconds: session.durationSeconds,
    duration_hours: session.durationHours,
    date: session.nightKey,
  };
}

export function serializeSessionLog(log: SessionLog): string {
  const sessions: unknown[] = log.sessions.map(toRecord);
  const retained = [...(log.retained ?? [])].sort((a, b) => a.index - b.index);
  for (const entry of retained) {
    sessions.splice(Math.min(entry.index, sessions.length), 0, entry.raw);
  }
  const record: SessionLogRecord = {
    sessions,
    last_session: log.lastSession ? toRecord(log.lastSession) : null,
  };
  return `${JSON.stringify(record, null, 2)}\n`;
}

export class FileSessionStore implements SessionStore {
  private readonly dataPath: string;
  private readonly fsImpl: SessionStoreFs;
  private readonly onError?: (message: string) => void;

  constructor(filePath: string = DEFAULT_DATA_FILENAME, options: FileSessionStoreOptions = {}) {
    this.dataPath = path.resolve(filePath);
    this.fsImpl = options.fsImpl ?? fs;
    this.onError = options.onError;
  }

  get filePath(): string {
    return this.dataPath;
  }

  load(): SessionLog {
    let serialized: string;
    try {
      serialized = this.fsImpl.readFileSync(this.dataPath, "utf8");
    } catch (error) {
      const nodeError = error as NodeJS.ErrnoException;
      if (nodeError?.code !== "ENOENT") {
        this.report(ERROR_CODES.E_STORE_UNREADABLE, `${describe(error)}; ${EMPTY_LOG_NOTE}`);
      }
      return emptySessionLog();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized);
    } catch (error) {
      this.report(ERROR_CODES.E_STORE_UNREADABLE, `${describe(error)}; ${EMPTY_LOG_NOTE}`);
      return emptySessionLog();
    }
    return normalizeLog(parsed, (index) =>
      this.report(
        ERROR_CODES.E_STORE_UNREADABLE,
        `session entry #${index} is unreadable; it is kept in the file as is`
      )
    );
  }

  save(next: SessionLog): void {
    const dirPath = path.dirname(this.dataPath);
    const tmpPath = `${this.dataPath}.tmp-${process.pid}`;
    this.fsImpl.mkdirSync(dirPath, { recursive: true });
    this.fsImpl.writeFileSync(tmpPath, serializeSessionLog(next), "utf8");
    this.fsImpl.renameSync(tmpPath, this.dataPath);
  }

  append(log: SessionLog, session: Session): SessionLog {
    const next: SessionLog = {
      ...log,
      sessions: [...log.sessions, session],
      lastSession: session,
    };
    this.save(next);
    return next;
  }

  private report(code: ErrorCode, detail: string): void {
    this.onError?.(`${code} ${this.dataPath}: ${detail}`);
  }
}
