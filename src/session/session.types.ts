export interface Session {
  readonly start: string;
  readonly end: string;
  readonly durationSeconds: number;
  readonly durationHours: number;
  readonly nightKey: string;
}

/** A stored entry that could not be read, with its position in the stored list. */
export interface RetainedRecord {
  readonly index: number;
  readonly raw: unknown;
}

export interface SessionLog {
  readonly sessions: readonly Session[];
  readonly lastSession: Session | null;
  /** Written back unchanged on every save; never counted. */
  readonly retained?: readonly RetainedRecord[];
}

export interface SessionStore {
  load(): SessionLog;
  save(next: SessionLog): void;
  append(log: SessionLog, session: Session): SessionLog;
}

/** On-disk shape; field names are shared with existing data files. */
export interface SessionRecord {
  readonly start: string;
  readonly end: string;
  readonly duration_seconds: number;
  readonly duration_hours: number;
  readonly date: string;
}

export interface SessionLogRecord {
  /** `SessionRecord`s, plus any retained entries at their original positions. */
  readonly sessions: unknown[];
  readonly last_session: SessionRecord | null;
}

export function emptySessionLog(): SessionLog {
  return { sessions: [], lastSession: null };
}
