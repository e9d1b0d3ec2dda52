function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatLocalDate(value: Date): string {
  const year = pad(value.getFullYear(), 4);
  const month = pad(value.getMonth() + 1);
  const day = pad(value.getDate());
  return `${year}-${month}-${day}`;
}

function formatLocalClock(value: Date): string {
  return `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
}

/** Local ISO-8601 date-time without offset, e.g. 2024-01-01T19:00:00. */
export function formatLocalIsoTimestamp(value: Date): string {
  return `${formatLocalDate(value)}T${formatLocalClock(value)}`;
}

/** Human-facing local timestamp, e.g. 2024-01-01 19:00:00. */
export function formatLocalDateTime(value: Date): string {
  return `${formatLocalDate(value)} ${formatLocalClock(value)}`;
}
