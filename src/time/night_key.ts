import { formatLocalDate } from "./local_time";

const NIGHT_BOUNDARY_HOUR = 18;

/**
 * A night runs from 18:00 to 18:00 the next day and is keyed by the date it
 * starts on. Uses host local time as-is; no time-zone normalisation.
 */
export function nightKey(at: Date): string {
  if (at.getHours() >= NIGHT_BOUNDARY_HOUR) {
    return formatLocalDate(at);
  }
  const previousDay = new Date(at.getFullYear(), at.getMonth(), at.getDate() - 1);
  return formatLocalDate(previousDay);
}
