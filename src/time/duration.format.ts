const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_MINUTE = 60;

export interface DurationParts {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

function toWholeSeconds(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.trunc(value);
}

export function splitDuration(totalSeconds: number): DurationParts {
  const whole = toWholeSeconds(totalSeconds);
  return {
    hours: Math.floor(whole / SECONDS_PER_HOUR),
    minutes: Math.floor((whole % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    seconds: whole % SECONDS_PER_MINUTE,
  };
}

export function formatDuration(totalSeconds: number): string {
  const { hours, minutes, seconds } = splitDuration(totalSeconds);
  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

export function toDurationHours(totalSeconds: number): number {
  return Math.round((toWholeSeconds(totalSeconds) / SECONDS_PER_HOUR) * 100) / 100;
}
