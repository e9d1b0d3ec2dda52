import type { Session } from "../session/session.types";

export interface NightSummary {
  readonly nightKey: string;
  readonly sessionCount: number;
  readonly totalSeconds: number;
  readonly averageSeconds: number;
}

export type StatisticsReport =
  | { readonly kind: "empty" }
  | {
      readonly kind: "summary";
      readonly totalSessions: number;
      readonly totalSeconds: number;
      readonly totalHours: number;
      readonly nightCount: number;
      readonly overallAveragePerNightSeconds: number;
      readonly nights: readonly NightSummary[];
    };

export function aggregateSessions(sessions: readonly Session[]): StatisticsReport {
  if (sessions.length === 0) {
    return { kind: "empty" };
  }

  const buckets = new Map<string, number[]>();
  let totalSeconds = 0;
  for (const session of sessions) {
    totalSeconds += session.durationSeconds;
    const bucket = buckets.get(session.nightKey);
    if (bucket) {
      bucket.push(session.durationSeconds);
    } else {
      buckets.set(session.nightKey, [session.durationSeconds]);
    }
  }

  const nights: NightSummary[] = [...buckets.entries()]
    .map(([key, durations]) => {
      const nightTotal = durations.reduce((sum, value) => sum + value, 0);
      return {
        nightKey: key,
        sessionCount: durations.length,
        totalSeconds: nightTotal,
        averageSeconds: nightTotal / durations.length,
      };
    })
    .sort((a, b) => (a.nightKey < b.nightKey ? 1 : a.nightKey > b.nightKey ? -1 : 0));

  const nightTotalsSum = nights.reduce((sum, night) => sum + night.totalSeconds, 0);

  return {
    kind: "summary",
    totalSessions: sessions.length,
    totalSeconds,
    totalHours: totalSeconds / 3600,
    nightCount: nights.length,
    overallAveragePerNightSeconds: nights.length > 0 ? nightTotalsSum / nights.length : 0,
    nights,
  };
}
