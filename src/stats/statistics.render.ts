import { formatDuration } from "../time/duration.format";
import type { NightSummary, StatisticsReport } from "./statistics.aggregator";

const RULE_WIDTH = 60;
const HEAVY_RULE = "=".repeat(RULE_WIDTH);
const LIGHT_RULE = "-".repeat(RULE_WIDTH);

export const EMPTY_REPORT_MESSAGE = "No sessions recorded yet.";

function formatHours(seconds: number): string {
  return `${(seconds / 3600).toFixed(2)} hours`;
}

function renderNight(night: NightSummary): string {
  const plural = night.sessionCount === 1 ? "" : "s";
  return (
    `${night.nightKey}: ${formatDuration(night.totalSeconds)} ` +
    `(${night.sessionCount} session${plural}, avg: ${formatDuration(night.averageSeconds)})`
  );
}

export function renderStatisticsReport(report: StatisticsReport): string[] {
  if (report.kind === "empty") {
    return [EMPTY_REPORT_MESSAGE];
  }

  const average = report.overallAveragePerNightSeconds;
  return [
    HEAVY_RULE,
    "TIME TRACKING STATISTICS",
    HEAVY_RULE,
    `Total sessions: ${report.totalSessions}`,
    `Total time: ${formatDuration(report.totalSeconds)} (${formatHours(report.totalSeconds)})`,
    `Total nights tracked: ${report.nightCount}`,
    `Average time per night: ${formatDuration(average)} (${formatHours(average)})`,
    "",
    "Per-night breakdown:",
    LIGHT_RULE,
    ...report.nights.map(renderNight),
    HEAVY_RULE,
  ];
}
