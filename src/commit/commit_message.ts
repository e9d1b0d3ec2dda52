import { formatLocalDateTime } from "../time/local_time";

const COMMIT_MESSAGE_PREFIX = "Auto-commit: Time tracking update at";

export function buildCommitMessage(at: Date): string {
  return `${COMMIT_MESSAGE_PREFIX} ${formatLocalDateTime(at)}`;
}
