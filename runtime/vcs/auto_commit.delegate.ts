import { buildCommitMessage } from "../../src/commit/commit_message";
import { ERROR_CODES } from "../../src/core/errors/canonical_error_codes";
import { formatLocalDateTime } from "../../src/time/local_time";
import type { TrackerIo } from "../cli/tracker.io";
import { asMessage, formatNotice } from "../error";
import type { CommitAndPushResult, VcsCollaborator } from "./git.collaborator";

export type CommitOutcome =
  | { readonly status: "skipped"; readonly reason: "not_repository" | "no_changes" }
  | { readonly status: "committed"; readonly message: string; readonly pushed: boolean }
  | { readonly status: "failed"; readonly error: string };

/** Commit delegate handed to the scheduler. Reports through `io` and never rejects. */
export async function runAutoCommit(
  vcs: VcsCollaborator,
  at: Date,
  io: Pick<TrackerIo, "log" | "error">
): Promise<CommitOutcome> {
  if (!(await vcs.isRepository())) {
    return { status: "skipped", reason: "not_repository" };
  }
  if (!(await vcs.hasPendingChanges())) {
    return { status: "skipped", reason: "no_changes" };
  }

  const message = buildCommitMessage(at);
  const timestamp = formatLocalDateTime(at);

  let result: CommitAndPushResult;
  try {
    result = await vcs.commitAndPush(message);
  } catch (error) {
    const reason = asMessage(error);
    io.error(formatNotice(ERROR_CODES.E_VCS_COMMIT_FAILED, `Git commit failed: ${reason}`));
    return { status: "failed", error: reason };
  }

  const { push } = result;
  if (push.status === "pushed") {
    io.log(`\n[auto-commit] Committed and pushed changes at ${timestamp}`);
    return { status: "committed", message, pushed: true };
  }

  if (push.status === "no_remote") {
    io.log(
      formatNotice(ERROR_CODES.E_VCS_NO_REMOTE, "No remote repository configured. Skipping push.")
    );
  } else {
    io.error(
      formatNotice(
        ERROR_CODES.E_VCS_PUSH_FAILED,
        `Git push to ${push.remote}/${push.branch} failed: ${push.error}`
      )
    );
    io.log("[info] Changes are committed locally but not pushed.");
  }
  io.log(`\n[auto-commit] Committed changes locally at ${timestamp}`);
  return { status: "committed", message, pushed: false };
}
