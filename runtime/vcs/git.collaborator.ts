import { ERROR_CODES } from "../../src/core/errors/canonical_error_codes";
import { asMessage, toTrackerError } from "../error";
import type { GitClient } from "./git.client";

export const DEFAULT_BRANCH = "main";

export type PushOutcome =
  | { readonly status: "pushed"; readonly remote: string; readonly branch: string }
  | { readonly status: "no_remote" }
  | { readonly status: "failed"; readonly remote: string; readonly branch: string; readonly error: string };

export interface CommitAndPushResult {
  readonly commit: string;
  readonly push: PushOutcome;
}

export interface VcsCollaborator {
  isRepository(): Promise<boolean>;
  hasPendingChanges(): Promise<boolean>;
  commitAndPush(message: string): Promise<CommitAndPushResult>;
}

function normalizeBranch(raw: string): string {
  const trimmed = raw.trim();
  return trimmed === "" || trimmed === "HEAD" ? DEFAULT_BRANCH : trimmed;
}

/**
 * Probes never throw: a missing git binary or a non-repository reads as
 * "nothing to do". Only stage/commit failures reject.
 */
export class GitCollaborator implements VcsCollaborator {
  constructor(private readonly client: GitClient) {}

  async isRepository(): Promise<boolean> {
    try {
      return await this.client.checkIsRepo();
    } catch {
      return false;
    }
  }

  async hasPendingChanges(): Promise<boolean> {
    try {
      return !(await this.client.isClean());
    } catch {
      return false;
    }
  }

  async commitAndPush(message: string): Promise<CommitAndPushResult> {
    let commit: string;
    try {
      await this.client.addAll();
      commit = await this.client.commit(message);
    } catch (error) {
      throw toTrackerError(error, ERROR_CODES.E_VCS_COMMIT_FAILED);
    }
    return { commit, push: await this.push() };
  }

  private async push(): Promise<PushOutcome> {
    const remotes = await this.client.listRemotes().catch((): string[] => []);
    const remote = remotes[0];
    if (remote === undefined) {
      return { status: "no_remote" };
    }
    const branch = await this.client
      .currentBranch()
      .then(normalizeBranch, () => DEFAULT_BRANCH);

    try {
      await this.client.push(remote, branch);
      return { status: "pushed", remote, branch };
    } catch (error) {
      return { status: "failed", remote, branch, error: asMessage(error) };
    }
  }
}
