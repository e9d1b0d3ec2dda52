/**
 * Intent: git collaborator contract: probes degrade to false, push goes to the first remote on the current branch,
 * push failures never undo the commit.
 * Non-Goals: running a real git binary.
 */
import test from "node:test";
import assert from "node:assert/strict";
import { ERROR_CODES } from "../../../src/core/errors/canonical_error_codes";
import { TrackerError } from "../../../runtime/error";
import type { GitClient } from "../../../runtime/vcs/git.client";
import { DEFAULT_BRANCH, GitCollaborator } from "../../../runtime/vcs/git.collaborator";

interface FakeGitOptions {
  readonly isRepo?: boolean | Error;
  readonly clean?: boolean | Error;
  readonly commitError?: Error;
  readonly remotes?: string[];
  readonly branch?: string | Error;
  readonly pushError?: Error;
}

function fakeGit(options: FakeGitOptions = {}): GitClient & { readonly calls: string[] } {
  const calls: string[] = [];
  const settle = async <T>(value: T | Error): Promise<T> => {
    if (value instanceof Error) {
      throw value;
    }
    return value;
  };
  return {
    calls,
    checkIsRepo: () => settle(options.isRepo ?? true),
    isClean: () => settle(options.clean ?? false),
    addAll: async () => {
      calls.push("add");
    },
    commit: async (message) => {
      calls.push(`commit:${message}`);
      if (options.commitError) {
        throw options.commitError;
      }
      return "abc1234";
    },
    listRemotes: async () => {
      calls.push("remotes");
      return options.remotes ?? ["origin"];
    },
    currentBranch: () => {
      calls.push("branch");
      return settle(options.branch ?? "feature");
    },
    push: async (remote, branch) => {
      calls.push(`push:${remote}/${branch}`);
      if (options.pushError) {
        throw options.pushError;
      }
    },
  };
}

test("isRepository: true for a repository, false when git is missing", async () => {
  assert.equal(await new GitCollaborator(fakeGit()).isRepository(), true);
  assert.equal(await new GitCollaborator(fakeGit({ isRepo: false })).isRepository(), false);
  assert.equal(
    await new GitCollaborator(fakeGit({ isRepo: new Error("spawn git ENOENT") })).isRepository(),
    false
  );
});

test("hasPendingChanges: dirty tree is pending, clean tree or failing status is not", async () => {
  assert.equal(await new GitCollaborator(fakeGit({ clean: false })).hasPendingChanges(), true);
  assert.equal(await new GitCollaborator(fakeGit({ clean: true })).hasPendingChanges(), false);
  assert.equal(
    await new GitCollaborator(fakeGit({ clean: new Error("fatal") })).hasPendingChanges(),
    false
  );
});

test("commitAndPush: stages, commits, then pushes to the first remote on the current branch", async () => {
  const git = fakeGit({ remotes: ["origin", "backup"], branch: "feature" });

  const result = await new GitCollaborator(git).commitAndPush("msg");

  assert.deepEqual(result, {
    commit: "abc1234",
    push: { status: "pushed", remote: "origin", branch: "feature" },
  });
  assert.deepEqual(git.calls, ["add", "commit:msg", "remotes", "branch", "push:origin/feature"]);
});

test("commitAndPush: detached HEAD or unknown branch falls back to the default branch", async () => {
  const detached = fakeGit({ branch: "HEAD" });
  const unknown = fakeGit({ branch: new Error("ambiguous argument 'HEAD'") });

  await new GitCollaborator(detached).commitAndPush("msg");
  await new GitCollaborator(unknown).commitAndPush("msg");

  assert.equal(DEFAULT_BRANCH, "main");
  assert.equal(detached.calls.at(-1), "push:origin/main");
  assert.equal(unknown.calls.at(-1), "push:origin/main");
});

test("commitAndPush: no remote keeps the local commit and skips push", async () => {
  const git = fakeGit({ remotes: [] });

  const result = await new GitCollaborator(git).commitAndPush("msg");

  assert.deepEqual(result, { commit: "abc1234", push: { status: "no_remote" } });
  assert.deepEqual(git.calls, ["add", "commit:msg", "remotes"]);
});

test("commitAndPush: push failure is returned, not thrown", async () => {
  const git = fakeGit({ pushError: new Error("rejected (non-fast-forward)") });

  const result = await new GitCollaborator(git).commitAndPush("msg");

  assert.deepEqual(result.push, {
    status: "failed",
    remote: "origin",
    branch: "feature",
    error: "rejected (non-fast-forward)",
  });
});

test("commitAndPush: commit failure rejects with a commit-failed tracker error", async () => {
  const git = fakeGit({ commitError: new Error("nothing to commit") });

  await assert.rejects(new GitCollaborator(git).commitAndPush("msg"), (error: unknown) => {
    assert.ok(error instanceof TrackerError);
    assert.equal(error.errorCode, ERROR_CODES.E_VCS_COMMIT_FAILED);
    assert.equal(error.message, "nothing to commit");
    return true;
  });
  assert.deepEqual(git.calls, ["add", "commit:msg"]);
});
