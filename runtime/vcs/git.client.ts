import { simpleGit, type SimpleGit, type SimpleGitOptions } from "simple-git";

/** The git commands the auto-commit flow needs, nothing more. */
export interface GitClient {
  checkIsRepo(): Promise<boolean>;
  isClean(): Promise<boolean>;
  addAll(): Promise<void>;
  commit(message: string): Promise<string>;
  listRemotes(): Promise<string[]>;
  currentBranch(): Promise<string>;
  push(remote: string, branch: string): Promise<void>;
}

// A git child that prints nothing for this long (e.g. a push stuck on the network) is killed.
const GIT_BLOCK_TIMEOUT_MS = 60 * 1000;

export function createSimpleGitClient(repoPath: string): GitClient {
  let instance: SimpleGit | null = null;
  // simple-git throws synchronously for a missing baseDir; defer that into the promise chain.
  const git = (): SimpleGit => {
    if (instance === null) {
      const options: Partial<SimpleGitOptions> = {
        baseDir: repoPath,
        binary: "git",
        maxConcurrentProcesses: 1,
        trimmed: true,
        timeout: { block: GIT_BLOCK_TIMEOUT_MS },
      };
      instance = simpleGit(options);
    }
    return instance;
  };

  return {
    checkIsRepo: async () => git().checkIsRepo(),
    isClean: async () => (await git().status()).isClean(),
    addAll: async () => {
      await git().add(".");
    },
    commit: async (message) => (await git().commit(message)).commit,
    listRemotes: async () => (await git().getRemotes()).map((remote) => remote.name),
    currentBranch: async () => git().revparse(["--abbrev-ref", "HEAD"]),
    push: async (remote, branch) => {
      await git().push(remote, branch);
    },
  };
}
