import { simpleGit, type SimpleGit } from "simple-git";

export const UNKNOWN_REVISION = "unknown";

/**
 * Git operations wrapper — abstracts simple-git for testability.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Abbreviated SHA of HEAD. */
  async getShortSha(): Promise<string> {
    const result = await this.git.revparse(["--short", "HEAD"]);
    return result.trim();
  }

  /** Abbreviated SHA of HEAD, or "unknown" outside a repository or before the first commit. */
  async shortRevisionOrUnknown(): Promise<string> {
    try {
      const sha = await this.getShortSha();
      return sha || UNKNOWN_REVISION;
    } catch {
      return UNKNOWN_REVISION;
    }
  }
}
