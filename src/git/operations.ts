import fs from "node:fs/promises";
import { simpleGit } from "simple-git";

/** The slice of simple-git this module calls. */
export type GitClient = {
  revparse(options: string[]): Promise<string>;
};

/** Read-only tag queries against a local repository. */
export interface TagRepository {
  /** Object id the ref itself points at (tag object for annotated tags). */
  resolveRef(ref: string): Promise<string>;
  /** Commit reached by peeling the ref through any tag objects. */
  peelToCommit(ref: string): Promise<string>;
}

export type OpenRepository = (repoPath: string) => Promise<TagRepository>;

/**
 * Git operations wrapper — abstracts simple-git for testability.
 */
export class GitOperations implements TagRepository {
  private git: GitClient;

  constructor(private readonly repoPath: string, git?: GitClient) {
    this.git = git ?? simpleGit(repoPath);
  }

  /**
   * Fail unless repoPath is itself a repository: either a bare clone (the
   * layout makepkg leaves next to a PKGBUILD) or the top of a work tree.
   * A plain directory inside some enclosing repository does not count.
   */
  async open(): Promise<this> {
    const root = await fs.realpath(this.repoPath);
    let gitDir: string;
    try {
      gitDir = await fs.realpath((await this.git.revparse(["--absolute-git-dir"])).trim());
    } catch (e: unknown) {
      throw new Error(`Failed to open repository: ${this.repoPath}`, { cause: e });
    }
    if (gitDir === root) return this;

    const topLevel = await fs.realpath((await this.git.revparse(["--show-toplevel"])).trim());
    if (topLevel !== root) {
      throw new Error(`Failed to open repository: ${this.repoPath} is not a repository root`);
    }
    return this;
  }

  async resolveRef(ref: string): Promise<string> {
    try {
      const result = await this.git.revparse(["--verify", ref]);
      return result.trim();
    } catch (e: unknown) {
      throw new Error(`Failed to find ${ref} in ${this.repoPath}`, { cause: e });
    }
  }

  async peelToCommit(ref: string): Promise<string> {
    try {
      const result = await this.git.revparse(["--verify", `${ref}^{commit}`]);
      return result.trim();
    } catch (e: unknown) {
      throw new Error(`Failed to resolve ${ref} to a commit in ${this.repoPath}`, { cause: e });
    }
  }
}

export const openGitRepository: OpenRepository = (repoPath) => new GitOperations(repoPath).open();
