import { simpleGit, type SimpleGit } from 'simple-git';
import type { FileCandidate, RepoLocation } from './types.js';
import { lsFilesArgs, parseLsFilesOutput } from './ls-files-reader.js';
import { EnumerationError } from '../errors.js';

// simple-git refuses tasks whose env carries EDITOR, GIT_EDITOR, GIT_PAGER and the like
const GIT_PASSTHROUGH_ENV = ['PATH', 'HOME', 'LANG', 'LC_ALL', 'TMPDIR', 'SYSTEMROOT'];

/** Full parent environment plus the repository location, for blame subprocesses. */
export function repoEnv(location: RepoLocation): NodeJS.ProcessEnv {
  return {
    ...process.env,
    GIT_DIR: location.gitDir,
    GIT_WORK_TREE: location.workTree,
  };
}

/** The minimal environment handed to simple-git. */
export function gitEnv(location: RepoLocation, parent: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of GIT_PASSTHROUGH_ENV) {
    const value = parent[key];
    if (value !== undefined) env[key] = value;
  }
  env.GIT_DIR = location.gitDir;
  env.GIT_WORK_TREE = location.workTree;
  return env;
}

export class GitBridge {
  private git: SimpleGit;
  private location: RepoLocation;

  constructor(location: RepoLocation) {
    this.location = location;
    try {
      this.git = simpleGit(location.workTree).env(gitEnv(location));
    } catch (err) {
      throw new EnumerationError(`Cannot open work tree ${location.workTree}`, { cause: err });
    }
  }

  async isRepo(): Promise<boolean> {
    try {
      await this.git.revparse(['--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Every tracked file in index order, with its text classification.
   * Binary files are still listed here; see `filterTextFiles`.
   */
  async listTrackedFiles(): Promise<FileCandidate[]> {
    let output: string;
    try {
      output = await this.git.raw(lsFilesArgs());
    } catch (err) {
      throw new EnumerationError(`git ls-files failed for ${this.location.gitDir}`, { cause: err });
    }
    return parseLsFilesOutput(output);
  }
}
