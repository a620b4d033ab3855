import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { PublishHook } from '../types/backup.js';
import { logInfo, logWarn, scrubSensitiveText } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_OUTPUT_LENGTH = 2_000;

export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export interface GitPublishHookOptions {
  siteDir: string;
  remote: string;
  branch: string;
  /** Repository working directory; defaults to the process working directory. */
  repoDir?: string;
  now?: () => Date;
  runGit?: GitRunner;
}

interface ExecError extends Error {
  stdout?: string;
  stderr?: string;
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }
  return `${output.slice(0, MAX_OUTPUT_LENGTH)}\n...[truncated]`;
}

const defaultRunGit: GitRunner = async (args, cwd) => {
  try {
    const { stdout, stderr } = await execFileAsync('git', args, {
      cwd,
      timeout: DEFAULT_TIMEOUT_MS,
      windowsHide: true,
    });
    return `${stdout}${stderr}`.trim();
  } catch (error) {
    const err: ExecError = error instanceof Error ? error : new Error(String(error));
    const output = truncateOutput(scrubSensitiveText(`${err.stdout ?? ''}${err.stderr ?? ''}`.trim()));
    throw new Error(`git ${args[0]} failed: ${output || err.message}`);
  }
};

/**
 * Redeploys a restored site by committing the site directory and pushing it,
 * for hosts that publish from a git branch.
 */
export class GitPublishHook implements PublishHook {
  readonly #options: GitPublishHookOptions;
  readonly #now: () => Date;
  readonly #runGit: GitRunner;

  constructor(options: GitPublishHookOptions) {
    this.#options = options;
    this.#now = options.now ?? (() => new Date());
    this.#runGit = options.runGit ?? defaultRunGit;
  }

  async publish(): Promise<void> {
    const { siteDir, remote, branch } = this.#options;
    const cwd = this.#options.repoDir ?? process.cwd();

    await this.#runGit(['add', '--all', '--', siteDir], cwd);

    const message = `Restore site from backup on ${this.#now().toISOString()}`;
    try {
      await this.#runGit(['commit', '-m', message], cwd);
    } catch (error) {
      // Commonly "nothing to commit": the restored tree matched HEAD.
      void logWarn(`[Publish] Commit skipped: ${error instanceof Error ? error.message : String(error)}`);
    }

    await this.#runGit(['push', remote, branch], cwd);
    void logInfo(`[Publish] Pushed ${siteDir} to ${remote}/${branch}.`);
  }
}
