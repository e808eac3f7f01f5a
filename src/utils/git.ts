import { execa } from 'execa';
import { errorMessage, HistoryQueryError, TrunkNotFoundError } from '@/errors';
import type { BranchName, DecoratedEntry, HistoryService, RepoContext } from '@/types';
import { type Logger, silentLogger } from '@/utils/logger';

/**
 * Trunk candidates in priority order.
 */
export const TRUNK_CANDIDATES = ['main', 'master'] as const;

/**
 * Splits command output into trimmed, non-empty lines.
 */
function outputLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * git's own complaint for a failed command, falling back to the error message.
 */
function failureDetail(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : '';
    if (stderr.length > 0) {
      return stderr;
    }
  }
  return errorMessage(error);
}

/**
 * Parses `git log --format=%H%x09%D` output.
 *
 * Each line is `<sha>\t<decorations>`, decorations separated by ", ".
 * Lines without decorations produce an entry with no labels.
 *
 * @param stdout - Raw git log output
 * @returns Decorated entries in log order
 *
 * @example
 * ```typescript
 * parseDecoratedLog('abc\tHEAD -> feat-b, origin/feat-b\ndef\t');
 * // [
 * //   { commit: 'abc', labels: ['HEAD -> feat-b', 'origin/feat-b'], position: 0 },
 * //   { commit: 'def', labels: [], position: 1 },
 * // ]
 * ```
 */
export function parseDecoratedLog(stdout: string): DecoratedEntry[] {
  const entries: DecoratedEntry[] = [];

  for (const line of stdout.split('\n')) {
    if (line.trim().length === 0) {
      continue;
    }

    const tab = line.indexOf('\t');
    const commit = (tab === -1 ? line : line.slice(0, tab)).trim();
    const decorations = tab === -1 ? '' : line.slice(tab + 1);
    const labels = decorations
      .split(', ')
      .map((label) => label.trim())
      .filter((label) => label.length > 0);

    entries.push({ commit, labels, position: entries.length });
  }

  return entries;
}

/**
 * Picks the trunk out of a list of local branches.
 *
 * `main` takes priority over `master` when both exist.
 *
 * @returns Trunk branch name, undefined if neither exists
 */
export function pickTrunk(branches: BranchName[]): BranchName | undefined {
  return TRUNK_CANDIDATES.find((candidate) => branches.includes(candidate));
}

export interface GitHistoryOptions {
  /** Number of decorated commits returned by decoratedHistory() */
  historyWindow: number;
  logger?: Logger;
}

/**
 * Git-backed history queries.
 *
 * Every command runs in the repository given by the RepoContext; nothing
 * reads process.cwd().
 */
export class GitHistory implements HistoryService {
  private readonly logger: Logger;

  constructor(
    private readonly repo: RepoContext,
    private readonly options: GitHistoryOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  private async git(operation: string, args: string[]): Promise<string> {
    this.logger.debug('git', { args, cwd: this.repo.cwd });

    try {
      const result = await execa('git', args, { cwd: this.repo.cwd });
      return result.stdout;
    } catch (error) {
      throw new HistoryQueryError(
        `git ${args[0] ?? ''} failed (${operation}): ${failureDetail(error)}`,
        operation,
        error
      );
    }
  }

  /**
   * Reads the checked-out branch.
   *
   * @throws {HistoryQueryError} On detached HEAD or if git fails
   */
  async currentBranch(): Promise<BranchName> {
    const stdout = await this.git('current-branch', ['rev-parse', '--abbrev-ref', 'HEAD']);
    const branch = stdout.trim();

    if (branch.length === 0) {
      throw new HistoryQueryError('git rev-parse returned no branch name', 'current-branch');
    }

    if (branch === 'HEAD') {
      throw new HistoryQueryError(
        'HEAD is detached; check out a branch or pass one explicitly',
        'current-branch'
      );
    }

    return branch;
  }

  async localBranches(): Promise<BranchName[]> {
    const stdout = await this.git('local-branches', ['branch', '--format=%(refname:short)']);
    return outputLines(stdout);
  }

  /**
   * @throws {TrunkNotFoundError} If neither `main` nor `master` exists
   */
  async trunkBranch(): Promise<BranchName> {
    const trunk = pickTrunk(await this.localBranches());
    if (!trunk) {
      throw new TrunkNotFoundError();
    }
    return trunk;
  }

  async remotes(): Promise<string[]> {
    const stdout = await this.git('remotes', ['remote']);
    return outputLines(stdout);
  }

  /**
   * Returns the first-parent, decoration-only log of a branch, skipping the
   * branch tip itself, bounded by the configured window.
   */
  async decoratedHistory(branch: BranchName): Promise<DecoratedEntry[]> {
    const stdout = await this.git('decorated-history', [
      'log',
      '--first-parent',
      '--simplify-by-decoration',
      '--decorate=short',
      '--skip=1',
      `--max-count=${this.options.historyWindow}`,
      '--format=%H%x09%D',
      branch,
      '--',
    ]);
    return parseDecoratedLog(stdout);
  }
}
