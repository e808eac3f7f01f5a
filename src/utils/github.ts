import { execa } from 'execa';
import { errorMessage, NoteUpdateError, ReviewLookupError } from '@/errors';
import type { BranchName, RepoContext, ReviewRef, ReviewService } from '@/types';
import { type Logger, silentLogger } from '@/utils/logger';

/**
 * gh prints this on stderr when a branch has no pull request.
 */
const NOT_FOUND_MESSAGE = 'no pull requests found';

/**
 * Raw result of a `gh pr view` call.
 */
interface GhViewOutput {
  exitCode: number | undefined;
  failed: boolean;
  stderr: string;
  stdout: string;
}

/**
 * Parses the JSON printed by `gh pr view --json <fields>`.
 *
 * @throws {Error} If the output is not a JSON object
 */
function parseJsonObject(stdout: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(stdout);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('expected a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Extracts the PR number from `gh pr view --json number` output.
 *
 * @returns PR number as a string
 * @throws {Error} If the output carries no usable number
 *
 * @example
 * parsePrNumber('{"number":41}'); // '41'
 */
export function parsePrNumber(stdout: string): ReviewRef {
  const { number } = parseJsonObject(stdout);
  if (typeof number === 'number' && Number.isInteger(number)) {
    return String(number);
  }
  if (typeof number === 'string' && number.length > 0) {
    return number;
  }
  throw new Error('missing "number" field');
}

/**
 * Extracts the PR body from `gh pr view --json body` output.
 */
export function parsePrBody(stdout: string): string {
  const { body } = parseJsonObject(stdout);
  if (body === undefined || body === null) {
    return '';
  }
  if (typeof body !== 'string') {
    throw new Error('"body" field is not a string');
  }
  return body;
}

/**
 * GitHub CLI backed review lookups.
 *
 * Requires `gh` to be installed and authenticated. Branch arguments are passed
 * as argv entries and bodies through stdin, so no shell quoting is involved.
 */
export class GhReviews implements ReviewService {
  private readonly logger: Logger;

  constructor(
    private readonly repo: RepoContext,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  private async view(branch: BranchName, field: 'body' | 'number'): Promise<GhViewOutput> {
    const args = ['pr', 'view', branch, '--json', field];
    this.logger.debug('gh', { args, cwd: this.repo.cwd });

    const result = await execa('gh', args, { cwd: this.repo.cwd, reject: false });
    return {
      exitCode: result.exitCode,
      failed: result.failed,
      stderr: result.stderr,
      stdout: result.stdout,
    };
  }

  private viewFailure(branch: BranchName, output: GhViewOutput): ReviewLookupError {
    const detail =
      output.stderr.trim() ||
      (output.exitCode === undefined ? 'gh could not be run' : `exit code ${output.exitCode}`);
    return new ReviewLookupError(`gh pr view failed for '${branch}': ${detail}`, branch);
  }

  /**
   * Finds the PR number for a branch.
   *
   * @returns PR number, or null when the branch has no pull request
   * @throws {ReviewLookupError} On any other gh failure or malformed output
   */
  async reviewFor(branch: BranchName): Promise<ReviewRef | null> {
    const output = await this.view(branch, 'number');

    if (output.failed) {
      if (output.stderr.includes(NOT_FOUND_MESSAGE)) {
        return null;
      }
      throw this.viewFailure(branch, output);
    }

    try {
      return parsePrNumber(output.stdout);
    } catch (error) {
      throw new ReviewLookupError(
        `Unexpected gh pr view output for '${branch}': ${errorMessage(error)}`,
        branch,
        error
      );
    }
  }

  /**
   * @throws {ReviewLookupError} If the PR cannot be read
   */
  async reviewBody(branch: BranchName): Promise<string> {
    const output = await this.view(branch, 'body');

    if (output.failed) {
      throw this.viewFailure(branch, output);
    }

    try {
      return parsePrBody(output.stdout);
    } catch (error) {
      throw new ReviewLookupError(
        `Unexpected gh pr view output for '${branch}': ${errorMessage(error)}`,
        branch,
        error
      );
    }
  }

  /**
   * Replaces the PR body. The body is piped through stdin (`--body-file -`).
   *
   * @throws {NoteUpdateError} If gh pr edit fails
   */
  async updateReviewBody(branch: BranchName, body: string): Promise<void> {
    const args = ['pr', 'edit', branch, '--body-file', '-'];
    this.logger.debug('gh', { args, cwd: this.repo.cwd });

    try {
      await execa('gh', args, { cwd: this.repo.cwd, input: body });
    } catch (error) {
      throw new NoteUpdateError(
        `gh pr edit failed for '${branch}': ${errorMessage(error)}`,
        branch,
        error
      );
    }
  }
}
