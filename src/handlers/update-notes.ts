/**
 * Update-notes handler.
 *
 * Writes the stack note into the PR body of every branch in a stack.
 *
 * Key patterns:
 * - Sequential: one branch at a time, one gh call at a time
 * - Partial failure: a failing branch is logged and recorded, the rest still run
 * - Fail fast on history: a stack that cannot be resolved aborts everything
 * - Idempotent: bodies that already carry the note are left alone
 *
 * @module handlers/update-notes
 */

import { errorMessage } from '@/errors';
import { composeNote } from '@/notes/composer';
import { mergeNote } from '@/notes/merger';
import type {
  BranchName,
  NoteFormat,
  NoteSyncResult,
  ReviewLookup,
  ReviewRef,
  ReviewService,
  Stack,
} from '@/types';
import type { StackContext } from '@/utils/stacking';
import {
  validateOptionalBranch,
  validateOptionalFlag,
  validateOptionalFormat,
} from '@/utils/validation';

export interface UpdateNotesArgs {
  branch?: unknown;
  format?: unknown;
  dry_run?: unknown;
}

export interface UpdateNotesResponse {
  format: NoteFormat;
  dryRun: boolean;
  /** One result per stack branch, head-first */
  results: NoteSyncResult[];
}

/**
 * Memoizes PR lookups for the duration of one run.
 *
 * Failed lookups are not cached, so a later branch retries them.
 */
function memoizedLookup(reviews: ReviewService): ReviewLookup {
  const known = new Map<BranchName, ReviewRef | null>();

  return async (branch) => {
    if (known.has(branch)) {
      return known.get(branch) ?? null;
    }
    const pr = await reviews.reviewFor(branch);
    known.set(branch, pr);
    return pr;
  };
}

async function syncBranch(
  branch: BranchName,
  stack: Stack,
  format: NoteFormat,
  dryRun: boolean,
  lookup: ReviewLookup,
  ctx: StackContext
): Promise<NoteSyncResult> {
  const pr = await lookup(branch);
  if (pr === null) {
    return { branch, status: 'skipped' };
  }

  const note = await composeNote({ branch, format, reviews: lookup, stack });
  const body = await ctx.reviews.reviewBody(branch);
  const merged = mergeNote(body, note);

  if (merged === body) {
    return { branch, pr, status: 'unchanged' };
  }

  if (dryRun) {
    return { body: merged, branch, pr, status: 'dry-run' };
  }

  await ctx.reviews.updateReviewBody(branch, merged);
  return { branch, pr, status: 'updated' };
}

/**
 * @param args - Optional head branch (defaults to the checked-out branch), format and dry_run
 * @throws {HistoryQueryError} If the current branch cannot be read
 * @throws {StackResolutionError} If the stack cannot be resolved
 */
export async function handleUpdateNotes(
  args: UpdateNotesArgs,
  ctx: StackContext
): Promise<UpdateNotesResponse> {
  const format = validateOptionalFormat(args.format, ctx.config.noteFormat);
  const dryRun = validateOptionalFlag(args.dry_run, 'dry_run');
  const branch = validateOptionalBranch(args.branch);

  const stack = branch ? await ctx.walker.stackFrom(branch) : await ctx.walker.currentStack();
  const lookup = memoizedLookup(ctx.reviews);
  const results: NoteSyncResult[] = [];

  for (const candidate of stack) {
    try {
      results.push(await syncBranch(candidate, stack, format, dryRun, lookup, ctx));
    } catch (error) {
      const message = errorMessage(error);
      ctx.logger.error('failed to update note', { branch: candidate, error: message });
      results.push({ branch: candidate, error: message, status: 'failed' });
    }
  }

  return { dryRun, format, results };
}
