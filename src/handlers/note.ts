/**
 * Note handler.
 *
 * Renders the stack note for a single branch without touching its PR.
 *
 * @module handlers/note
 */

import { composeNote } from '@/notes/composer';
import type { BranchName, NoteFormat } from '@/types';
import type { StackContext } from '@/utils/stacking';
import { validateOptionalBranch, validateOptionalFormat } from '@/utils/validation';

export interface NoteArgs {
  branch?: unknown;
  format?: unknown;
}

export interface NoteResponse {
  branch: BranchName;
  format: NoteFormat;
  note: string;
}

/**
 * The note describes the branch's neighbors in the stack that ends in the
 * checked-out branch, so a branch below the current one gets a "Next PR".
 *
 * @throws {HistoryQueryError} If the current branch cannot be read
 * @throws {StackResolutionError} If the stack cannot be resolved
 * @throws {BranchNotInStackError} If the branch is not in the current stack
 * @throws {ReviewLookupError} If a PR lookup fails
 */
export async function handleNote(args: NoteArgs, ctx: StackContext): Promise<NoteResponse> {
  const format = validateOptionalFormat(args.format, ctx.config.noteFormat);
  const requested = validateOptionalBranch(args.branch);

  const current = await ctx.history.currentBranch();
  const stack = await ctx.walker.stackFrom(current);
  const branch = requested ?? current;
  const note = await composeNote({
    branch,
    format,
    reviews: (candidate) => ctx.reviews.reviewFor(candidate),
    stack,
  });

  return { branch, format, note };
}
