/**
 * Note composer.
 *
 * Renders the markdown note that links a PR to its neighbors in the stack.
 * "Previous" is the branch one step closer to trunk (the PR this one stacks
 * on), "next" is the branch one step closer to the head (the PR stacked on
 * this one).
 *
 * @module notes/composer
 */

import { BranchNotInStackError } from '@/errors';
import type { BranchName, NoteFormat, ReviewLookup, ReviewRef, Stack } from '@/types';

const CALLOUT = '> [!Note]';

export const ONLY_PR_SENTENCE = 'This is currently the only PR in the stack';

/**
 * A branch's review, as rendered by the list format.
 */
export interface ListEntry {
  pr: ReviewRef;
  current: boolean;
}

/**
 * Renders the double-linked callout.
 *
 * @example
 * renderDouble('41', null);
 * // '> [!Note]\n> - Previous PR: #41'
 */
export function renderDouble(previous: ReviewRef | null, next: ReviewRef | null): string {
  const lines = [CALLOUT];

  if (previous !== null) {
    lines.push(`> - Previous PR: #${previous}`);
  }
  if (next !== null) {
    lines.push(`> - Next PR: #${next}`);
  }
  if (lines.length === 1) {
    lines.push(`> ${ONLY_PR_SENTENCE}`);
  }

  return lines.join('\n');
}

/**
 * Renders the full-stack list. Entries are expected base-to-head.
 */
export function renderList(entries: ListEntry[]): string {
  const lines = [CALLOUT, '> PRs in the stack:'];
  for (const entry of entries) {
    lines.push(`> - #${entry.pr}${entry.current ? ' (this)' : ''}`);
  }
  return lines.join('\n');
}

/**
 * Renders the previous/next table. Missing neighbors read `None`.
 *
 * @example
 * renderTable(null, null);
 * // '| Previous PR | Next PR |\n|-------------|---------|\n| None | None |'
 */
export function renderTable(previous: ReviewRef | null, next: ReviewRef | null): string {
  const cell = (pr: ReviewRef | null) => (pr === null ? 'None' : `#${pr}`);
  return [
    '| Previous PR | Next PR |',
    '|-------------|---------|',
    `| ${cell(previous)} | ${cell(next)} |`,
  ].join('\n');
}

export interface ComposeNoteOptions {
  /** Head-first stack containing `branch` */
  stack: Stack;
  /** Focal branch */
  branch: BranchName;
  format: NoteFormat;
  reviews: ReviewLookup;
}

/**
 * Neighbors of the branch at `index` in a head-first stack.
 */
export function neighbors(
  stack: Stack,
  index: number
): { previous: BranchName | undefined; next: BranchName | undefined } {
  return {
    next: index > 0 ? stack[index - 1] : undefined,
    previous: stack[index + 1],
  };
}

async function lookup(
  reviews: ReviewLookup,
  branch: BranchName | undefined
): Promise<ReviewRef | null> {
  return branch === undefined ? null : reviews(branch);
}

/**
 * Composes the note for `branch`.
 *
 * Reviews are looked up one branch at a time, and only for the branches the
 * format shows.
 *
 * @throws {BranchNotInStackError} If `branch` is not in `stack`
 * @throws {ReviewLookupError} If a review lookup fails
 */
export async function composeNote(options: ComposeNoteOptions): Promise<string> {
  const { branch, format, reviews, stack } = options;

  const index = stack.indexOf(branch);
  if (index === -1) {
    throw new BranchNotInStackError(branch, stack);
  }

  if (format === 'list') {
    const entries: ListEntry[] = [];
    for (const candidate of [...stack].reverse()) {
      const pr = await reviews(candidate);
      if (pr !== null) {
        entries.push({ current: candidate === branch, pr });
      }
    }
    return renderList(entries);
  }

  const around = neighbors(stack, index);
  const previous = await lookup(reviews, around.previous);
  const next = await lookup(reviews, around.next);

  return format === 'table' ? renderTable(previous, next) : renderDouble(previous, next);
}
