/**
 * Stack handler.
 *
 * Lists the branches from a branch down to trunk, optionally with their PRs.
 *
 * @module handlers/stack
 */

import type { BranchName, ReviewRef } from '@/types';
import type { StackContext } from '@/utils/stacking';
import { validateOptionalBranch, validateOptionalFlag } from '@/utils/validation';

export interface StackArgs {
  branch?: unknown;
  prs?: unknown;
}

export interface StackPr {
  branch: BranchName;
  pr: ReviewRef;
}

export interface StackResponse {
  /** Head-first, trunk excluded */
  branches: BranchName[];
  /** Branches with a PR, in stack order (only when requested) */
  prs?: StackPr[];
}

/**
 * @throws {StackResolutionError} If the stack cannot be resolved
 * @throws {ReviewLookupError} If a PR lookup fails
 */
export async function handleStack(args: StackArgs, ctx: StackContext): Promise<StackResponse> {
  const branch = validateOptionalBranch(args.branch);
  const withPrs = validateOptionalFlag(args.prs, 'prs');

  const branches = branch ? await ctx.walker.stackFrom(branch) : await ctx.walker.currentStack();
  if (!withPrs) {
    return { branches };
  }

  const prs: StackPr[] = [];
  for (const candidate of branches) {
    const pr = await ctx.reviews.reviewFor(candidate);
    if (pr !== null) {
      prs.push({ branch: candidate, pr });
    }
  }

  return { branches, prs };
}
