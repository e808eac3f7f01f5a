/**
 * Parent handler.
 *
 * Resolves the structural parent of a branch.
 *
 * @module handlers/parent
 */

import type { BranchName } from '@/types';
import type { StackContext } from '@/utils/stacking';
import { validateOptionalBranch } from '@/utils/validation';

export interface ParentArgs {
  branch?: unknown;
}

export interface ParentResponse {
  branch: BranchName;
  /** null when no parent is discoverable (the branch sits on trunk) */
  parent: BranchName | null;
}

/**
 * @param args - Optional branch (defaults to the checked-out branch)
 * @throws {HistoryQueryError} If git cannot be queried
 */
export async function handleParent(args: ParentArgs, ctx: StackContext): Promise<ParentResponse> {
  const branch = validateOptionalBranch(args.branch) ?? (await ctx.history.currentBranch());
  const parent = await ctx.resolver.parent(branch);

  if (parent === null) {
    ctx.logger.info('no parent found within history window', {
      branch,
      historyWindow: ctx.config.historyWindow,
    });
  }

  return { branch, parent };
}
