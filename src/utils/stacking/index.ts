/**
 * Stack context factory.
 *
 * Wires the git history adapter, the decoration parent resolver, the stack
 * walker and the gh review adapter for one repository. The parent resolver is
 * the only piece that knows how parents are inferred; swapping it leaves the
 * walker and the notes untouched.
 *
 * @module utils/stacking
 */

import type { HistoryService, RepoContext, ReviewService } from '@/types';
import type { StackNotesConfig } from '@/utils/config';
import { GitHistory } from '@/utils/git';
import { GhReviews } from '@/utils/github';
import type { Logger } from '@/utils/logger';
import { DecorationParentResolver } from '@/utils/stacking/parent-resolver';
import type { StackContext } from '@/utils/stacking/types';
import { StackWalker } from '@/utils/stacking/walker';

/**
 * Adapter overrides, used by tests to inject fakes.
 */
export interface StackContextOverrides {
  history?: HistoryService;
  reviews?: ReviewService;
}

/**
 * Build the context for operations against one repository.
 *
 * @example
 * ```typescript
 * const ctx = createStackContext({ cwd: '/work/repo' }, loadConfig(), logger);
 * const stack = await ctx.walker.currentStack();
 * ```
 */
export function createStackContext(
  repo: RepoContext,
  config: StackNotesConfig,
  logger: Logger,
  overrides: StackContextOverrides = {}
): StackContext {
  const history =
    overrides.history ??
    new GitHistory(repo, { historyWindow: config.historyWindow, logger: logger.child({ adapter: 'git' }) });
  const reviews = overrides.reviews ?? new GhReviews(repo, logger.child({ adapter: 'gh' }));
  const resolver = new DecorationParentResolver(history);
  const walker = new StackWalker(history, resolver, { logger, maxDepth: config.maxStackDepth });

  return { config, history, logger, resolver, reviews, walker };
}

export { DecorationParentResolver, localBranchLabels } from '@/utils/stacking/parent-resolver';
export type { StackContext } from '@/utils/stacking/types';
export { StackWalker } from '@/utils/stacking/walker';
