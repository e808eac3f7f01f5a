/**
 * Decoration-based parent resolution.
 *
 * Infers a branch's parent from the nearest decorated ancestor on its
 * first-parent history. This is a heuristic over ref decorations, not a
 * stored relationship: branches sharing a tip commit or rebased onto an
 * undecorated commit can resolve to the wrong parent.
 *
 * @module utils/stacking/parent-resolver
 */

import type { BranchName, HistoryService, ParentResolver } from '@/types';

/**
 * Remote assumed when the repository reports none.
 */
const FALLBACK_REMOTES = ['origin'];

const HEAD_POINTER = 'HEAD -> ';
const TAG_PREFIX = 'tag: ';

/**
 * Reduces decoration labels to local branch names.
 *
 * Strips the `HEAD -> ` pointer, then drops a bare `HEAD`, tags and
 * remote-tracking refs. Order is preserved.
 *
 * @param labels - Decoration labels from one log entry
 * @param remotes - Remote names; labels starting with `<remote>/` are dropped
 *
 * @example
 * localBranchLabels(['HEAD -> feat-b', 'origin/feat-b', 'tag: v1'], ['origin']);
 * // ['feat-b']
 */
export function localBranchLabels(labels: string[], remotes: string[]): BranchName[] {
  return labels
    .map((label) => (label.startsWith(HEAD_POINTER) ? label.slice(HEAD_POINTER.length) : label))
    .filter((label) => label.length > 0 && label !== 'HEAD')
    .filter((label) => !label.startsWith(TAG_PREFIX))
    .filter((label) => !remotes.some((remote) => label.startsWith(`${remote}/`)));
}

/**
 * Parent resolver backed by the decorated log.
 *
 * Takes the first entry of the window with a local branch label and returns
 * that entry's first such label.
 */
export class DecorationParentResolver implements ParentResolver {
  readonly name = 'decoration';

  constructor(private readonly history: HistoryService) {}

  /**
   * @returns Parent branch, or null when no decorated ancestor qualifies
   * @throws {HistoryQueryError} If git cannot be queried
   */
  async parent(branch: BranchName): Promise<BranchName | null> {
    const entries = await this.history.decoratedHistory(branch);
    if (entries.length === 0) {
      return null;
    }

    const reported = await this.history.remotes();
    const remotes = reported.length > 0 ? reported : FALLBACK_REMOTES;

    for (const entry of entries) {
      const [first] = localBranchLabels(entry.labels, remotes);
      if (first !== undefined) {
        return first;
      }
    }

    return null;
  }
}
