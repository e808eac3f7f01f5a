/**
 * Stack walker.
 *
 * Builds the head-first branch chain by resolving parents one step at a time
 * until the trunk, a dead end, a cycle or the depth limit is reached.
 *
 * @module utils/stacking/walker
 */

import { StackResolutionError } from '@/errors';
import type { BranchName, HistoryService, ParentResolver, Stack } from '@/types';
import { type Logger, silentLogger } from '@/utils/logger';

export interface StackWalkerOptions {
  /** Maximum number of branches in a stack */
  maxDepth: number;
  logger?: Logger;
}

export class StackWalker {
  private readonly logger: Logger;

  constructor(
    private readonly history: HistoryService,
    private readonly resolver: ParentResolver,
    private readonly options: StackWalkerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves the stack ending in `branch`.
   *
   * Walk stops when the parent is:
   * - the trunk (excluded)
   * - the branch itself
   * - not discoverable (null)
   * - already in the stack
   *
   * or once the stack holds `maxDepth` branches.
   *
   * The trunk's own stack is empty.
   *
   * @returns Branches from `branch` (index 0) down to the one nearest trunk
   * @throws {StackResolutionError} If trunk lookup or any parent resolution fails
   */
  async stackFrom(branch: BranchName): Promise<Stack> {
    let trunk: BranchName;
    try {
      trunk = await this.history.trunkBranch();
    } catch (error) {
      throw new StackResolutionError(branch, error);
    }

    if (branch === trunk) {
      return [];
    }

    const stack: Stack = [branch];
    let current = branch;

    for (;;) {
      let parent: BranchName | null;
      try {
        parent = await this.resolver.parent(current);
      } catch (error) {
        throw new StackResolutionError(current, error);
      }

      if (parent === null || parent === trunk || parent === current) {
        return stack;
      }

      if (stack.includes(parent)) {
        this.logger.warn('cycle in branch history, stopping', { branch: current, parent });
        return stack;
      }

      if (stack.length >= this.options.maxDepth) {
        this.logger.warn('stack depth limit reached, stopping', {
          branch,
          maxDepth: this.options.maxDepth,
        });
        return stack;
      }

      stack.push(parent);
      current = parent;
    }
  }

  /**
   * Resolves the stack ending in the checked-out branch.
   *
   * @throws {HistoryQueryError} If the current branch cannot be read
   * @throws {StackResolutionError} If the walk fails
   */
  async currentStack(): Promise<Stack> {
    return this.stackFrom(await this.history.currentBranch());
  }
}
