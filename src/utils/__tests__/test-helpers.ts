/**
 * Test helpers: in-process fakes for the git and gh adapters, and MCP
 * response parsing.
 *
 * @module utils/__tests__/test-helpers
 */

import {
  HistoryQueryError,
  NoteUpdateError,
  ReviewLookupError,
  TrunkNotFoundError,
} from '@/errors';
import type {
  BranchName,
  DecoratedEntry,
  HistoryService,
  ReviewRef,
  ReviewService,
} from '@/types';
import { DEFAULT_CONFIG, type StackNotesConfig } from '@/utils/config';
import { type Logger, silentLogger } from '@/utils/logger';
import { createStackContext, type StackContext } from '@/utils/stacking';

export interface FakeHistoryOptions {
  current?: BranchName;
  branches?: BranchName[];
  remotes?: string[];
  /** Decoration labels per log entry, keyed by branch */
  history?: Record<BranchName, string[][]>;
  /** Branches whose decoratedHistory() fails */
  broken?: BranchName[];
}

/**
 * HistoryService backed by fixed data.
 */
export class FakeHistory implements HistoryService {
  readonly historyCalls: BranchName[] = [];

  constructor(private readonly options: FakeHistoryOptions) {}

  async currentBranch(): Promise<BranchName> {
    if (this.options.current === undefined) {
      throw new HistoryQueryError('HEAD is detached', 'current-branch');
    }
    return this.options.current;
  }

  async localBranches(): Promise<BranchName[]> {
    return this.options.branches ?? ['main'];
  }

  async trunkBranch(): Promise<BranchName> {
    const branches = await this.localBranches();
    const trunk = ['main', 'master'].find((name) => branches.includes(name));
    if (!trunk) {
      throw new TrunkNotFoundError();
    }
    return trunk;
  }

  async remotes(): Promise<string[]> {
    return this.options.remotes ?? ['origin'];
  }

  async decoratedHistory(branch: BranchName): Promise<DecoratedEntry[]> {
    this.historyCalls.push(branch);
    if (this.options.broken?.includes(branch)) {
      throw new HistoryQueryError(`git log failed for ${branch}`, 'decorated-history');
    }
    const entries = this.options.history?.[branch] ?? [];
    return entries.map((labels, position) => ({ commit: `sha-${branch}-${position}`, labels, position }));
  }
}

export interface FakeReviewsOptions {
  prs?: Record<BranchName, ReviewRef>;
  bodies?: Record<BranchName, string>;
  /** Branches whose reviewFor() fails */
  brokenLookups?: BranchName[];
  /** Branches whose updateReviewBody() fails */
  brokenUpdates?: BranchName[];
}

/**
 * ReviewService backed by fixed data. Updates are recorded and applied to the
 * in-memory bodies.
 */
export class FakeReviews implements ReviewService {
  readonly lookups: BranchName[] = [];
  readonly updates: Array<{ branch: BranchName; body: string }> = [];
  private readonly bodies: Map<BranchName, string>;

  constructor(private readonly options: FakeReviewsOptions = {}) {
    this.bodies = new Map(Object.entries(options.bodies ?? {}));
  }

  async reviewFor(branch: BranchName): Promise<ReviewRef | null> {
    this.lookups.push(branch);
    if (this.options.brokenLookups?.includes(branch)) {
      throw new ReviewLookupError(`gh pr view failed for '${branch}': HTTP 502`, branch);
    }
    return this.options.prs?.[branch] ?? null;
  }

  async reviewBody(branch: BranchName): Promise<string> {
    return this.bodies.get(branch) ?? '';
  }

  async updateReviewBody(branch: BranchName, body: string): Promise<void> {
    if (this.options.brokenUpdates?.includes(branch)) {
      throw new NoteUpdateError(`gh pr edit failed for '${branch}': permission denied`, branch);
    }
    this.updates.push({ body, branch });
    this.bodies.set(branch, body);
  }

  bodyOf(branch: BranchName): string | undefined {
    return this.bodies.get(branch);
  }
}

/**
 * History for `feature-c -> feature-b -> feature-a -> main`.
 */
export function linearHistory(current: BranchName = 'feature-c'): FakeHistory {
  return new FakeHistory({
    branches: ['feature-a', 'feature-b', 'feature-c', 'main'],
    current,
    history: {
      'feature-a': [['origin/main', 'main']],
      'feature-b': [['feature-a', 'origin/feature-a']],
      'feature-c': [['feature-b']],
    },
  });
}

export function createTestContext(
  history: HistoryService,
  reviews: ReviewService = new FakeReviews(),
  config: Partial<StackNotesConfig> = {},
  logger: Logger = silentLogger
): StackContext {
  return createStackContext({ cwd: '/work/repo' }, { ...DEFAULT_CONFIG, ...config }, logger, {
    history,
    reviews,
  });
}

/**
 * Extracts the parsed JSON payload from an MCP tool result.
 *
 * @example
 * ```typescript
 * const result = await client.callTool({ arguments: {}, name: 'stack_list' });
 * const data = extractMCPData<StackResponse>(result);
 * expect(data.branches).toEqual(['feature-c', 'feature-b', 'feature-a']);
 * ```
 */
export function extractMCPData<T = unknown>(response: unknown): T {
  if (
    typeof response === 'object' &&
    response !== null &&
    'content' in response &&
    Array.isArray(response.content)
  ) {
    const first: unknown = response.content[0];
    if (
      typeof first === 'object' &&
      first !== null &&
      'text' in first &&
      typeof first.text === 'string'
    ) {
      return JSON.parse(first.text) as T;
    }
  }
  throw new Error('Expected text content in MCP response');
}
