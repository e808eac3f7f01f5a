/**
 * Core TypeScript types for stack-notes.
 *
 * Branches, stacks and review references are plain strings; the interfaces here
 * describe the seams between the git/gh adapters and the stack logic so tests can
 * substitute in-process fakes.
 *
 * @module types
 */

/**
 * Opaque, case-sensitive branch name. Equality is exact string equality.
 */
export type BranchName = string;

/**
 * Ordered branch chain, head-first (index 0 is the leaf), trunk excluded.
 */
export type Stack = BranchName[];

/**
 * Identifier of a hosted review request (PR number as printed by gh).
 */
export type ReviewRef = string;

/**
 * Note rendering mode.
 * - double: previous/next PR callout, like a doubly linked list
 * - list: every PR in the stack, base to head
 * - table: previous/next PR in a two-column table
 */
export type NoteFormat = 'double' | 'list' | 'table';

export const NOTE_FORMATS: readonly NoteFormat[] = ['double', 'list', 'table'];

/**
 * Explicit repository location threaded into every adapter call.
 */
export interface RepoContext {
  /** Working directory of the repository */
  cwd: string;
}

/**
 * One record of the bounded, first-parent decorated log.
 */
export interface DecoratedEntry {
  /** 0-based index inside the returned window */
  position: number;

  /** Full commit hash */
  commit: string;

  /** Short ref decorations as git prints them (e.g. "HEAD -> feat", "origin/feat", "tag: v1") */
  labels: string[];
}

/**
 * Read-only queries against the version-control history.
 */
export interface HistoryService {
  currentBranch(): Promise<BranchName>;
  trunkBranch(): Promise<BranchName>;
  localBranches(): Promise<BranchName[]>;
  remotes(): Promise<string[]>;
  decoratedHistory(branch: BranchName): Promise<DecoratedEntry[]>;
}

/**
 * Queries and updates against the review-hosting service.
 */
export interface ReviewService {
  /** Resolves null when the branch has no review request */
  reviewFor(branch: BranchName): Promise<ReviewRef | null>;
  reviewBody(branch: BranchName): Promise<string>;
  updateReviewBody(branch: BranchName, body: string): Promise<void>;
}

/**
 * Derives the structural parent of a branch.
 *
 * Resolves null when no parent is discoverable; callers treat that as
 * "based on trunk".
 */
export interface ParentResolver {
  readonly name: string;
  parent(branch: BranchName): Promise<BranchName | null>;
}

/**
 * Lookup of a branch's review reference, as used by the note composer.
 */
export type ReviewLookup = (branch: BranchName) => Promise<ReviewRef | null>;

/**
 * Per-branch outcome of a note synchronization run.
 * - updated: body rewritten with the new note
 * - unchanged: body already carried the same note
 * - skipped: branch has no review request
 * - dry-run: new body computed but not written
 * - failed: lookup, compose or update failed for this branch
 */
export type NoteSyncStatus = 'updated' | 'unchanged' | 'skipped' | 'dry-run' | 'failed';

export interface NoteSyncResult {
  branch: BranchName;
  status: NoteSyncStatus;
  pr?: ReviewRef;
  body?: string;
  error?: string;
}
