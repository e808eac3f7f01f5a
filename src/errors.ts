/**
 * Typed errors for stack-notes.
 *
 * Every failure carries the branch or operation it happened in so the CLI and
 * MCP boundaries can report it without extra context.
 *
 * @module errors
 */

import type { BranchName, Stack } from '@/types';

/**
 * Base error class for all stack-notes errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A git query failed to run or returned output that could not be decoded.
 */
export class HistoryQueryError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'HistoryQueryError';
  }
}

/**
 * No local branch named `main` or `master` exists.
 */
export class TrunkNotFoundError extends AppError {
  constructor() {
    super('Trunk branch not found. Is it named something other than `main` or `master`?');
    this.name = 'TrunkNotFoundError';
  }
}

/**
 * Parent resolution failed part-way through a stack walk.
 */
export class StackResolutionError extends AppError {
  constructor(
    public readonly branch: BranchName,
    cause: unknown
  ) {
    super(`Failed to resolve stack at branch '${branch}': ${errorMessage(cause)}`, cause);
    this.name = 'StackResolutionError';
  }
}

/**
 * The review-hosting service failed for a reason other than "not found".
 */
export class ReviewLookupError extends AppError {
  constructor(
    message: string,
    public readonly branch: BranchName,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'ReviewLookupError';
  }
}

export class BranchNotInStackError extends AppError {
  constructor(
    public readonly branch: BranchName,
    public readonly stackBranches: Stack
  ) {
    super(`Branch '${branch}' is not in the stack`);
    this.name = 'BranchNotInStackError';
  }
}

/**
 * Writing a new body back to a review request failed.
 */
export class NoteUpdateError extends AppError {
  constructor(
    message: string,
    public readonly branch: BranchName,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'NoteUpdateError';
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Renders any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
