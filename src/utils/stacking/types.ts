/**
 * Stack context types.
 *
 * A StackContext bundles the adapters and settings one top-level operation
 * works with. Handlers receive it explicitly, so tests can swap the git and gh
 * adapters for in-process fakes.
 *
 * @module utils/stacking/types
 */

import type { HistoryService, ParentResolver, ReviewService } from '@/types';
import type { StackNotesConfig } from '@/utils/config';
import type { Logger } from '@/utils/logger';
import type { StackWalker } from '@/utils/stacking/walker';

export interface StackContext {
  history: HistoryService;
  reviews: ReviewService;
  resolver: ParentResolver;
  walker: StackWalker;
  config: StackNotesConfig;
  logger: Logger;
}
