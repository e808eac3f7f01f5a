import { describe, expect, it } from 'vitest';
import { StackResolutionError } from '@/errors';
import { handleUpdateNotes } from '@/handlers/update-notes';
import { NOTE_END, NOTE_START, noteBlock } from '@/notes/merger';
import { createLogger } from '@/utils/logger';
import {
  createTestContext,
  FakeHistory,
  FakeReviews,
  linearHistory,
} from '@/utils/__tests__/test-helpers';

const PRS = { 'feature-a': '40', 'feature-b': '41', 'feature-c': '42' };

describe('handleUpdateNotes', () => {
  it('writes a note into every PR of the stack', async () => {
    const reviews = new FakeReviews({
      bodies: { 'feature-a': 'Schema', 'feature-b': 'Service', 'feature-c': 'API' },
      prs: PRS,
    });
    const ctx = createTestContext(linearHistory(), reviews);

    const response = await handleUpdateNotes({}, ctx);

    expect(response.results).toEqual([
      { branch: 'feature-c', pr: '42', status: 'updated' },
      { branch: 'feature-b', pr: '41', status: 'updated' },
      { branch: 'feature-a', pr: '40', status: 'updated' },
    ]);
    expect(reviews.bodyOf('feature-b')).toBe(
      `${noteBlock('> [!Note]\n> - Previous PR: #40\n> - Next PR: #42')}\n\nService`
    );
    expect(reviews.bodyOf('feature-a')).toBe(
      `${noteBlock('> [!Note]\n> - Next PR: #41')}\n\nSchema`
    );
  });

  it('leaves bodies that already carry the note alone', async () => {
    const reviews = new FakeReviews({ bodies: { 'feature-a': 'Schema' }, prs: { 'feature-a': '40' } });
    const ctx = createTestContext(linearHistory('feature-a'), reviews);

    await handleUpdateNotes({}, ctx);
    const second = await handleUpdateNotes({}, ctx);

    expect(second.results).toEqual([{ branch: 'feature-a', pr: '40', status: 'unchanged' }]);
    expect(reviews.updates).toHaveLength(1);
  });

  it('replaces a previous note in place', async () => {
    const reviews = new FakeReviews({
      bodies: { 'feature-a': `Intro\n${NOTE_START}\nold\n${NOTE_END}\nOutro` },
      prs: { 'feature-a': '40' },
    });
    const ctx = createTestContext(linearHistory('feature-a'), reviews);

    await handleUpdateNotes({ format: 'table' }, ctx);

    expect(reviews.bodyOf('feature-a')).toBe(
      `Intro\n${NOTE_START}\n| Previous PR | Next PR |\n|-------------|---------|\n| None | None |\n${NOTE_END}\nOutro`
    );
  });

  it('skips branches without a PR', async () => {
    const reviews = new FakeReviews({ prs: { 'feature-a': '40', 'feature-b': '41' } });
    const ctx = createTestContext(linearHistory(), reviews);

    const response = await handleUpdateNotes({}, ctx);

    expect(response.results[0]).toEqual({ branch: 'feature-c', status: 'skipped' });
    expect(reviews.updates.map((update) => update.branch)).toEqual(['feature-b', 'feature-a']);
  });

  it('computes bodies without writing them in dry-run mode', async () => {
    const reviews = new FakeReviews({ bodies: { 'feature-a': 'Schema' }, prs: { 'feature-a': '40' } });
    const ctx = createTestContext(linearHistory('feature-a'), reviews);

    const response = await handleUpdateNotes({ dry_run: true }, ctx);

    expect(response.dryRun).toBe(true);
    expect(response.results).toEqual([
      {
        body: `${noteBlock('> [!Note]\n> This is currently the only PR in the stack')}\n\nSchema`,
        branch: 'feature-a',
        pr: '40',
        status: 'dry-run',
      },
    ]);
    expect(reviews.updates).toEqual([]);
  });

  it('continues past a branch that fails to update', async () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'error', write: (line) => lines.push(line) });
    const reviews = new FakeReviews({ brokenUpdates: ['feature-b'], prs: PRS });
    const ctx = createTestContext(linearHistory(), reviews, {}, logger);

    const response = await handleUpdateNotes({}, ctx);

    expect(response.results.map((result) => result.status)).toEqual([
      'updated',
      'failed',
      'updated',
    ]);
    expect(response.results[1]).toEqual({
      branch: 'feature-b',
      error: "gh pr edit failed for 'feature-b': permission denied",
      status: 'failed',
    });
    expect(lines).toEqual([
      `[error] failed to update note {"branch":"feature-b","error":"gh pr edit failed for 'feature-b': permission denied"}`,
    ]);
  });

  it('continues past a branch whose PR lookup fails', async () => {
    const reviews = new FakeReviews({ brokenLookups: ['feature-c'], prs: PRS });
    const ctx = createTestContext(linearHistory(), reviews);

    const response = await handleUpdateNotes({}, ctx);

    expect(response.results.map((result) => result.status)).toEqual([
      'failed',
      'failed',
      'updated',
    ]);
  });

  it('looks up each PR once per run', async () => {
    const reviews = new FakeReviews({ prs: PRS });
    const ctx = createTestContext(linearHistory(), reviews);

    await handleUpdateNotes({ format: 'list' }, ctx);

    expect(reviews.lookups).toEqual(['feature-c', 'feature-a', 'feature-b']);
  });

  it('aborts when the stack cannot be resolved', async () => {
    const reviews = new FakeReviews({ prs: PRS });
    const history = new FakeHistory({ broken: ['feature-c'], current: 'feature-c' });
    const ctx = createTestContext(history, reviews);

    await expect(handleUpdateNotes({}, ctx)).rejects.toBeInstanceOf(StackResolutionError);
    expect(reviews.lookups).toEqual([]);
  });
});
