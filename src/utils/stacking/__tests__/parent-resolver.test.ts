import { describe, expect, it } from 'vitest';
import { HistoryQueryError } from '@/errors';
import { FakeHistory } from '@/utils/__tests__/test-helpers';
import { DecorationParentResolver, localBranchLabels } from '@/utils/stacking/parent-resolver';

describe('localBranchLabels', () => {
  it('strips the HEAD pointer and drops tags and remote refs', () => {
    expect(
      localBranchLabels(['HEAD -> feature-b', 'origin/feature-b', 'tag: v1.2.0'], ['origin'])
    ).toEqual(['feature-b']);
  });

  it('drops a bare HEAD', () => {
    expect(localBranchLabels(['HEAD', 'origin/HEAD'], ['origin'])).toEqual([]);
  });

  it('keeps local branches that contain slashes', () => {
    expect(localBranchLabels(['upstream/main', 'alice/feature'], ['upstream'])).toEqual([
      'alice/feature',
    ]);
  });

  it('preserves declaration order', () => {
    expect(localBranchLabels(['zeta', 'alpha'], ['origin'])).toEqual(['zeta', 'alpha']);
  });
});

describe('DecorationParentResolver', () => {
  it('returns the first local branch of the first qualifying entry', async () => {
    const history = new FakeHistory({
      history: {
        'feature-b': [
          ['origin/feature-b', 'tag: wip'],
          ['feature-a', 'other-a', 'origin/feature-a'],
          ['main'],
        ],
      },
    });

    const resolver = new DecorationParentResolver(history);

    expect(await resolver.parent('feature-b')).toBe('feature-a');
  });

  it('returns null when no entry carries a local branch', async () => {
    const history = new FakeHistory({
      history: { orphan: [['origin/orphan'], ['tag: v1'], []] },
    });

    expect(await new DecorationParentResolver(history).parent('orphan')).toBeNull();
  });

  it('returns null for an empty window', async () => {
    const history = new FakeHistory({ history: {} });

    expect(await new DecorationParentResolver(history).parent('fresh')).toBeNull();
  });

  it('filters refs of every configured remote', async () => {
    const history = new FakeHistory({
      history: { topic: [['fork/base', 'upstream/base'], ['base']] },
      remotes: ['fork', 'upstream'],
    });

    expect(await new DecorationParentResolver(history).parent('topic')).toBe('base');
  });

  it('assumes origin when the repository has no remotes', async () => {
    const history = new FakeHistory({
      history: { topic: [['origin/base', 'base']] },
      remotes: [],
    });

    expect(await new DecorationParentResolver(history).parent('topic')).toBe('base');
  });

  it('propagates history failures', async () => {
    const history = new FakeHistory({ broken: ['feature-b'] });

    await expect(new DecorationParentResolver(history).parent('feature-b')).rejects.toBeInstanceOf(
      HistoryQueryError
    );
  });
});
