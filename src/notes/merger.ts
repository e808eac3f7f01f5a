/**
 * Note merger.
 *
 * Keeps one tool-managed region inside a PR body, delimited by HTML comments
 * that render invisibly on GitHub. The marker strings are read back from PR
 * bodies written by earlier runs and must not change.
 *
 * @module notes/merger
 */

export const NOTE_START = '<!-- stack-notes:start -->';
export const NOTE_END = '<!-- stack-notes:end -->';

interface NoteRegion {
  /** Index just past NOTE_START */
  contentStart: number;
  /** Index of NOTE_END */
  contentEnd: number;
}

/**
 * Locates the managed region: the first NOTE_START and the first NOTE_END
 * after it. Lone or out-of-order markers yield no region.
 */
function findRegion(body: string): NoteRegion | undefined {
  const start = body.indexOf(NOTE_START);
  if (start === -1) {
    return undefined;
  }

  const contentStart = start + NOTE_START.length;
  const contentEnd = body.indexOf(NOTE_END, contentStart);
  if (contentEnd === -1) {
    return undefined;
  }

  return { contentEnd, contentStart };
}

/**
 * Escapes HTML comment openers so text inside a note can never read as a
 * region marker. GitHub renders `&lt;!--` as `<!--`.
 */
export function escapeNote(note: string): string {
  return note.replaceAll('<!--', '&lt;!--');
}

/**
 * Wraps a note in the region markers.
 */
export function noteBlock(note: string): string {
  return `${NOTE_START}\n${escapeNote(note)}\n${NOTE_END}`;
}

export function hasNote(body: string): boolean {
  return findRegion(body) !== undefined;
}

/**
 * Inserts or replaces the managed note in a PR body.
 *
 * With a region present, only the text between the markers changes. Without
 * one, a new block is prepended and the original body follows unmodified.
 * Marker text inside the note is escaped.
 *
 * @example
 * ```typescript
 * mergeNote('Adds caching.', '> [!Note]');
 * // '<!-- stack-notes:start -->\n> [!Note]\n<!-- stack-notes:end -->\n\nAdds caching.'
 * ```
 */
export function mergeNote(body: string, note: string): string {
  const region = findRegion(body);

  if (!region) {
    return body.length === 0 ? noteBlock(note) : `${noteBlock(note)}\n\n${body}`;
  }

  return `${body.slice(0, region.contentStart)}\n${escapeNote(note)}\n${body.slice(region.contentEnd)}`;
}
