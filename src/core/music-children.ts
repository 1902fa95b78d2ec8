import type { Music } from './ast.js';

/** Deepest chain of nested music expressions the parser accepts. */
export const MAX_NESTING_DEPTH = 256;

/**
 * Direct music children of `music` in source order.
 * Assignment values inside `\with` blocks are not included.
 */
export function musicChildren(music: Music): Music[] {
  switch (music.kind) {
    case 'sequential':
    case 'simultaneous':
      return music.items;
    case 'relative':
    case 'fixed':
    case 'transpose':
    case 'contextedMusic':
    case 'tuplet':
    case 'grace':
    case 'acciaccatura':
    case 'appoggiatura':
    case 'lyricMode':
    case 'lyricsTo':
    case 'once':
    case 'tweak':
    case 'chordMode':
    case 'drumMode':
    case 'figureMode':
      return [music.body];
    case 'afterGrace':
      return [music.main, music.grace];
    case 'repeat':
      return [music.body, ...(music.alternatives ?? [])];
    case 'addLyrics':
      return [music.music, ...music.lyrics];
    case 'musicFunction':
      return music.args.flatMap((arg) => (arg.kind === 'music' ? [arg.music] : []));
    default:
      return [];
  }
}

/**
 * Length of the longest chain of nested music from `music` down, counted the
 * way the parser counts open expressions. An `\addlyrics` wrapper shares the
 * level of the music it attaches to.
 */
export function musicDepth(music: Music): number {
  let deepest = 0;
  const pending: Array<[Music, number]> = [[music, 1]];
  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const [node, depth] = entry;
    deepest = Math.max(deepest, depth);
    const childDepth = node.kind === 'addLyrics' ? depth : depth + 1;
    for (const child of musicChildren(node)) {
      pending.push([child, childDepth]);
    }
  }
  return deepest;
}
