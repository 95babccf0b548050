import { MatchNotFoundError } from '../shared/index.js';

/** First match of `pattern` in `text`, or MatchNotFoundError. */
export function regexSearch(pattern: RegExp, text: string): RegExpExecArray {
  const re = new RegExp(pattern.source, pattern.flags.replace('g', ''));
  const match = re.exec(text);
  if (!match) {
    throw new MatchNotFoundError(pattern, text);
  }
  return match;
}

/**
 * Capture `group` of every match of `pattern`, in document order.
 * Returns an empty array when nothing matches.
 */
export function regexFindAll(pattern: RegExp, text: string, group = 1): string[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const re = new RegExp(pattern.source, flags);
  const out: string[] = [];
  for (const match of text.matchAll(re)) {
    out.push(match[group] ?? '');
  }
  return out;
}

/** Capture group `group` of the first match, as a string. */
export function captureString(pattern: RegExp, text: string, group = 1): string {
  return regexSearch(pattern, text)[group] ?? '';
}

export function captureFloat(pattern: RegExp, text: string, group = 1): number {
  return Number(captureString(pattern, text, group));
}

export function captureInt(pattern: RegExp, text: string, group = 1): number {
  return parseInt(captureString(pattern, text, group), 10);
}
