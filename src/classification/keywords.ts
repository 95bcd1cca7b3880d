/**
 * @fileoverview Keyword matching over task text
 *
 * Text is lower-cased and split on anything that is not a letter or digit, so
 * "read-only", "read only" and "Read_Only" all match the keyword "read only".
 */

import type { TaskContext } from '../types.js';

/** Context keys whose values are treated as extra task text. */
export const TEXT_HINT_KEYS = ['tech_stack', 'file_path', 'domain'] as const;

export function tokenizeText(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0);
}

/** Every string value of `key` in the context, whether given as a string or a list. */
export function contextValues(context: TaskContext, key: string): string[] {
  const value = context[key];
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

/** Task text plus the text-like context hints. */
export function classificationText(task: string, context: TaskContext): string {
  const hints = TEXT_HINT_KEYS.flatMap((key) => contextValues(context, key));
  return [task, ...hints].join(' ');
}

export class KeywordMatcher {
  private readonly haystack: string;
  readonly tokens: readonly string[];

  constructor(text: string) {
    this.tokens = tokenizeText(text);
    this.haystack = ` ${this.tokens.join(' ')} `;
  }

  matches(keyword: string): boolean {
    const needle = tokenizeText(keyword).join(' ');
    return needle.length > 0 && this.haystack.includes(` ${needle} `);
  }

  /** Number of distinct keywords present. */
  count(keywords: readonly string[]): number {
    return new Set(keywords.filter((keyword) => this.matches(keyword))).size;
  }
}

/**
 * Task words worth matching against rule tags: at least three characters and
 * not a stopword. Order of first appearance, no duplicates.
 */
export function significantTokens(text: string, stopwords: readonly string[]): string[] {
  const stop = new Set(stopwords.map((word) => word.toLowerCase()));
  const seen = new Set<string>();
  for (const token of tokenizeText(text)) {
    if (token.length >= 3 && !stop.has(token)) seen.add(token);
  }
  return [...seen];
}
