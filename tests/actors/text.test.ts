/**
 * Text Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { cleanEmotions, cleanText, extractComponents, firstKeyword } from '../../src/actors/text.js';

describe('cleanText', () => {
  it('keeps the last section and strips brackets and self-mentions', () => {
    expect(cleanText('## Draft\n## [Hello] @UserA world', 'UserA')).toBe('Hello world');
  });

  it('strips wrapping quotes', () => {
    expect(cleanText('"Great day!"', 'Bob')).toBe('Great day!');
  });

  it('leaves plain text alone', () => {
    expect(cleanText('Plain text #tag', 'Bob')).toBe('Plain text #tag');
  });
});

describe('extractComponents', () => {
  it('finds hashtags and mentions', () => {
    const text = 'Loving #TypeScript and #node with @alice';
    expect(extractComponents(text, 'hashtags')).toEqual(['#TypeScript', '#node']);
    expect(extractComponents(text, 'mentions')).toEqual(['@alice']);
  });

  it('returns an empty list without matches', () => {
    expect(extractComponents('nothing here', 'hashtags')).toEqual([]);
  });
});

describe('cleanEmotions', () => {
  it('keeps known emotions once, in order', () => {
    expect(cleanEmotions('Joy, anger and JOY; surprise', ['joy', 'anger', 'surprise', 'fear'])).toEqual([
      'joy',
      'anger',
      'surprise',
    ]);
  });
});

describe('firstKeyword', () => {
  const choices = ['DISLIKE', 'LIKE', 'NONE'] as const;

  it('matches whole words case-insensitively', () => {
    expect(firstKeyword('I would say: dislike.', choices)).toBe('DISLIKE');
    expect(firstKeyword('LIKE it', choices)).toBe('LIKE');
  });

  it('ignores keywords inside other words', () => {
    expect(firstKeyword('unlikely', choices)).toBeUndefined();
  });
});
