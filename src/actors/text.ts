/**
 * Post-processing for generated text.
 */

export type ComponentKind = 'hashtags' | 'mentions';

const COMPONENT_PATTERNS: Record<ComponentKind, RegExp> = {
  hashtags: /#\w+/g,
  mentions: /@\w+/g,
};

/**
 * Strip formatting the model tends to wrap around a post: headings, brackets,
 * stray quotes and the actor mentioning itself.
 */
export function cleanText(text: string, actorName: string): string {
  const lastSection = text.split('##').pop() ?? text;
  const handle = `@${actorName.replace(/\s+/g, '')}`;
  return lastSection
    .replaceAll('[', '')
    .replaceAll(']', '')
    .replaceAll('@ ', '')
    .replaceAll('@,', '')
    .replaceAll(handle, '')
    .replaceAll(' ,', ',')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/^[\s()[\]{}'"]+|[\s()[\]{}'"]+$/g, '');
}

export function extractComponents(text: string, kind: ComponentKind): string[] {
  return text.match(COMPONENT_PATTERNS[kind]) ?? [];
}

/**
 * Keep the words of `text` that are known emotions, in order of first
 * appearance, without duplicates.
 */
export function cleanEmotions(text: string, emotions: readonly string[]): string[] {
  const known = new Set(emotions.map((e) => e.toLowerCase()));
  const found: string[] = [];
  for (const word of text.toLowerCase().split(/[\s'"*:,[\]]+/)) {
    if (known.has(word) && !found.includes(word)) found.push(word);
  }
  return found;
}

/** First of the given keywords appearing as a whole word, case-insensitive. */
export function firstKeyword<T extends string>(text: string, keywords: readonly T[]): T | undefined {
  const words = new Set(text.toUpperCase().replace(/[^A-Z\s]/g, ' ').split(/\s+/));
  return keywords.find((k) => words.has(k.toUpperCase()));
}
