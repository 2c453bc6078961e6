import lexicon from '../data/lexicon.json';

const STOP_WORDS = new Set(lexicon.stopWords);

const NAME_PATTERNS = [
  /(?:who is|tell me about|what does|who's|what is)\s+([a-zA-Z\s]+)(?:'s)?/,
  /([a-zA-Z\s]+)(?:'s)?(?:\s+profile|info|bio|other name|role)?$/
];

/**
 * Lower-cased words of three or more letters that are not stop words,
 * deduplicated in order of first appearance.
 */
export function extractKeywords(question: string): string[] {
  const words = question.toLowerCase().match(/\b[a-zA-Z]{3,}\b/g) ?? [];
  const keywords: string[] = [];
  for (const word of words) {
    if (!STOP_WORDS.has(word) && !keywords.includes(word)) {
      keywords.push(word);
    }
  }
  return keywords;
}

/**
 * Best guess at the person a question is about ("who is alice" -> "alice").
 */
export function extractNameFromQuestion(question: string): string | null {
  const questionLower = question.toLowerCase().trim();

  for (const pattern of NAME_PATTERNS) {
    const match = pattern.exec(questionLower);
    if (match) {
      const name = match[1].trim();
      if (name.length > 2) {
        return name;
      }
    }
  }

  // Capitalization only survives in the original text
  const capitalizedWords = question
    .trim()
    .split(/\s+/)
    .filter(word => /^[A-Z]/.test(word));
  if (capitalizedWords.length > 0) {
    return capitalizedWords.join(' ');
  }

  return null;
}

/**
 * General questions (hours, pricing, contact...) are answered from the FAQ first.
 */
export function isGeneralQuestion(question: string): boolean {
  const questionLower = question.toLowerCase();
  return lexicon.generalKeywords.some(keyword => questionLower.includes(keyword));
}

/**
 * Whole-word (or whole-phrase) containment, case-insensitive.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`, 'i').test(text);
}
