import { FaqEntry } from './types';

interface RankedEntry {
  entry: FaqEntry;
  relevance: number;
}

/**
 * In-memory equivalent of the keyword LIKE query used by the SQL store.
 */
export function rankFaqCandidates(
  entries: FaqEntry[],
  keywords: string[],
  question: string,
  limit: number
): FaqEntry[] {
  if (keywords.length === 0) {
    return [];
  }

  const phrase = question.toLowerCase();
  const ranked: RankedEntry[] = [];

  for (const entry of entries) {
    const entryQuestion = entry.question.toLowerCase();
    const entryAnswer = entry.answer.toLowerCase();
    const matches = keywords.some(keyword => entryQuestion.includes(keyword) || entryAnswer.includes(keyword));
    if (!matches) {
      continue;
    }

    let relevance = 3;
    if (entryQuestion.includes(phrase)) {
      relevance = 1;
    } else if (entryAnswer.includes(phrase)) {
      relevance = 2;
    }
    ranked.push({ entry, relevance });
  }

  // Array.prototype.sort is stable, so equal rows keep insertion order
  ranked.sort((a, b) => a.relevance - b.relevance || a.entry.question.length - b.entry.question.length);

  return ranked.slice(0, limit).map(r => r.entry);
}

export function findFaqByPhrase(entries: FaqEntry[], question: string): FaqEntry | null {
  const phrase = question.toLowerCase();
  const matches = entries
    .filter(entry => entry.question.toLowerCase().includes(phrase) || entry.answer.toLowerCase().includes(phrase))
    .sort((a, b) => a.question.length - b.question.length);
  return matches[0] ?? null;
}
