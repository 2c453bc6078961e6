import { FaqEntry, SupportStore } from '../database/types';
import { TextCompletion } from '../llm/completion';
import { logger } from '../utils/logger';
import { extractKeywords, extractNameFromQuestion, isGeneralQuestion } from './queryAnalysis';

export const FAQ_CANDIDATE_LIMIT = 3;
export const NO_INFORMATION_FOUND = 'No information found.';

export interface DatabaseQueryResult {
  found: boolean;
  response: string;
}

export function formatTeamMember(member: { name: string; bio: string }): string {
  return `${member.name}: ${member.bio}`;
}

/**
 * Answers questions from structured data: the team directory and the FAQ.
 *
 * Every lookup swallows its own failure into "no result" after logging it,
 * so a broken table never hides answers the other table could give.
 */
export class DatabaseQueryService {
  constructor(
    private store: SupportStore,
    private faqSelector?: TextCompletion
  ) {}

  async query(question: string): Promise<DatabaseQueryResult> {
    const general = isGeneralQuestion(question);

    if (general) {
      const faqResult = await this.queryFaq(question);
      if (faqResult) {
        return { found: true, response: faqResult };
      }
    }

    const teamResult = await this.queryTeamInfo(question);
    if (teamResult) {
      return { found: true, response: teamResult };
    }

    if (!general) {
      const faqResult = await this.queryFaq(question);
      if (faqResult) {
        return { found: true, response: faqResult };
      }
    }

    return { found: false, response: NO_INFORMATION_FOUND };
  }

  async queryTeamInfo(question: string): Promise<string | null> {
    const name = extractNameFromQuestion(question);
    if (!name) {
      return null;
    }

    try {
      const nameLower = name.toLowerCase();
      const member = await this.store.findTeamMemberExact(nameLower)
        ?? await this.store.findTeamMemberPartial(nameLower);
      return member ? formatTeamMember(member) : null;
    } catch (error) {
      logger.error('Error querying team info', error as Error, {
        operation: 'team_lookup'
      });
      return null;
    }
  }

  async queryFaq(question: string): Promise<string | null> {
    try {
      if (!(await this.store.hasFaqTable())) {
        return null;
      }

      const keywords = extractKeywords(question);
      if (keywords.length > 0) {
        const candidates = await this.store.findFaqCandidates(keywords, question, FAQ_CANDIDATE_LIMIT);
        if (candidates.length > 0) {
          if (this.faqSelector && candidates.length > 1) {
            return await this.selectFaqAnswer(question, candidates, this.faqSelector);
          }
          return candidates[0].answer;
        }
      }

      const phraseMatch = await this.store.findFaqByPhrase(question);
      return phraseMatch ? phraseMatch.answer : null;
    } catch (error) {
      logger.error('Error querying FAQ', error as Error, {
        operation: 'faq_lookup'
      });
      return null;
    }
  }

  /**
   * Ask the model which candidate fits best; anything but a valid 1-based
   * index falls back to the top-ranked candidate.
   */
  async selectFaqAnswer(question: string, candidates: FaqEntry[], selector: TextCompletion): Promise<string> {
    try {
      const reply = await selector.complete(buildFaqSelectionPrompt(question, candidates));
      const trimmed = reply.trim();
      if (/^\d+$/.test(trimmed)) {
        const index = Number(trimmed);
        if (index >= 1 && index <= candidates.length) {
          return candidates[index - 1].answer;
        }
      }
      logger.debug('FAQ selector reply was not a usable index', {
        operation: 'faq_selection'
      }, { reply: trimmed.substring(0, 50) });
    } catch (error) {
      logger.warn('FAQ selection failed, using top candidate', {
        operation: 'faq_selection'
      }, { error: (error as Error).message });
    }
    return candidates[0].answer;
  }
}

export function buildFaqSelectionPrompt(question: string, candidates: FaqEntry[]): string {
  const options = candidates
    .map((faq, i) => `${i + 1}. Q: ${faq.question} - A: ${faq.answer.substring(0, 100)}...`)
    .join('\n');

  return [
    `User Question: "${question}"`,
    'Which of these FAQ answers best matches the user\'s question?',
    `Return ONLY the number (1-${candidates.length}) of the best match:`,
    '',
    options,
    'Respond with only the number:'
  ].join('\n');
}
