import { findFaqByPhrase, rankFaqCandidates } from '../../src/database/faqRanking';
import { FaqEntry } from '../../src/database/types';

const faq: FaqEntry[] = [
  { question: 'How do I change my billing address?', answer: 'Go to Settings > Billing.' },
  { question: 'Refunds', answer: 'Annual plans are refundable within 14 days.' },
  { question: 'What is the refund policy for annual plans?', answer: 'See the refund policy page.' },
  { question: 'Can I pause my plan?', answer: 'Plans can be paused once a year.' }
];

describe('FAQ ranking', () => {
  it('returns nothing without keywords', () => {
    expect(rankFaqCandidates(faq, [], 'anything', 3)).toEqual([]);
  });

  it('orders by relevance then by question length', () => {
    const result = rankFaqCandidates(faq, ['refund'], 'refund policy', 3);

    // the long question contains "refund policy"; "Refunds" only matches the keyword
    expect(result.map(entry => entry.question)).toEqual([
      'What is the refund policy for annual plans?',
      'Refunds'
    ]);
  });

  it('ranks answer matches above keyword-only matches', () => {
    const result = rankFaqCandidates(faq, ['plans'], 'paused once', 3);

    expect(result.map(entry => entry.question)).toEqual([
      'Can I pause my plan?',
      'Refunds',
      'What is the refund policy for annual plans?'
    ]);
  });

  it('applies the limit', () => {
    expect(rankFaqCandidates(faq, ['plans'], 'plans', 1)).toHaveLength(1);
  });

  describe('findFaqByPhrase', () => {
    it('picks the shortest question containing the phrase', () => {
      expect(findFaqByPhrase(faq, 'REFUND')).toEqual(faq[1]);
    });

    it('returns null when no entry contains the phrase', () => {
      expect(findFaqByPhrase(faq, 'shipping')).toBeNull();
    });
  });
});
