import type { Category, CategoryScores, ScoredCategory } from './types.js';

// Declaration order is the tie-break order: on equal top scores the
// earlier category wins.
export const CATEGORY_KEYWORDS: Readonly<Record<ScoredCategory, readonly string[]>> = {
  personal: [
    'família', 'amigo', 'casa', 'hobby', 'sentimento', 'pessoal', 'vida', 'relacionamento',
  ],
  professional: [
    'trabalho', 'empresa', 'projeto', 'cliente', 'reunião', 'carreira', 'negócio', 'profissional',
  ],
  technical: [
    'código', 'programa', 'api', 'servidor', 'database', 'algoritmo', 'software', 'bug', 'feature',
  ],
};

const SCORED_ORDER: readonly ScoredCategory[] = ['personal', 'professional', 'technical'];

/**
 * Normalize text for case-insensitive comparison. NFC first so that a
 * decomposed "ã" compares equal to the precomposed keyword.
 */
export function foldCase(text: string): string {
  return text.normalize('NFC').toLowerCase();
}

const FOLDED_KEYWORDS: Record<ScoredCategory, string[]> = {
  personal: CATEGORY_KEYWORDS.personal.map(foldCase),
  professional: CATEGORY_KEYWORDS.professional.map(foldCase),
  technical: CATEGORY_KEYWORDS.technical.map(foldCase),
};

/**
 * Count, per category, how many of its keywords occur anywhere in the text.
 * Matching is by substring, so "api" also counts inside "rapidez".
 */
export function scoreCategories(text: string): CategoryScores {
  const folded = foldCase(text);
  const count = (keywords: string[]) =>
    keywords.reduce((total, keyword) => (folded.includes(keyword) ? total + 1 : total), 0);

  return {
    personal: count(FOLDED_KEYWORDS.personal),
    professional: count(FOLDED_KEYWORDS.professional),
    technical: count(FOLDED_KEYWORDS.technical),
  };
}

export function classify(text: string): Category {
  const scores = scoreCategories(text);

  let best: Category = 'general';
  let bestScore = 0;
  for (const category of SCORED_ORDER) {
    if (scores[category] > bestScore) {
      best = category;
      bestScore = scores[category];
    }
  }

  return best;
}
