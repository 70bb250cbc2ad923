export const DEDUPLICATION_PROMPT = `You decide whether a new evaluation principle is semantically equivalent to any existing principle.

Two principles are duplicates when they express the same evaluation guideline, even if worded differently. Principles that differ in meaning (for example by a negation or a changed scope) are unique.

Respond with ONLY one word: "duplicate" or "unique".`;

export const DUPLICATE_VERDICT = 'duplicate';

export const buildDeduplicationUserPrompt = (candidate: string, neighbours: string[]): string => {
  const listed = neighbours.map((p) => `- ${p}`).join('\n');
  return `## New Principle\n${candidate}\n\n` +
    `## Existing Principles\n${listed}\n\n` +
    `Is the new principle a duplicate of any existing principle? Answer 'duplicate' or 'unique'.`;
};
