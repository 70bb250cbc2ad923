import type { Example, JudgeConfiguration } from '../types.ts';

const buildPrinciplesSection = (principles: string[]): string | null => {
  if (principles.length === 0) return null;
  const numbered = principles.map((p, i) => `  ${i + 1}. ${p}`).join('\n');
  return `## Evaluation Principles\nApply these principles in your evaluation:\n${numbered}`;
};

const buildExamplesSection = (examples: Example[]): string | null => {
  if (examples.length === 0) return null;
  const blocks = examples.map((ex, i) => {
    const lines = [
      `  ### Example ${i + 1}`,
      `  **Input:** ${ex.input_text}`,
      `  **Expert Feedback:** ${ex.expert_feedback}`,
    ];
    if (ex.expert_score !== undefined) {
      lines.push(`  **Expert Score:** ${ex.expert_score}`);
    }
    return lines.join('\n');
  });
  return `## Reference Examples\nUse these as calibration:\n${blocks.join('\n\n')}`;
};

/**
 * Working memory for one judgment: the judge's configuration, every
 * principle, and the retrieved examples. Empty sections are left out.
 */
export const buildJudgmentSystemPrompt = (
  judge: JudgeConfiguration,
  principles: string[],
  examples: Example[]
): string => {
  const { min_score, max_score } = judge.score_range;

  const sections = [
    'You are an expert evaluator. Evaluate the given input against a specific criterion.',
    `## Criterion\n${judge.criterion}`,
    `## Evaluation Instructions\n${judge.instructions}`,
    `## Score Range\n${min_score} (lowest) to ${max_score} (highest)`,
    buildPrinciplesSection(principles),
    buildExamplesSection(examples),
    [
      '## Output Format',
      'Respond with valid JSON only:',
      '{',
      `  "score": <integer between ${min_score} and ${max_score}>,`,
      '  "reasoning": "<detailed explanation of your score>"',
      '}',
    ].join('\n'),
    [
      'Important:',
      `- Your score MUST be an integer between ${min_score} and ${max_score}`,
      '- Your reasoning should reference specific aspects of the input',
      '- Weigh the principles and examples above when making your judgment',
      '- Stay consistent with the evaluation patterns shown in the examples',
    ].join('\n'),
  ];

  return sections.filter((section): section is string => section !== null).join('\n\n');
};

export const buildJudgmentUserPrompt = (inputText: string, context?: string): string => {
  const parts = [`## Input to Evaluate\n\n${inputText}`];
  if (context && context.trim().length > 0) {
    parts.push(`## Additional Context\n${context}`);
  }
  parts.push('Evaluate this input and respond with JSON containing your score and reasoning.');
  return parts.join('\n\n');
};
