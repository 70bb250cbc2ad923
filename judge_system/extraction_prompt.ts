import type { FeedbackInput } from '../types.ts';

export const PRINCIPLE_EXTRACTION_PROMPT = `You analyze expert feedback on an evaluation and distill it into general evaluation principles.

Given feedback about one specific evaluation, extract principles that would apply to FUTURE evaluations against the same criterion.

Rules:
- Extract only generalizable principles, never observations that only hold for this one input
- Each principle is a single clear, actionable guideline
- Do not restate any of the existing principles listed in the request
- If the feedback holds no new generalizable insight, return an empty list
- Output valid JSON only

Output format:
{
  "principles": [
    {"text": "The principle text"}
  ],
  "reasoning": "Short explanation of why these principles were extracted"
}`;

export interface ExtractionPromptInput extends FeedbackInput {
  criterion: string;
  existingPrinciples: string[];
}

export const buildDisagreementNote = (expertScore?: number, judgeScore?: number): string | null => {
  if (expertScore === undefined || judgeScore === undefined || expertScore === judgeScore) {
    return null;
  }
  return `Note: The expert scored this ${expertScore} but the judge scored it ${judgeScore}. ` +
    `Pay special attention to what the expert's feedback reveals about this disagreement.`;
};

export const buildExtractionUserPrompt = (input: ExtractionPromptInput): string => {
  const parts: string[] = [`## Evaluation Criterion\n${input.criterion}\n`];

  if (input.existingPrinciples.length > 0) {
    const listed = input.existingPrinciples.map((p) => `- ${p}`).join('\n');
    parts.push(`## Existing Principles (do not restate)\n${listed}\n`);
  } else {
    parts.push('## Existing Principles\nNone yet.\n');
  }

  parts.push(`## Input Being Evaluated\n${input.input_text}\n`);
  parts.push(`## Expert Feedback\n${input.expert_feedback}\n`);

  if (input.expert_score !== undefined) {
    parts.push(`## Expert Score\n${input.expert_score}\n`);
  }
  if (input.judge_output !== undefined) {
    parts.push(`## Judge's Original Output\n${input.judge_output}\n`);
  }
  if (input.judge_score !== undefined) {
    parts.push(`## Judge's Original Score\n${input.judge_score}\n`);
  }

  const disagreement = buildDisagreementNote(input.expert_score, input.judge_score);
  if (disagreement) {
    parts.push(`\n${disagreement}`);
  }

  parts.push(
    '\nExtract generalizable evaluation principles from this feedback. ' +
    'Return JSON in the format given in your instructions.'
  );

  return parts.join('\n');
};
