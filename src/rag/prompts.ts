import type { Turn } from '../conversation/store';

export const NO_MODEL_MESSAGE =
  "Sorry, I can't answer questions right now because no language model is configured. Please try again later.";

export const GENERATION_FAILED_MESSAGE = "Sorry, I'm having trouble generating a response. Please try again later.";

/** Lines containing any of these (case-insensitively) are prompt echoes, not answer text. */
export const PROMPT_ARTIFACT_PHRASES = [
  'styling instructions:',
  'ai:',
  'user:',
  'context:',
  'example format',
  'respond naturally',
  'choose the best format',
] as const;

const EMPHASIS_CHARS = /[*_+]/g;

export function formatHistory(turns: readonly Turn[]): string {
  return turns.map((turn) => `User: ${turn.user}\nAI: ${turn.ai}`).join('\n');
}

export function buildPrompt(history: readonly Turn[], query: string, context: string, organization: string): string {
  const lines = [
    formatHistory(history),
    `User: ${query}`,
    '',
    `Context (from ${organization} documents):`,
    context,
    '',
    `AI: You are a helpful ${organization} product assistant. Provide clear, structured answers about ${organization} products and services.`,
    '',
    'IMPORTANT FORMATTING RULES:',
    '- Write natural paragraphs, bullet points or numbered lists when that is clearer.',
    '- Do not use Markdown symbols such as *, **, _ or +.',
    '- Put each product name first, followed by a dash (–) and its description.',
    '- Start a new line for each product or concept.',
    '- Be concise and informative.',
    '- Only mention products that appear in the context above.',
    '- Reply in clean, readable plain text.',
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Drop echoed instruction lines and emphasis punctuation from a model reply.
 * Lines are trimmed and blank lines removed.
 */
export function cleanResponse(response: string): string {
  const kept: string[] = [];
  for (const raw of response.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    const lower = line.toLowerCase();
    if (PROMPT_ARTIFACT_PHRASES.some((phrase) => lower.includes(phrase))) continue;

    const stripped = line.replace(EMPHASIS_CHARS, '').trim();
    if (stripped) kept.push(stripped);
  }
  return kept.join('\n');
}
