// Input guardrails — applied to every user question and directive before it
// reaches an agent or the cache key builder

export const MAX_INPUT_CHARS = 6000;

const BLOCKLIST = ['sexual', 'porn', 'violent', 'hate', 'terror', 'extremist'];

const CONTROL_CHARS = /[\u0000-\u0008\u000b-\u001f\u007f]/g;

export type GuardrailResult =
  | { allowed: true; text: string; truncated: boolean }
  | { allowed: false; reason: string };

export const BLOCKED_MESSAGE = 'Input blocked due to policy violation.';

export function applyGuardrails(input: string): GuardrailResult {
  let text = input.replace(CONTROL_CHARS, ' ').trim();

  const lower = text.toLowerCase();
  const hit = BLOCKLIST.find((kw) => new RegExp(`\\b${kw}`).test(lower));
  if (hit) return { allowed: false, reason: `blocked category: ${hit}` };

  const truncated = text.length > MAX_INPUT_CHARS;
  if (truncated) text = text.slice(0, MAX_INPUT_CHARS);
  return { allowed: true, text, truncated };
}

// ── Topic filter ─────────────────────────────────────────────────────

const BUSINESS_TERMS = /\b(?:revenue|sales|profit|market|compet\w*|strateg\w*|product\w*|segment\w*|customer\w*|financ\w*|growth|swot|earnings|invest\w*|business|company|industry|share|pricing|partner\w*|acquisition\w*|leadership|ceo|cfo|employees?|headquarters|operations?|risk\w*|opportunit\w*|plan|account|overview|report|outlook|guidance|margin\w*|cost\w*|supply|brand|technology|r&d|patent\w*|regulat\w*|esg|dividend\w*|debt|valuation)\b/i;

export const OFF_TOPIC_REDIRECT =
  "I can help with research about the company: its business, products, competitors, "
  + 'financials and strategy. Try asking about one of those.';

/**
 * A chat question is on topic when it names the company or uses business
 * vocabulary. Off-topic questions get a fixed redirect without an LLM call.
 */
export function isOnTopic(text: string, company: string): boolean {
  const lower = text.toLowerCase();
  const name = company.toLowerCase().trim();
  if (name && lower.includes(name)) return true;
  return BUSINESS_TERMS.test(text) || /\b(?:19|20)\d{2}\b/.test(text);
}
