// Replacements never contain a listed term, which keeps sanitizePrompt idempotent.
const SANITIZE_TERMS: ReadonlyArray<readonly [term: string, replacement: string]> = [
  ["beats up", "overcomes"],
  ["beat up", "overcome"],
  ["beating up", "overcoming"],
  ["punches", "confronts"],
  ["punching", "confronting"],
  ["punch", "confront"],
  ["fights", "challenges"],
  ["fighting", "challenging"],
  ["fight", "challenge"],
  ["violently", "peacefully intensely"],
  ["violent", "intense"],
  ["attacks", "approaches"],
  ["attacking", "approaching"],
  ["attack", "approach"],
  ["kills", "defeats"],
  ["killing", "defeating"],
  ["kill", "defeat"],
  ["blood", "red paint"],
  ["bloody", "messy"],
  ["weapon", "tool"],
  ["weapons", "tools"],
  ["gun", "gadget"],
  ["knife", "stick"],
  ["crying", "teary-eyed"],
  ["sexy", "elegant"],
  ["criminal", "troublemaker"],
  ["crime", "mischief"],
  ["electrocutes", "zaps"],
  ["smashes", "taps"],
];

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Longest terms first so "beats up" wins over shorter overlapping entries.
const SANITIZE_PATTERN = new RegExp(
  `\\b(${[...SANITIZE_TERMS]
    .sort((a, b) => b[0].length - a[0].length)
    .map(([term]) => escapeRegExp(term).replace(/ /g, "\\s+"))
    .join("|")})\\b`,
  "gi",
);

const REPLACEMENTS = new Map(SANITIZE_TERMS.map(([term, replacement]) => [term, replacement]));

export const TRUNCATION_MARKER = " [...]";
export const DEFAULT_PROMPT_MAX_LENGTH = 1000;

export function sanitizePrompt(text: string): string {
  return text.replace(SANITIZE_PATTERN, (match) => {
    const normalized = match.toLowerCase().replace(/\s+/g, " ");
    return REPLACEMENTS.get(normalized) ?? match;
  });
}

export function truncatePrompt(text: string, maxLength = DEFAULT_PROMPT_MAX_LENGTH): string {
  if (text.length <= maxLength) return text;
  const keep = Math.max(0, maxLength - TRUNCATION_MARKER.length);
  return `${text.slice(0, keep).trimEnd()}${TRUNCATION_MARKER}`;
}

/**
 * Prompt actually sent on a given attempt: raw first, sanitized from the
 * second attempt on, sanitized and length-capped from the third.
 */
export function preparePromptForAttempt(prompt: string, attempt: number, maxLength = DEFAULT_PROMPT_MAX_LENGTH): string {
  if (attempt <= 1) return prompt;
  const sanitized = sanitizePrompt(prompt);
  if (attempt === 2) return sanitized;
  return truncatePrompt(sanitized, maxLength);
}
