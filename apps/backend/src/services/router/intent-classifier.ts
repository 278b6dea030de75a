import { CANCEL_ADD_PREFIX, CONFIRM_ADD_PREFIX } from '../notifications/templates';

export type TextIntent = 'registration' | 'help' | 'catalog_link' | 'fallback';

interface IntentRule {
  intent: Exclude<TextIntent, 'fallback'>;
  matches: (text: string) => boolean;
}

const REGISTRATION_KEYWORDS = ['start', 'hello', 'hi', 'register', 'signup'];
const HELP_KEYWORDS = ['help', '?', 'how', 'guide'];
const CATALOG_LINK_PHRASES = ['link', 'catalog', 'my shop', 'my store'];

// Evaluated in order; the first match wins.
const RULES: IntentRule[] = [
  { intent: 'registration', matches: (text) => REGISTRATION_KEYWORDS.includes(text) },
  { intent: 'help', matches: (text) => HELP_KEYWORDS.includes(text) },
  { intent: 'catalog_link', matches: (text) => CATALOG_LINK_PHRASES.some((phrase) => text.includes(phrase)) }
];

export function classifyText(body: string): TextIntent {
  const text = body.trim().toLowerCase();
  const rule = RULES.find((candidate) => candidate.matches(text));
  return rule ? rule.intent : 'fallback';
}

export type ButtonVerb = 'confirm_add' | 'cancel_add';

export interface ButtonAction {
  verb: ButtonVerb;
  listingId: string;
}

/**
 * Parses `<verb>_<listingId>`; null for verbs the router does not handle.
 * The listing id is passed through unchecked, possibly empty.
 */
export function parseButtonId(buttonId: string): ButtonAction | null {
  if (buttonId.startsWith(CONFIRM_ADD_PREFIX)) {
    return { verb: 'confirm_add', listingId: buttonId.slice(CONFIRM_ADD_PREFIX.length) };
  }

  if (buttonId.startsWith(CANCEL_ADD_PREFIX)) {
    return { verb: 'cancel_add', listingId: buttonId.slice(CANCEL_ADD_PREFIX.length) };
  }

  return null;
}
