/**
 * Intent Model — the closed vocabulary
 *
 * A Mode classifies a whole turn. An IntentKind names one executable step.
 * Anything outside INTENT_KINDS is unregistered and can never be executed.
 */

export const MODES = ['CHAT', 'ACTION'] as const;
export type Mode = (typeof MODES)[number];

export const INTENT_KINDS = [
  'OPEN_APP',
  'CLOSE_APP',
  'CLOSE_ALL_APPS',
  'OPEN_URL',
  'SEARCH_WEB',
  'CREATE_NOTE',
] as const;
export type IntentKind = (typeof INTENT_KINDS)[number];

export type ArgType = 'string' | 'number' | 'boolean';

export interface IntentSpec {
  required: Readonly<Record<string, ArgType>>;
  optional?: Readonly<Record<string, ArgType>>;
  /** Argument naming the app the step acts on; checked against the protected set. */
  target?: string;
  destructive: boolean;
}

/**
 * Per-kind argument and safety table. Typed as a full Record so a new
 * IntentKind does not compile until it has an entry here.
 */
export const INTENT_SPECS: Readonly<Record<IntentKind, IntentSpec>> = {
  OPEN_APP: {
    required: { app_name: 'string' },
    target: 'app_name',
    destructive: false,
  },
  CLOSE_APP: {
    required: { app_name: 'string' },
    target: 'app_name',
    destructive: true,
  },
  CLOSE_ALL_APPS: {
    required: {},
    destructive: true,
  },
  OPEN_URL: {
    required: { url: 'string' },
    destructive: false,
  },
  SEARCH_WEB: {
    required: { query: 'string' },
    destructive: false,
  },
  CREATE_NOTE: {
    required: { content: 'string' },
    optional: { folder: 'string' },
    destructive: false,
  },
};

const KIND_SET: ReadonlySet<string> = new Set(INTENT_KINDS);
const MODE_SET: ReadonlySet<string> = new Set(MODES);

export function isIntentKind(value: string): value is IntentKind {
  return KIND_SET.has(value);
}

export function isMode(value: string): value is Mode {
  return MODE_SET.has(value);
}
