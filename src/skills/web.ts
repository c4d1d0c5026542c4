/**
 * Web skills: OPEN_URL, SEARCH_WEB
 *
 * Both hand a URL to the default browser. Only http(s) URLs are opened.
 */

import { Skill, stringArg } from './skill.js';
import type { DesktopAutomation } from './desktop.js';
import type { Step } from '../core/types.js';

export const SEARCH_URL = 'https://duckduckgo.com/';

// "localhost:3000" has no scheme; "mailto:x" and "https://x" do.
const SCHEME = /^[a-z][a-z0-9+.-]*:(?!\d)/i;

export function normalizeUrl(input: string): string {
  const candidate = SCHEME.test(input) ? input : `https://${input}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new Error(`Not a valid URL: ${input}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Refusing to open ${url.protocol} URL`);
  }
  return url.toString();
}

export function searchUrl(query: string): string {
  const url = new URL(SEARCH_URL);
  url.searchParams.set('q', query);
  return url.toString();
}

export class OpenUrlSkill extends Skill {
  readonly kind = 'OPEN_URL' as const;

  constructor(private desktop: DesktopAutomation) {
    super();
  }

  protected async run(step: Step): Promise<string> {
    const url = normalizeUrl(stringArg(step, 'url'));
    await this.desktop.openUrl(url);
    return `Opened ${url}`;
  }
}

export class SearchWebSkill extends Skill {
  readonly kind = 'SEARCH_WEB' as const;

  constructor(private desktop: DesktopAutomation) {
    super();
  }

  protected async run(step: Step): Promise<string> {
    const query = stringArg(step, 'query');
    await this.desktop.openUrl(searchUrl(query));
    return `Searched the web for "${query}"`;
  }
}
