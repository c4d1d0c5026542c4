/**
 * App skills: OPEN_APP, CLOSE_APP, CLOSE_ALL_APPS
 *
 * Names are resolved against the apps the desktop reports, in order:
 * exact, case-insensitive, plural ("Note" -> "Notes"). No substring
 * matching. A name that resolves to a protected app is refused here as
 * well, since resolution can change the name the safety gate saw.
 */

import { Skill, sleep, stringArg } from './skill.js';
import { errorMessage } from '../core/errors.js';
import type { DesktopAutomation } from './desktop.js';
import type { ProtectedTargets } from '../core/safety.js';
import type { Step } from '../core/types.js';

export interface AppSkillOptions {
  /** Wait before re-checking that a quit app is gone. */
  settleMs?: number;
}

export function resolveAppName(requested: string, candidates: readonly string[]): string | null {
  const req = requested.trim().replace(/\.app$/i, '');
  if (!req) return null;

  if (candidates.includes(req)) return req;

  const low = req.toLowerCase();
  const caseInsensitive = candidates.find((a) => a.toLowerCase() === low);
  if (caseInsensitive) return caseInsensitive;

  if (!low.endsWith('s')) {
    const plural = candidates.find((a) => a.toLowerCase() === `${low}s`);
    if (plural) return plural;
  }

  return null;
}

export class OpenAppSkill extends Skill {
  readonly kind = 'OPEN_APP' as const;

  constructor(private desktop: DesktopAutomation, private protectedTargets: ProtectedTargets) {
    super();
  }

  protected async run(step: Step): Promise<string> {
    const requested = stringArg(step, 'app_name');
    const [installed, running] = await Promise.all([
      this.desktop.installedApps(),
      this.desktop.runningApps(),
    ]);

    const resolved = resolveAppName(requested, [...installed, ...running]);
    if (!resolved) {
      throw new Error(`App "${requested}" not found. Use the full application name.`);
    }
    if (this.protectedTargets.has(resolved)) {
      throw new Error(`Refusing to use protected app ${resolved}`);
    }

    await this.desktop.openApp(resolved);
    return `Opened ${resolved}`;
  }
}

export class CloseAppSkill extends Skill {
  readonly kind = 'CLOSE_APP' as const;

  constructor(
    private desktop: DesktopAutomation,
    private protectedTargets: ProtectedTargets,
    private options: AppSkillOptions = {},
  ) {
    super();
  }

  protected async run(step: Step): Promise<string> {
    const requested = stringArg(step, 'app_name');
    const running = await this.desktop.runningApps();

    const resolved = resolveAppName(requested, running);
    if (!resolved) {
      throw new Error(`${requested} is not running`);
    }
    if (this.protectedTargets.has(resolved)) {
      throw new Error(`Refusing to close protected app ${resolved}`);
    }

    await this.desktop.quitApp(resolved);
    await sleep(this.options.settleMs ?? 500);

    const stillRunning = await this.desktop.runningApps();
    if (stillRunning.includes(resolved)) {
      throw new Error(`Asked ${resolved} to quit, but it is still running (it may be waiting on unsaved changes)`);
    }
    return `Quit ${resolved}`;
  }
}

export class CloseAllAppsSkill extends Skill {
  readonly kind = 'CLOSE_ALL_APPS' as const;

  constructor(
    private desktop: DesktopAutomation,
    private protectedTargets: ProtectedTargets,
    private options: AppSkillOptions = {},
  ) {
    super();
  }

  protected async run(): Promise<string> {
    const running = await this.desktop.runningApps();
    const targets = running.filter((app) => !this.protectedTargets.has(app));
    if (targets.length === 0) {
      return 'No apps to close';
    }

    const errors: string[] = [];
    for (const app of targets) {
      try {
        await this.desktop.quitApp(app);
      } catch (err) {
        errors.push(errorMessage(err));
      }
    }
    await sleep(this.options.settleMs ?? 500);

    const remaining = (await this.desktop.runningApps()).filter((app) => targets.includes(app));
    if (remaining.length > 0) {
      const quit = targets.length - remaining.length;
      const extra = errors.length > 0 ? ` (${errors.join('; ')})` : '';
      throw new Error(`Quit ${quit} of ${targets.length} app(s); still running: ${remaining.join(', ')}${extra}`);
    }
    return `Quit ${targets.length} app(s): ${targets.join(', ')}`;
  }
}
