import { CloseAllAppsSkill, CloseAppSkill, OpenAppSkill, type AppSkillOptions } from './apps.js';
import { OpenUrlSkill, SearchWebSkill } from './web.js';
import { CreateNoteSkill } from './notes.js';
import type { DesktopAutomation } from './desktop.js';
import type { ExecutorTable } from '../core/router.js';
import type { ProtectedTargets } from '../core/safety.js';

/**
 * The full executor table. Typed as ExecutorTable, so a new IntentKind
 * must be given a skill here before the project compiles.
 */
export function createSkills(
  desktop: DesktopAutomation,
  protectedTargets: ProtectedTargets,
  options: AppSkillOptions = {},
): ExecutorTable {
  return {
    OPEN_APP: new OpenAppSkill(desktop, protectedTargets),
    CLOSE_APP: new CloseAppSkill(desktop, protectedTargets, options),
    CLOSE_ALL_APPS: new CloseAllAppsSkill(desktop, protectedTargets, options),
    OPEN_URL: new OpenUrlSkill(desktop),
    SEARCH_WEB: new SearchWebSkill(desktop),
    CREATE_NOTE: new CreateNoteSkill(desktop),
  };
}
