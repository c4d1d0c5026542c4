import { Skill, optionalStringArg, stringArg } from './skill.js';
import type { DesktopAutomation } from './desktop.js';
import type { Step } from '../core/types.js';

export const DEFAULT_NOTES_FOLDER = 'Notes';

export class CreateNoteSkill extends Skill {
  readonly kind = 'CREATE_NOTE' as const;

  constructor(private desktop: DesktopAutomation) {
    super();
  }

  protected async run(step: Step): Promise<string> {
    const content = stringArg(step, 'content');
    const folder = optionalStringArg(step, 'folder', DEFAULT_NOTES_FOLDER);
    await this.desktop.createNote(content, folder);
    return `Created a note in ${folder}`;
  }
}
