/**
 * Desktop Automation — the OS boundary
 *
 * Skills talk to the desktop only through this interface. Methods throw on
 * failure; skills turn those errors into FAILURE results.
 *
 * MacOSDesktop drives `open` and AppleScript. Quitting always goes through
 * the application's own quit handler; nothing here force-kills a process.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { execFile } from 'node:child_process';

export interface DesktopAutomation {
  readonly platform: string;
  /** Foreground (non background-only) applications. */
  runningApps(): Promise<string[]>;
  installedApps(): Promise<string[]>;
  openApp(name: string): Promise<void>;
  /** Ask the app to quit. The app may refuse, e.g. on unsaved changes. */
  quitApp(name: string): Promise<void>;
  openUrl(url: string): Promise<void>;
  createNote(content: string, folder: string): Promise<void>;
}

const CMD_TIMEOUT_MS = 10_000;

export interface CommandResult {
  ok: boolean;
  stdout: string;
  detail: string;
}

/**
 * Run a command without a shell and collect a short diagnostic string.
 */
export function runCommand(cmd: string, args: string[], timeoutMs = CMD_TIMEOUT_MS): Promise<CommandResult> {
  return new Promise((resolve) => {
    execFile(cmd, args, { timeout: timeoutMs, encoding: 'utf-8' }, (err, stdout, stderr) => {
      const out = stdout.trim();
      const errText = stderr.trim();
      if (err) {
        let detail = err.killed === true ? 'timeout' : `rc=${err.code ?? 'error'}`;
        if (errText) detail += ` stderr=${errText}`;
        resolve({ ok: false, stdout: out, detail });
        return;
      }
      resolve({ ok: true, stdout: out, detail: out ? `rc=0 stdout=${out}` : 'rc=0' });
    });
  });
}

/**
 * Escape a string for use inside AppleScript double quotes.
 */
export function applescriptQuote(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export type CommandRunner = typeof runCommand;

export class MacOSDesktop implements DesktopAutomation {
  readonly platform = 'darwin';

  constructor(
    private run: CommandRunner = runCommand,
    private appDirs: string[] = ['/Applications', path.join(os.homedir(), 'Applications')],
  ) {}

  async runningApps(): Promise<string[]> {
    const script =
      'tell application "System Events" to get name of every application process ' +
      'whose background only is false';
    const result = await this.run('osascript', ['-e', script]);
    if (!result.ok) {
      throw new Error(`Could not list running apps (${result.detail})`);
    }
    return result.stdout
      .split(',')
      .map((a) => a.trim())
      .filter(Boolean);
  }

  async installedApps(): Promise<string[]> {
    const names = new Set<string>();
    for (const dir of this.appDirs) {
      if (!fs.existsSync(dir)) continue;
      for (const entry of fs.readdirSync(dir)) {
        if (entry.endsWith('.app')) {
          names.add(entry.slice(0, -4));
        }
      }
    }
    return [...names].sort((a, b) => a.localeCompare(b));
  }

  async openApp(name: string): Promise<void> {
    const result = await this.run('open', ['-a', name]);
    if (!result.ok) {
      throw new Error(`Failed to open ${name} (${result.detail})`);
    }
  }

  async quitApp(name: string): Promise<void> {
    const result = await this.run('osascript', ['-e', `tell application "${applescriptQuote(name)}" to quit`]);
    if (!result.ok) {
      throw new Error(`Failed to quit ${name} (${result.detail})`);
    }
  }

  async openUrl(url: string): Promise<void> {
    const result = await this.run('open', [url]);
    if (!result.ok) {
      throw new Error(`Failed to open ${url} (${result.detail})`);
    }
  }

  async createNote(content: string, folder: string): Promise<void> {
    const script = [
      'tell application "Notes"',
      `  make new note at folder "${applescriptQuote(folder)}" with properties {body:"${applescriptQuote(content)}"}`,
      'end tell',
    ].join('\n');
    const result = await this.run('osascript', ['-e', script]);
    if (!result.ok) {
      throw new Error(`Failed to create note in "${folder}" (${result.detail})`);
    }
  }
}

export class UnsupportedDesktop implements DesktopAutomation {
  constructor(readonly platform: string) {}

  private unsupported(): never {
    throw new Error(`Desktop automation is not supported on ${this.platform}`);
  }

  async runningApps(): Promise<string[]> {
    return this.unsupported();
  }

  async installedApps(): Promise<string[]> {
    return this.unsupported();
  }

  async openApp(): Promise<void> {
    this.unsupported();
  }

  async quitApp(): Promise<void> {
    this.unsupported();
  }

  async openUrl(): Promise<void> {
    this.unsupported();
  }

  async createNote(): Promise<void> {
    this.unsupported();
  }
}

export function createDesktop(platform: string = process.platform): DesktopAutomation {
  return platform === 'darwin' ? new MacOSDesktop() : new UnsupportedDesktop(platform);
}
