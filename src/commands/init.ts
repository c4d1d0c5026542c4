/**
 * deskpilot init — write ~/.deskpilot/config.yml
 */

import fs from 'node:fs';
import readline from 'node:readline';
import { CHANNEL_TYPES, configPath, defaultConfig, deskpilotHome, saveConfig } from '../core/config.js';

interface InitOptions {
  channel: string;
  force?: boolean;
}

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function initCommand(options: InitOptions): Promise<void> {
  console.log('');
  console.log('  🖥️  deskpilot');
  console.log('  ────────────');
  console.log('');

  const home = deskpilotHome();
  if (fs.existsSync(configPath(home)) && !options.force) {
    console.log(`  Config already exists at ${configPath(home)}. Use --force to overwrite.`);
    console.log('');
    return;
  }

  const channel = options.channel;
  if (!CHANNEL_TYPES.some((type) => type === channel)) {
    console.error(`  ❌ Unknown channel "${channel}". Use one of: ${CHANNEL_TYPES.join(', ')}`);
    process.exit(1);
  }

  const config = defaultConfig(home);
  config.channel = channel;

  if (channel === 'webhook') {
    const url = await prompt('  Webhook URL: ');
    const secret = await prompt('  Webhook Secret (optional): ');
    if (!url) {
      console.error('  ❌ A webhook URL is required for the webhook channel.');
      process.exit(1);
    }
    config.webhook = {
      url,
      ...(secret ? { secret } : {}),
    };
    console.log('  ✅ Webhook configured');
  } else {
    console.log('  📟 Using terminal prompts for confirmations.');
  }
  console.log('');

  const file = saveConfig(home, config);
  console.log(`  ✅ Config saved to ${file}`);
  console.log('');
  console.log('  Try:');
  console.log('');
  console.log('    deskpilot run "open safari and search for weather"');
  console.log('    deskpilot shell');
  console.log('');
}
