#!/usr/bin/env node

'use strict';

import { spawn } from 'child_process';
import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';
import { PROJECT_ROOT } from './src/utils/paths';
import ConfigStore from './src/core/config';
import TalkAlertApp from './src/core/app';
import { HELP_LINES, runCommand } from './src/control/commands';

dotenv.config({ path: path.join(PROJECT_ROOT, '.env'), quiet: true });

const [,, cmd, ...args] = process.argv;

/** Console commands that also make sense one-shot. */
const ONE_SHOT_COMMANDS = new Set([
  'rules', 'add', 'update', 'remove', 'move', 'sort', 'volume',
  'mute', 'unmute', 'settings', 'set', 'test-push',
]);

function printUsage(): void {
  console.log('talkalert: sound and push alerts for Discord messages\n');
  console.log('Usage: talkalert <command>\n');
  console.log('  start     Start monitoring (interactive console)');
  console.log('  help      Show this help');
  console.log('');
  console.log('One-shot commands (same as in the console):');
  for (const line of HELP_LINES.slice(1)) {
    const name = line.trim().split(/\s+/)[0];
    if (ONE_SHOT_COMMANDS.has(name)) console.log(line);
  }
}

async function runOneShot(): Promise<number> {
  const app = new TalkAlertApp({ store: new ConfigStore() });
  const result = await runCommand(app, [cmd, ...args]);
  for (const line of result.lines) {
    (result.ok ? console.log : console.error)(line);
  }
  return result.ok ? 0 : 1;
}

switch (cmd) {
  case 'start': {
    const monitorScript = path.join(__dirname, 'alert-monitor.js');
    if (!fs.existsSync(monitorScript)) {
      console.error('Error: build first (npm run build).');
      process.exit(1);
    }
    spawn(process.execPath, [monitorScript], { stdio: 'inherit' })
      .on('exit', (code) => process.exit(code ?? 0));
    break;
  }

  default:
    if (cmd && ONE_SHOT_COMMANDS.has(cmd)) {
      runOneShot().then(
        (code) => process.exit(code),
        (error: unknown) => {
          console.error(error instanceof Error ? error.message : String(error));
          process.exit(1);
        }
      );
      break;
    }
    printUsage();
    if (cmd && cmd !== 'help' && cmd !== '--help' && cmd !== '-h') {
      console.error(`\nUnknown command: ${cmd}`);
      process.exit(1);
    }
    break;
}
