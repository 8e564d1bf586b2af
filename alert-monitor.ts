#!/usr/bin/env node

// Node.js version check, before anything else loads
const [major] = process.versions.node.split('.').map(Number);
if (major < 20) {
    console.error(`TalkAlert requires Node.js >= 20.0.0 (you have ${process.version}).`);
    process.exit(1);
}

/**
 * TalkAlert monitor: connects to Discord and alerts on messages from the
 * senders listed in the rules. Runs in the foreground with a console.
 */

import path from 'path';
import dotenv from 'dotenv';
import { PROJECT_ROOT } from './src/utils/paths';
dotenv.config({ path: path.join(PROJECT_ROOT, '.env'), quiet: true });

import ConfigStore from './src/core/config';
import TalkAlertApp from './src/core/app';
import ControlConsole from './src/control/console';
import Logger from './src/core/logger';
import { errorMessage } from './src/core/errors';

const logger = new Logger('monitor');

function main(): void {
    const app = new TalkAlertApp({ store: new ConfigStore() });
    const controlConsole = new ControlConsole(app);

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}`);
        controlConsole.close();
        app.shutdown().catch((error: unknown) => {
            logger.error('Shutdown failed:', errorMessage(error));
            process.exit(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    controlConsole.start();
    const outcome = app.start();
    if (outcome === 'not-configured') {
        logger.warn('No bot token. Use "set token <TOKEN>" or DISCORD_BOT_TOKEN in .env');
    }
}

try {
    main();
} catch (error: unknown) {
    logger.error('Failed to start:', errorMessage(error));
    process.exit(1);
}
