/**
 * Interactive console: the control surface while monitoring runs.
 * Lines are executed one after another, never concurrently.
 */

import readline from 'readline';
import Logger from '../core/logger';
import type TalkAlertApp from '../core/app';
import { errorMessage } from '../core/errors';
import { runCommand, tokenize, type CommandResult } from './commands';
import type { ConnectionState, ConnectionStatus } from '../types';

const colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
} as const;

const STATE_COLORS: Record<ConnectionState, keyof typeof colors> = {
    online: 'green',
    connecting: 'yellow',
    offline: 'red',
};

export function formatStatus(status: ConnectionStatus, useColor: boolean): string {
    const text = `● ${status.state}: ${status.detail}`;
    if (!useColor) return text;
    return `${colors[STATE_COLORS[status.state]]}${text}${colors.reset}`;
}

export interface ConsoleOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    color?: boolean;
    logger?: Logger;
}

class ControlConsole {
    logger: Logger;
    private readonly app: TalkAlertApp;
    private readonly output: NodeJS.WritableStream;
    private readonly color: boolean;
    private readonly rl: readline.Interface;
    private queue: Promise<void> = Promise.resolve();
    private closed = false;

    constructor(app: TalkAlertApp, options: ConsoleOptions = {}) {
        this.app = app;
        this.logger = options.logger || new Logger('Console');
        this.output = options.output || process.stdout;
        this.color = options.color ?? Boolean(process.stdout.isTTY);
        this.rl = readline.createInterface({
            input: options.input || process.stdin,
            output: this.output,
            prompt: 'talkalert> '
        });
    }

    start(): void {
        this.app.onStatusChange((status) => {
            if (this.app.consoleVisible) this.write(formatStatus(status, this.color));
        });
        this.app.onVisibilityChange((visible) => {
            if (visible) {
                this.write('Console visible');
                this.rl.prompt();
            }
        });

        this.rl.on('line', (line) => {
            this.queue = this.queue.then(() => this.handleLine(line));
        });
        this.rl.on('SIGINT', () => this.requestQuit());
        this.rl.on('close', () => {
            if (!this.closed) this.requestQuit();
        });

        this.write('Type "help" for commands.');
        this.rl.prompt();
    }

    close(): void {
        this.closed = true;
        this.rl.close();
    }

    private async handleLine(line: string): Promise<void> {
        let result: CommandResult;
        try {
            result = await runCommand(this.app, tokenize(line));
        } catch (error: unknown) {
            this.logger.error('Command failed:', errorMessage(error));
            result = { ok: false, lines: [`Error: ${errorMessage(error)}`] };
        }
        for (const text of result.lines) {
            this.write(result.ok || !this.color ? text : `${colors.red}${text}${colors.reset}`);
        }
        if (result.quit) {
            this.requestQuit();
            return;
        }
        if (!this.closed) this.rl.prompt();
    }

    private requestQuit(): void {
        if (this.closed) return;
        this.close();
        this.app.shutdown().catch((error: unknown) => {
            this.logger.error('Shutdown failed:', errorMessage(error));
        });
    }

    private write(text: string): void {
        this.output.write(`${text}\n`);
    }
}

export default ControlConsole;
