/**
 * Control commands shared by the interactive console and the one-shot CLI.
 */

import type TalkAlertApp from '../core/app';
import { errorMessage } from '../core/errors';
import type { RuleResult } from '../rules/rule-table';
import type { Rule, RuleInput, Settings } from '../types';

export interface ParsedArgs {
    positionals: string[];
    flags: Record<string, string>;
}

export interface CommandResult {
    ok: boolean;
    lines: string[];
    /** The console should shut down. */
    quit?: boolean;
}

type BooleanSettingKey = { [K in keyof Settings]: Settings[K] extends boolean ? K : never }[keyof Settings];
type StringSettingKey = { [K in keyof Settings]: Settings[K] extends string ? K : never }[keyof Settings];

type SettingKey =
    | { kind: 'boolean'; field: BooleanSettingKey }
    | { kind: 'string'; field: StringSettingKey; secret: boolean };

export const SETTING_KEYS: Record<string, SettingKey> = {
    'token': { kind: 'string', field: 'authToken', secret: true },
    'mute': { kind: 'boolean', field: 'muted' },
    'tray': { kind: 'boolean', field: 'trayOnMinimize' },
    'push': { kind: 'boolean', field: 'pushEnabled' },
    'push-user': { kind: 'string', field: 'pushUserKey', secret: true },
    'push-app': { kind: 'string', field: 'pushAppToken', secret: true },
    'push-when-muted': { kind: 'boolean', field: 'pushWhenMuted' },
    'push-message': { kind: 'boolean', field: 'pushIncludeMessage' }
};

export const HELP_LINES: readonly string[] = [
    'Commands:',
    '  status                          Connection, mute and playback state',
    '  rules                           List rules in order',
    '  add <id> <sound> [--name N] [--volume V] [--push-sound S]',
    '  update <id> [--id NEW] [--sound P] [--name N] [--volume V] [--push-sound S]',
    '  remove <id>                     Delete a rule',
    '  move <id> <position>            Move a rule (1 = top)',
    '  sort [asc|desc]                 Sort rules by name',
    '  volume <id> <0-100>             Set a rule volume (live if it is playing)',
    '  mute | unmute                   Silence alert sounds (push follows settings)',
    '  test <id> | test --sound P [--volume V]   Play a sound now',
    '  stop-sound                      Stop playback',
    '  settings                        Show settings',
    `  set <key> <value>               Keys: ${Object.keys(SETTING_KEYS).join(', ')}`,
    '  test-push                       Send a Pushover test notification',
    '  restart                         Reconnect to Discord',
    '  hide | show                     Send the console to the tray / bring it back',
    '  quit                            Stop monitoring and exit'
];

/**
 * Split a command line into words; single or double quotes group words.
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
    let match = pattern.exec(line);
    while (match) {
        tokens.push(match[1] ?? match[2] ?? match[3] ?? '');
        match = pattern.exec(line);
    }
    return tokens;
}

export function parseArgs(tokens: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags: Record<string, string> = {};
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (token.startsWith('--') && token.length > 2) {
            const eq = token.indexOf('=');
            if (eq !== -1) {
                flags[token.slice(2, eq)] = token.slice(eq + 1);
            } else if (i + 1 < tokens.length && !tokens[i + 1].startsWith('--')) {
                flags[token.slice(2)] = tokens[++i];
            } else {
                flags[token.slice(2)] = '';
            }
        } else {
            positionals.push(token);
        }
    }
    return { positionals, flags };
}

export function parseBoolean(value: string): boolean | null {
    const normalized = value.trim().toLowerCase();
    if (['on', 'true', 'yes', '1'].includes(normalized)) return true;
    if (['off', 'false', 'no', '0'].includes(normalized)) return false;
    return null;
}

function parseVolume(value: string | undefined): number | undefined | null {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
}

export function maskSecret(value: string): string {
    if (!value) return '(not set)';
    if (value.length <= 4) return '****';
    return `****${value.slice(-4)}`;
}

export function formatRule(rule: Rule, index: number): string {
    const name = rule.name || '-';
    const push = rule.pushSound ? `  push: ${rule.pushSound}` : '';
    return `${index + 1}. ${name}  ${rule.senderId}  ${rule.soundPath}  ${rule.volume}%${push}`;
}

function fail(...lines: string[]): CommandResult {
    return { ok: false, lines };
}

function done(...lines: string[]): CommandResult {
    return { ok: true, lines };
}

function ruleOutcome(result: RuleResult, verb: string): CommandResult {
    if (!result.ok) return fail(result.error.message);
    return done(`${verb} rule for ${result.rule.senderId}`);
}

function describeSettings(settings: Settings): string[] {
    return Object.entries(SETTING_KEYS).map(([key, setting]) => {
        if (setting.kind === 'boolean') {
            return `${key}: ${settings[setting.field] ? 'on' : 'off'}`;
        }
        const value = settings[setting.field];
        return `${key}: ${setting.secret ? maskSecret(value) : value || '(not set)'}`;
    });
}

/**
 * Run one command against the app. Validation problems come back as
 * `ok: false` lines; nothing here throws.
 */
export async function runCommand(app: TalkAlertApp, tokens: readonly string[]): Promise<CommandResult> {
    const name: string | undefined = tokens[0];
    const { positionals, flags } = parseArgs(tokens.slice(1));

    switch (name) {
        case undefined:
            return done();

        case 'help':
            return done(...HELP_LINES);

        case 'status': {
            const status = app.getStatus();
            const settings = app.getSettings();
            const playing = app.nowPlaying;
            return done(
                `Connection: ${status.state} (${status.detail})`,
                `Muted: ${settings.muted ? 'yes' : 'no'}`,
                `Now playing: ${playing ? `${playing.ruleId} at ${playing.volume}%` : 'nothing'}`,
                `Rules: ${app.rules.size}`
            );
        }

        case 'rules': {
            const rules = app.rules.all();
            if (rules.length === 0) return done('No rules');
            return done(...rules.map(formatRule));
        }

        case 'add': {
            const [senderId, soundPath] = positionals;
            if (!senderId || !soundPath) return fail('Usage: add <id> <sound> [--name N] [--volume V] [--push-sound S]');
            const volume = parseVolume(flags.volume);
            if (volume === null) return fail(`Invalid volume: ${flags.volume}`);
            const input: RuleInput = { senderId, soundPath, name: flags.name, volume, pushSound: flags['push-sound'] };
            return ruleOutcome(app.addRule(input), 'Added');
        }

        case 'update': {
            const [senderId] = positionals;
            if (!senderId) return fail('Usage: update <id> [--id NEW] [--sound P] [--name N] [--volume V] [--push-sound S]');
            const existing = app.rules.find(senderId);
            if (!existing) return fail(`No rule for sender ${senderId}`);
            const volume = parseVolume(flags.volume);
            if (volume === null) return fail(`Invalid volume: ${flags.volume}`);
            const input: RuleInput = {
                senderId: flags.id ?? existing.senderId,
                soundPath: flags.sound ?? existing.soundPath,
                name: flags.name ?? existing.name,
                volume: volume ?? existing.volume,
                pushSound: flags['push-sound'] ?? existing.pushSound
            };
            return ruleOutcome(app.updateRule(senderId, input), 'Updated');
        }

        case 'remove': {
            const [senderId] = positionals;
            if (!senderId) return fail('Usage: remove <id>');
            return app.removeRule(senderId) ? done(`Removed rule for ${senderId}`) : done(`No rule for ${senderId}`);
        }

        case 'move': {
            const [senderId, position] = positionals;
            const index = Number(position);
            if (!senderId || !Number.isInteger(index) || index < 1) return fail('Usage: move <id> <position>');
            return app.moveRule(senderId, index - 1) ? done(`Moved ${senderId} to ${index}`) : fail(`No rule for ${senderId}`);
        }

        case 'sort': {
            const direction = positionals[0] === 'desc' ? 'desc' : 'asc';
            app.sortRules(direction);
            return done(`Sorted rules by name (${direction})`);
        }

        case 'volume': {
            const [senderId, value] = positionals;
            const volume = parseVolume(value);
            if (!senderId || volume === undefined || volume === null) return fail('Usage: volume <id> <0-100>');
            const result = app.setRuleVolume(senderId, volume);
            if (!result.ok) return fail(result.error.message);
            return done(`Volume for ${senderId}: ${result.rule.volume}%`);
        }

        case 'mute':
            app.setMuted(true);
            return done('Muted');

        case 'unmute':
            app.setMuted(false);
            return done('Unmuted');

        case 'test': {
            const volumeFlag = parseVolume(flags.volume);
            if (volumeFlag === null) return fail(`Invalid volume: ${flags.volume}`);
            let soundPath = flags.sound;
            let volume = volumeFlag ?? 100;
            let ruleId: string | undefined;
            const [senderId] = positionals;
            if (senderId) {
                const rule = app.rules.find(senderId);
                if (!rule) return fail(`No rule for sender ${senderId}`);
                soundPath = soundPath || rule.soundPath;
                volume = volumeFlag ?? rule.volume;
                ruleId = rule.senderId;
            }
            if (!soundPath) return fail('Usage: test <id> | test --sound P [--volume V]');
            try {
                app.testSound(soundPath, volume, ruleId);
            } catch (error: unknown) {
                return fail(`Cannot play sound: ${errorMessage(error)}`);
            }
            return done(`Playing ${soundPath}`);
        }

        case 'stop-sound':
            app.stopSound();
            return done('Stopped');

        case 'settings':
            return done(...describeSettings(app.getSettings()));

        case 'set': {
            const [key, ...valueParts] = positionals;
            const setting = key === undefined ? undefined : SETTING_KEYS[key];
            if (!setting) return fail(`Unknown setting. Keys: ${Object.keys(SETTING_KEYS).join(', ')}`);
            const value = valueParts.join(' ').trim();
            if (setting.kind === 'boolean') {
                const parsed = parseBoolean(value);
                if (parsed === null) return fail(`${key} takes on/off`);
                if (setting.field === 'muted') {
                    app.setMuted(parsed);
                } else {
                    const patch: Partial<Settings> = {};
                    patch[setting.field] = parsed;
                    app.updateSettings(patch);
                }
                return done(`${key}: ${parsed ? 'on' : 'off'}`);
            }
            const patch: Partial<Settings> = {};
            patch[setting.field] = value;
            app.updateSettings(patch);
            return done(`${key}: ${setting.secret ? maskSecret(value) : value || '(not set)'}`);
        }

        case 'test-push': {
            const result = await app.testPush();
            return result.delivered ? done('Push delivered') : fail(`Push failed: ${result.reason}`);
        }

        case 'restart': {
            const outcome = await app.restartConnection();
            if (outcome === 'not-configured') return fail('No bot token configured (set token <TOKEN>)');
            return done('Reconnecting...');
        }

        case 'hide':
            return (await app.hideConsole())
                ? done('Console hidden; use the tray icon to bring it back')
                : fail('Console stays visible (tray unavailable or tray mode off)');

        case 'show':
            app.showConsole();
            return done('Console visible');

        case 'quit':
        case 'exit':
            return { ok: true, lines: [], quit: true };

        default:
            return fail(`Unknown command: ${name}. Type "help" for commands.`);
    }
}
