/**
 * TalkAlert Configuration Store
 * Loads, validates, migrates and saves config.json
 */

import fs from 'fs';
import path from 'path';
import Logger from './logger';
import { ConfigError, errorMessage } from './errors';
import { clampVolume } from '../rules/rule-table';
import { resolveConfigDir } from '../utils/paths';
import type { AppState, Rule, Settings, StoredConfig, StoredRule } from '../types';

export const CONFIG_VERSION = 2;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: JsonObject, key: string, fallback: string = ''): string {
    const value = source[key];
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    return fallback;
}

function readBoolean(source: JsonObject, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

export function getDefaultSettings(): Settings {
    return {
        muted: false,
        authToken: '',
        trayOnMinimize: true,
        pushEnabled: false,
        pushUserKey: '',
        pushAppToken: '',
        pushWhenMuted: true,
        pushIncludeMessage: true
    };
}

/**
 * Fold version 1 files into the current shape. Version 1 had one global
 * `pushover_sound`; it becomes the push sound of every rule without its own.
 */
export function migrate(raw: JsonObject): JsonObject {
    const version = typeof raw.version === 'number' ? raw.version : 1;
    if (version >= CONFIG_VERSION) return raw;

    const legacySound = readString(raw, 'pushover_sound');
    const { pushover_sound: _dropped, ...rest } = raw;
    const rules = Array.isArray(raw.rules) ? raw.rules : [];
    return {
        ...rest,
        version: CONFIG_VERSION,
        rules: rules.map((entry: unknown) => {
            if (!isObject(entry) || !legacySound || readString(entry, 'pushover_sound')) return entry;
            return { ...entry, pushover_sound: legacySound };
        })
    };
}

/**
 * Validate a parsed config.json. Wrong field types fall back to defaults one
 * field at a time; rules without a sender id are skipped and later duplicates
 * of an id are dropped.
 */
export function parseConfig(raw: unknown, logger?: Logger): AppState {
    if (!isObject(raw)) {
        throw new ConfigError('config root is not an object');
    }
    const data = migrate(raw);
    const defaults = getDefaultSettings();
    const settings: Settings = {
        muted: readBoolean(data, 'mute', defaults.muted),
        authToken: readString(data, 'token'),
        trayOnMinimize: readBoolean(data, 'tray_on_minimize', defaults.trayOnMinimize),
        pushEnabled: readBoolean(data, 'pushover_enabled', defaults.pushEnabled),
        pushUserKey: readString(data, 'pushover_user_key'),
        pushAppToken: readString(data, 'pushover_app_token'),
        pushWhenMuted: readBoolean(data, 'pushover_push_when_muted', defaults.pushWhenMuted),
        pushIncludeMessage: readBoolean(data, 'pushover_include_message', defaults.pushIncludeMessage)
    };

    const rules: Rule[] = [];
    const seen = new Set<string>();
    const entries = Array.isArray(data.rules) ? data.rules : [];
    for (const entry of entries) {
        if (!isObject(entry)) continue;
        const senderId = readString(entry, 'user_id');
        if (!senderId) continue;
        if (seen.has(senderId)) {
            logger?.warn(`Skipping duplicate rule for sender ${senderId}`);
            continue;
        }
        seen.add(senderId);
        rules.push({
            name: readString(entry, 'name'),
            senderId,
            soundPath: readString(entry, 'sound_path'),
            volume: entry.volume === undefined || entry.volume === null ? 100 : clampVolume(entry.volume),
            pushSound: readString(entry, 'pushover_sound')
        });
    }

    return { settings, rules };
}

export function serializeConfig(state: AppState): StoredConfig {
    const { settings } = state;
    return {
        version: CONFIG_VERSION,
        mute: settings.muted,
        token: settings.authToken,
        tray_on_minimize: settings.trayOnMinimize,
        pushover_enabled: settings.pushEnabled,
        pushover_user_key: settings.pushUserKey,
        pushover_app_token: settings.pushAppToken,
        pushover_push_when_muted: settings.pushWhenMuted,
        pushover_include_message: settings.pushIncludeMessage,
        rules: state.rules.map((rule): StoredRule => ({
            name: rule.name,
            user_id: rule.senderId,
            sound_path: rule.soundPath,
            volume: rule.volume,
            pushover_sound: rule.pushSound
        }))
    };
}

class ConfigStore {
    logger: Logger;
    configDir: string;
    configPath: string;

    constructor(configDir: string | null = null, logger?: Logger) {
        this.logger = logger || new Logger('Config');
        this.configDir = configDir || resolveConfigDir();
        this.configPath = path.join(this.configDir, 'config.json');
    }

    /**
     * Never throws: a missing file gives defaults, an unreadable or malformed
     * one is logged and gives defaults with an empty rule set.
     */
    load(): AppState {
        this.logger.debug(`Loading configuration from ${this.configPath}`);

        if (!fs.existsSync(this.configPath)) {
            this.logger.info('No configuration file yet, using defaults');
            return { settings: getDefaultSettings(), rules: [] };
        }

        try {
            const raw: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
            const state = parseConfig(raw, this.logger);
            this.logger.info(`Configuration loaded (${state.rules.length} rules)`);
            return state;
        } catch (error: unknown) {
            const failure = error instanceof ConfigError ? error : new ConfigError(errorMessage(error));
            this.logger.warn('Failed to load configuration, resetting to defaults:', failure.message);
            return { settings: getDefaultSettings(), rules: [] };
        }
    }

    save(state: AppState): boolean {
        this.logger.debug('Saving configuration...');

        try {
            if (!fs.existsSync(this.configDir)) {
                fs.mkdirSync(this.configDir, { recursive: true });
            }
            fs.writeFileSync(this.configPath, JSON.stringify(serializeConfig(state), null, 2), 'utf8');
            this.logger.debug('Configuration saved');
            return true;
        } catch (error: unknown) {
            this.logger.error('Failed to save configuration:', errorMessage(error));
            return false;
        }
    }
}

export default ConfigStore;
