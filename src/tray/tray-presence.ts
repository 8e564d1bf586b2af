/**
 * Tray Presence Controller
 *
 * Optional system-tray icon. Starting it is best effort: callers keep the
 * console visible when show() resolves false. Menu clicks arrive on the tray
 * helper's callbacks and are handed to the control context via the Event
 * Marshal.
 */

import fs from 'fs';
import path from 'path';
import Logger from '../core/logger';
import type EventMarshal from '../core/event-marshal';
import { errorMessage } from '../core/errors';
import { optionalRequire } from '../utils/optional-require';
import { settlesWithin } from '../utils/timing';
import { APP_NAME, PROJECT_ROOT } from '../utils/paths';

export const TRAY_STOP_TIMEOUT_MS = 1500;

export type TrayAction = 'toggle-visibility' | 'toggle-mute' | 'exit';

export interface TrayMenuState {
    consoleVisible: boolean;
    muted: boolean;
}

export interface TrayBackend {
    start(state: TrayMenuState, onAction: (action: TrayAction) => void): Promise<void>;
    update(state: TrayMenuState): void;
    kill(): Promise<void>;
}

/** Returns null when no tray is available on this host. */
export type TrayBackendFactory = () => TrayBackend | null;

export type TrayHandlers = Record<TrayAction, () => void>;

// systray2 ships compiled ES module output: the class is `default`.
interface SysTrayItem {
    title: string;
    tooltip: string;
    checked: boolean;
    enabled: boolean;
}

interface SysTrayOptions {
    menu: { icon: string; title: string; tooltip: string; items: SysTrayItem[] };
    debug: boolean;
    copyDir: boolean;
}

interface SysTrayInstance {
    onClick(listener: (action: { seq_id: number; item: SysTrayItem }) => void): unknown;
    ready(): Promise<unknown>;
    sendAction(action: { type: 'update-item'; item: SysTrayItem; seq_id: number }): unknown;
    kill(exitNode?: boolean): Promise<unknown> | unknown;
}

interface SysTrayModule {
    default: new (options: SysTrayOptions) => SysTrayInstance;
}

function isSysTrayModule(mod: unknown): mod is SysTrayModule {
    return typeof mod === 'object' && mod !== null && 'default' in mod && typeof mod.default === 'function';
}

const MENU_ACTIONS: TrayAction[] = ['toggle-visibility', 'toggle-mute', 'exit'];

export function buildMenuItems(state: TrayMenuState): SysTrayItem[] {
    return [
        { title: state.consoleVisible ? 'Hide console' : 'Show console', tooltip: '', checked: false, enabled: true },
        { title: 'Mute', tooltip: 'Silence alert sounds', checked: state.muted, enabled: true },
        { title: 'Exit', tooltip: `Quit ${APP_NAME}`, checked: false, enabled: true }
    ];
}

export function loadTrayIcon(platform: NodeJS.Platform = process.platform): string {
    const file = platform === 'win32' ? 'tray-icon.ico' : 'tray-icon.png';
    return fs.readFileSync(path.join(PROJECT_ROOT, 'assets', file)).toString('base64');
}

/**
 * Backend over the optional `systray2` package.
 */
export class SysTrayBackend implements TrayBackend {
    private readonly SysTray: SysTrayModule['default'];
    private tray: SysTrayInstance | null = null;

    constructor(mod: SysTrayModule) {
        this.SysTray = mod.default;
    }

    async start(state: TrayMenuState, onAction: (action: TrayAction) => void): Promise<void> {
        const tray = new this.SysTray({
            menu: { icon: loadTrayIcon(), title: '', tooltip: APP_NAME, items: buildMenuItems(state) },
            debug: false,
            copyDir: true
        });
        tray.onClick((action) => {
            const mapped = MENU_ACTIONS[action.seq_id];
            if (mapped) onAction(mapped);
        });
        await tray.ready();
        this.tray = tray;
    }

    update(state: TrayMenuState): void {
        const tray = this.tray;
        if (!tray) return;
        buildMenuItems(state).forEach((item, seq_id) => {
            tray.sendAction({ type: 'update-item', item, seq_id });
        });
    }

    async kill(): Promise<void> {
        const tray = this.tray;
        this.tray = null;
        if (tray) await tray.kill(false);
    }
}

export const createSysTrayBackend: TrayBackendFactory = () => {
    const mod = optionalRequire('systray2', 'tray icon');
    return isSysTrayModule(mod) ? new SysTrayBackend(mod) : null;
};

export interface TrayPresenceOptions {
    marshal: EventMarshal;
    handlers: TrayHandlers;
    createBackend?: TrayBackendFactory;
    stopTimeoutMs?: number;
    logger?: Logger;
}

class TrayPresenceController {
    logger: Logger;
    private readonly options: TrayPresenceOptions;
    private backend: TrayBackend | null = null;
    private starting: Promise<boolean> | null = null;
    private stopped = false;

    constructor(options: TrayPresenceOptions) {
        this.options = options;
        this.logger = options.logger || new Logger('Tray');
    }

    get isShown(): boolean {
        return this.backend !== null;
    }

    /**
     * Put the icon in the tray. Resolves false when it could not be started.
     */
    show(state: TrayMenuState): Promise<boolean> {
        if (this.stopped) return Promise.resolve(false);
        if (this.backend) {
            this.backend.update(state);
            return Promise.resolve(true);
        }
        if (!this.starting) {
            this.starting = this.startBackend(state).finally(() => {
                this.starting = null;
            });
        }
        return this.starting;
    }

    update(state: TrayMenuState): void {
        this.backend?.update(state);
    }

    async hide(): Promise<void> {
        const backend = this.backend;
        this.backend = null;
        if (!backend) return;
        const done = settlesWithin(
            backend.kill().catch((error: unknown) => {
                this.logger.warn('Failed to remove tray icon:', errorMessage(error));
            }),
            this.options.stopTimeoutMs ?? TRAY_STOP_TIMEOUT_MS
        );
        if (!(await done)) {
            this.logger.warn('Tray helper did not exit in time');
        }
    }

    async stop(): Promise<void> {
        this.stopped = true;
        if (this.starting) await this.starting;
        await this.hide();
    }

    private async startBackend(state: TrayMenuState): Promise<boolean> {
        let backend: TrayBackend | null;
        try {
            backend = (this.options.createBackend || createSysTrayBackend)();
        } catch (error: unknown) {
            this.logger.warn('Tray unavailable:', errorMessage(error));
            return false;
        }
        if (!backend) {
            this.logger.warn('Tray unavailable on this system');
            return false;
        }
        try {
            await backend.start(state, (action) => this.forward(action));
        } catch (error: unknown) {
            this.logger.warn('Failed to start tray icon:', errorMessage(error));
            return false;
        }
        if (this.stopped) {
            await backend.kill().catch((error: unknown) => {
                this.logger.debug('Tray removed after stop:', errorMessage(error));
            });
            return false;
        }
        this.backend = backend;
        return true;
    }

    private forward(action: TrayAction): void {
        this.options.marshal.submit(() => this.options.handlers[action]());
    }
}

export default TrayPresenceController;
