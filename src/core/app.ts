/**
 * TalkAlert application context
 *
 * One object built at startup and torn down at shutdown. It owns the settings
 * and the rule table (control-context state), and wires the connection,
 * dispatcher, playback, push and tray components together. Everything that
 * mutates state here runs on the control context; background work reaches it
 * only through the Event Marshal.
 */

import Logger from './logger';
import EventMarshal from './event-marshal';
import ConfigStore from './config';
import { errorMessage } from './errors';
import RuleTable, { clampVolume, type RuleResult } from '../rules/rule-table';
import PlaybackController from '../audio/playback-controller';
import { ProcessAudioEngine, type AudioEngine } from '../audio/audio-engine';
import PushoverChannel from '../channels/pushover/pushover';
import type { DeliveryResult } from '../channels/base/channel';
import NotificationDispatcher, { type PushSender } from '../dispatch/notification-dispatcher';
import ConnectionManager, { type StartOutcome } from '../connection/connection-manager';
import { createDiscordClient } from '../connection/discord-client';
import type { ChatClientFactory } from '../connection/chat-client';
import TrayPresenceController, { type TrayBackendFactory } from '../tray/tray-presence';
import type { ConnectionStatus, NowPlaying, RuleInput, Settings } from '../types';

export const SHUTDOWN_DEADLINE_MS = 5000;

export const TEST_RULE_ID = '__test__';

export interface AppOptions {
    store: ConfigStore;
    engine?: AudioEngine;
    createClient?: ChatClientFactory;
    push?: PushSender & { test(credentials: { appToken: string; userKey: string }): Promise<DeliveryResult> };
    createTrayBackend?: TrayBackendFactory;
    marshal?: EventMarshal;
    env?: NodeJS.ProcessEnv;
    /** Process termination; the last step of shutdown. */
    exit?: (code: number) => void;
    shutdownDeadlineMs?: number;
    stopTimeoutMs?: number;
    restartDelayMs?: number;
    logger?: Logger;
}

type Listener<T> = (value: T) => void;

class TalkAlertApp {
    logger: Logger;
    readonly marshal: EventMarshal;
    readonly rules: RuleTable;
    readonly playback: PlaybackController;
    readonly dispatcher: NotificationDispatcher;
    readonly connection: ConnectionManager;
    readonly tray: TrayPresenceController;
    private readonly store: ConfigStore;
    private readonly push: NonNullable<AppOptions['push']>;
    private readonly env: NodeJS.ProcessEnv;
    private readonly exit: (code: number) => void;
    private readonly shutdownDeadlineMs: number;
    private settings: Settings;
    private status: ConnectionStatus = { state: 'offline', detail: 'Not started' };
    private visible = true;
    /** start() was called: token changes now (re)connect. */
    private monitoring = false;
    private shuttingDown: Promise<void> | null = null;
    private readonly statusListeners = new Set<Listener<ConnectionStatus>>();
    private readonly visibilityListeners = new Set<Listener<boolean>>();

    constructor(options: AppOptions) {
        this.logger = options.logger || new Logger('App');
        this.store = options.store;
        this.env = options.env || process.env;
        this.exit = options.exit || ((code) => process.exit(code));
        this.shutdownDeadlineMs = options.shutdownDeadlineMs ?? SHUTDOWN_DEADLINE_MS;
        this.marshal = options.marshal || new EventMarshal();

        const state = this.store.load();
        this.settings = state.settings;
        this.rules = new RuleTable(state.rules);

        this.playback = new PlaybackController(options.engine || new ProcessAudioEngine());
        this.push = options.push || new PushoverChannel();
        this.dispatcher = new NotificationDispatcher({
            rules: this.rules,
            settings: () => this.settings,
            playback: this.playback,
            push: this.push,
            marshal: this.marshal
        });
        this.connection = new ConnectionManager({
            marshal: this.marshal,
            createClient: options.createClient || createDiscordClient,
            getToken: () => this.token,
            onMessage: (message) => { this.dispatcher.dispatch(message); },
            onStatus: (status) => this.applyStatus(status),
            stopTimeoutMs: options.stopTimeoutMs,
            restartDelayMs: options.restartDelayMs
        });
        this.tray = new TrayPresenceController({
            marshal: this.marshal,
            createBackend: options.createTrayBackend,
            handlers: {
                'toggle-visibility': () => {
                    if (this.visible) {
                        this.hideConsole().catch((error: unknown) => {
                            this.logger.warn('Hide failed:', errorMessage(error));
                        });
                    } else {
                        this.showConsole();
                    }
                },
                'toggle-mute': () => this.toggleMute(),
                'exit': () => {
                    this.shutdown().catch((error: unknown) => {
                        this.logger.error('Shutdown failed:', errorMessage(error));
                    });
                }
            }
        });
    }

    // ----------------------------------------------------------
    // State access
    // ----------------------------------------------------------

    get token(): string {
        return this.settings.authToken || (this.env.DISCORD_BOT_TOKEN || '').trim();
    }

    getSettings(): Settings {
        return { ...this.settings };
    }

    getStatus(): ConnectionStatus {
        return { ...this.status };
    }

    get nowPlaying(): NowPlaying | null {
        return this.playback.nowPlaying;
    }

    get consoleVisible(): boolean {
        return this.visible;
    }

    onStatusChange(listener: Listener<ConnectionStatus>): () => void {
        this.statusListeners.add(listener);
        return () => { this.statusListeners.delete(listener); };
    }

    onVisibilityChange(listener: Listener<boolean>): () => void {
        this.visibilityListeners.add(listener);
        return () => { this.visibilityListeners.delete(listener); };
    }

    // ----------------------------------------------------------
    // Lifecycle
    // ----------------------------------------------------------

    /**
     * Bring up audio and start watching. Missing audio only disables sounds.
     */
    start(): StartOutcome {
        this.monitoring = true;
        if (!this.playback.init()) {
            this.logger.warn('Audio playback unavailable; alerts will be push only');
        }
        return this.connection.start();
    }

    restartConnection(): Promise<StartOutcome> {
        return this.connection.restart();
    }

    /**
     * Stop tray, audio and connection, save, then exit. The exit happens even
     * when a step hangs past the deadline.
     */
    shutdown(code: number = 0): Promise<void> {
        if (this.shuttingDown) return this.shuttingDown;
        this.logger.info('Shutting down...');
        this.monitoring = false;
        const deadline = setTimeout(() => {
            this.logger.warn(`Shutdown exceeded ${this.shutdownDeadlineMs}ms, exiting anyway`);
            this.exit(code);
        }, this.shutdownDeadlineMs);

        this.shuttingDown = (async () => {
            try {
                await this.tray.stop();
                this.playback.dispose();
                await this.connection.stop();
                this.save();
                this.marshal.close();
            } catch (error: unknown) {
                this.logger.error('Error during shutdown:', errorMessage(error));
            } finally {
                clearTimeout(deadline);
                this.exit(code);
            }
        })();
        return this.shuttingDown;
    }

    save(): boolean {
        return this.store.save({ settings: this.settings, rules: [...this.rules.all()] });
    }

    // ----------------------------------------------------------
    // Rules
    // ----------------------------------------------------------

    addRule(input: RuleInput): RuleResult {
        return this.saveIfOk(this.rules.add(input));
    }

    updateRule(oldId: string, input: RuleInput): RuleResult {
        const result = this.saveIfOk(this.rules.update(oldId, input));
        if (result.ok) {
            this.playback.setLiveVolume(oldId, result.rule.volume);
        }
        return result;
    }

    removeRule(senderId: string): boolean {
        const removed = this.rules.remove(senderId);
        if (removed) this.save();
        return removed;
    }

    moveRule(senderId: string, toIndex: number): boolean {
        const moved = this.rules.move(senderId, toIndex);
        if (moved) this.save();
        return moved;
    }

    sortRules(direction: 'asc' | 'desc'): void {
        this.rules.sortByName(direction);
        this.save();
    }

    /**
     * Change one rule's volume, and the live gain if that rule is sounding.
     */
    setRuleVolume(senderId: string, volume: number): RuleResult {
        const rule = this.rules.find(senderId);
        const input: RuleInput = rule ? { ...rule, volume: clampVolume(volume) } : { senderId, soundPath: '' };
        return this.updateRule(senderId, input);
    }

    // ----------------------------------------------------------
    // Settings
    // ----------------------------------------------------------

    setMuted(muted: boolean): void {
        this.settings = { ...this.settings, muted };
        this.playback.stop();
        this.save();
        this.tray.update({ consoleVisible: this.visible, muted });
        this.logger.info(muted ? 'Muted' : 'Unmuted');
    }

    toggleMute(): void {
        this.setMuted(!this.settings.muted);
    }

    /**
     * Apply and persist a settings change. Once monitoring has started, a new
     * token restarts the connection, running or not; a cleared one leaves it
     * offline and not configured.
     */
    updateSettings(patch: Partial<Settings>): Settings {
        const previousToken = this.token;
        this.settings = { ...this.settings, ...patch };
        this.save();
        if (patch.muted !== undefined) {
            this.playback.stop();
            this.tray.update({ consoleVisible: this.visible, muted: this.settings.muted });
        }
        if (this.token !== previousToken && this.monitoring) {
            this.connection.restart().catch((error: unknown) => {
                this.logger.error('Restart after token change failed:', errorMessage(error));
            });
        }
        return this.getSettings();
    }

    // ----------------------------------------------------------
    // Manual actions
    // ----------------------------------------------------------

    /**
     * Play a sound on request. Throws PlaybackUnavailableError so the caller
     * can show it.
     */
    testSound(soundPath: string, volume: number, ruleId: string = TEST_RULE_ID): void {
        if (!this.playback.isReady) this.playback.init();
        this.playback.play(soundPath, volume, ruleId);
    }

    stopSound(): void {
        this.playback.stop();
    }

    testPush(): Promise<DeliveryResult> {
        return this.push.test({ appToken: this.settings.pushAppToken, userKey: this.settings.pushUserKey });
    }

    // ----------------------------------------------------------
    // Console / tray
    // ----------------------------------------------------------

    /**
     * Send the console to the tray. Stays visible when tray mode is off or
     * the tray cannot start.
     */
    async hideConsole(): Promise<boolean> {
        if (!this.settings.trayOnMinimize) {
            this.logger.info('Tray mode is off; console stays visible');
            return false;
        }
        const shown = await this.tray.show({ consoleVisible: false, muted: this.settings.muted });
        if (!shown) {
            this.logger.warn('Tray icon unavailable; console stays visible');
            return false;
        }
        this.setVisible(false);
        return true;
    }

    showConsole(): void {
        this.setVisible(true);
        this.tray.hide().catch((error: unknown) => {
            this.logger.warn('Failed to hide tray icon:', errorMessage(error));
        });
    }

    private setVisible(visible: boolean): void {
        if (this.visible === visible) return;
        this.visible = visible;
        for (const listener of this.visibilityListeners) listener(visible);
    }

    private applyStatus(status: ConnectionStatus): void {
        this.status = status;
        this.logger.info(`Connection: ${status.detail}`);
        for (const listener of this.statusListeners) listener(status);
    }

    private saveIfOk(result: RuleResult): RuleResult {
        if (result.ok) this.save();
        return result;
    }
}

export default TalkAlertApp;
