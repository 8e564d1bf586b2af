/**
 * Connection Manager
 *
 * Owns the chat client's lifecycle: at most one worker (one client) at a
 * time, idempotent start/stop, serialized restarts. State changes are reported
 * through the Event Marshal so the control context sees them in order.
 *
 * The transport reconnects by itself after a recoverable drop; the manager
 * shows that as Connecting. A terminal disconnect ends the worker, so the
 * next start() builds a fresh client.
 */

import Logger from '../core/logger';
import type EventMarshal from '../core/event-marshal';
import { ConnectionError, NotConfiguredError, errorMessage } from '../core/errors';
import { settlesWithin, sleep } from '../utils/timing';
import type { ChatClient, ChatClientFactory } from './chat-client';
import type { ConnectionReason, ConnectionState, ConnectionStatus, InboundMessage } from '../types';

export const STOP_TIMEOUT_MS = 2500;
export const RESTART_DELAY_MS = 400;

export type StartOutcome = 'started' | 'already-running' | 'not-configured' | 'restart-pending';

export interface ConnectionManagerOptions {
    marshal: EventMarshal;
    createClient: ChatClientFactory;
    /** Token used when start() is called without one. */
    getToken: () => string;
    /** Messages that passed the self/automated filter. Runs on the worker. */
    onMessage: (message: InboundMessage) => void;
    /** Runs on the control context. */
    onStatus: (status: ConnectionStatus) => void;
    stopTimeoutMs?: number;
    restartDelayMs?: number;
    logger?: Logger;
}

interface Worker {
    id: number;
    client: ChatClient;
    /** Settles when the worker has finished: closed or failed to connect. */
    done: Promise<void>;
    signalClosed: () => void;
    stopping: Promise<void> | null;
}

class ConnectionManager {
    logger: Logger;
    private readonly options: ConnectionManagerOptions;
    private readonly stopTimeoutMs: number;
    private readonly restartDelayMs: number;
    private worker: Worker | null = null;
    private nextWorkerId = 1;
    private currentState: ConnectionState = 'offline';
    private pendingRestarts = 0;
    private restartChain: Promise<void> = Promise.resolve();

    constructor(options: ConnectionManagerOptions) {
        this.options = options;
        this.stopTimeoutMs = options.stopTimeoutMs ?? STOP_TIMEOUT_MS;
        this.restartDelayMs = options.restartDelayMs ?? RESTART_DELAY_MS;
        this.logger = options.logger || new Logger('Connection');
    }

    get state(): ConnectionState {
        return this.currentState;
    }

    get isRunning(): boolean {
        return this.worker !== null;
    }

    start(token?: string): StartOutcome {
        if (this.pendingRestarts > 0) {
            this.logger.debug('Restart in progress, start ignored');
            return 'restart-pending';
        }
        return this.spawn(token ?? this.options.getToken());
    }

    /**
     * Close the client and wait for it, at most stopTimeoutMs. Reports
     * offline either way. Concurrent calls share one shutdown.
     */
    stop(): Promise<void> {
        const worker = this.worker;
        if (!worker) return Promise.resolve();
        if (!worker.stopping) {
            worker.stopping = this.closeWorker(worker);
        }
        return worker.stopping;
    }

    /**
     * stop(), settle, start() again. Restarts queue behind each other.
     */
    restart(token?: string): Promise<StartOutcome> {
        this.pendingRestarts++;
        const run = this.restartChain.then(async () => {
            try {
                await this.stop();
                await sleep(this.restartDelayMs);
                return this.spawn(token ?? this.options.getToken());
            } finally {
                this.pendingRestarts--;
            }
        });
        this.restartChain = run.then(() => undefined, () => undefined);
        return run;
    }

    private spawn(token: string): StartOutcome {
        if (!token.trim()) {
            const reason = new NotConfiguredError('No bot token configured');
            this.logger.warn(reason.message);
            this.report('offline', `Not configured: ${reason.message}`, 'not-configured');
            return 'not-configured';
        }
        if (this.worker) {
            this.logger.debug('Connection worker already running');
            return 'already-running';
        }

        let signalClosed: () => void = () => undefined;
        const closed = new Promise<void>((resolve) => { signalClosed = resolve; });
        const id = this.nextWorkerId++;
        const client = this.options.createClient({
            onReady: (identity) => {
                if (this.isCurrent(id) && this.currentState !== 'online') {
                    this.report('online', `Online as ${identity}`);
                }
            },
            onReconnecting: () => {
                if (this.isCurrent(id) && this.currentState !== 'connecting') {
                    this.report('connecting', 'Reconnecting...');
                }
            },
            onDisconnect: (reason) => this.endWorker(id, reason),
            onMessage: (message) => this.handleMessage(id, message)
        });

        const worker: Worker = {
            id,
            client,
            done: Promise.resolve(),
            signalClosed: () => signalClosed(),
            stopping: null
        };
        this.worker = worker;
        this.report('connecting', 'Connecting...');
        worker.done = this.run(worker, token, closed);
        return 'started';
    }

    private async run(worker: Worker, token: string, closed: Promise<void>): Promise<void> {
        try {
            await worker.client.connect(token);
            await closed;
        } catch (error: unknown) {
            const failure = new ConnectionError(errorMessage(error));
            if (this.isCurrent(worker.id)) {
                this.logger.error('Connection failed:', failure.message);
                this.worker = null;
                this.report('offline', `Start failed: ${failure.message}`, 'connection-error');
                this.closeQuietly(worker.client);
            }
        }
    }

    private async closeWorker(worker: Worker): Promise<void> {
        this.logger.info('Stopping connection...');
        const closing = worker.client.close()
            .catch((error: unknown) => {
                this.logger.warn('Error while closing client:', errorMessage(error));
            })
            .finally(() => worker.signalClosed());

        const finished = await settlesWithin(Promise.all([closing, worker.done]), this.stopTimeoutMs);
        if (!finished) {
            this.logger.warn(`Client did not close within ${this.stopTimeoutMs}ms, continuing`);
        }
        if (this.worker === worker) {
            this.worker = null;
        }
        this.report('offline', 'Stopped', 'stopped');
    }

    /**
     * The transport gave up on its own: free the slot and close the client.
     */
    private endWorker(workerId: number, reason: string): void {
        const worker = this.worker;
        if (!worker || !this.isCurrent(workerId)) return;
        this.logger.warn(`Connection lost: ${reason}`);
        this.worker = null;
        this.report('offline', `Disconnected: ${reason}`, 'disconnected');
        this.closeQuietly(worker.client);
        worker.signalClosed();
    }

    private handleMessage(workerId: number, message: InboundMessage): void {
        const worker = this.worker;
        if (!worker || worker.id !== workerId || worker.stopping) return;
        if (message.isAutomated) return;
        if (worker.client.selfId !== null && message.senderId === worker.client.selfId) return;
        try {
            this.options.onMessage(message);
        } catch (error: unknown) {
            this.logger.error('Message handler failed:', errorMessage(error));
        }
    }

    private isCurrent(workerId: number): boolean {
        return this.worker !== null && this.worker.id === workerId && this.worker.stopping === null;
    }

    private closeQuietly(client: ChatClient): void {
        client.close().catch((error: unknown) => {
            this.logger.debug('Close after failed start:', errorMessage(error));
        });
    }

    private report(state: ConnectionState, detail: string, reason?: ConnectionReason): void {
        this.currentState = state;
        const status: ConnectionStatus = reason ? { state, detail, reason } : { state, detail };
        this.options.marshal.submit(() => this.options.onStatus(status));
    }
}

export default ConnectionManager;
