import { describe, it, expect, beforeEach } from '@jest/globals';
import ConnectionManager from './connection-manager';
import EventMarshal from '../core/event-marshal';
import { fakeClientFactory, tick, type FakeChatClient, type FakeClientBehaviour } from '../../test/fakes';
import type { ConnectionStatus, InboundMessage } from '../types';

interface Harness {
    manager: ConnectionManager;
    marshal: EventMarshal;
    clients: FakeChatClient[];
    statuses: ConnectionStatus[];
    received: InboundMessage[];
    setToken: (token: string) => void;
    states: () => string[];
}

function harness(behaviour: FakeClientBehaviour = { autoReady: true }, stopTimeoutMs: number = 50): Harness {
    const marshal = new EventMarshal({ autoDrain: false });
    const { factory, clients } = fakeClientFactory(behaviour);
    const statuses: ConnectionStatus[] = [];
    const received: InboundMessage[] = [];
    let token = 'test-token';
    const manager = new ConnectionManager({
        marshal,
        createClient: factory,
        getToken: () => token,
        onMessage: (message) => { received.push(message); },
        onStatus: (status) => { statuses.push(status); },
        stopTimeoutMs,
        restartDelayMs: 5
    });
    return {
        manager,
        marshal,
        clients,
        statuses,
        received,
        setToken: (value) => { token = value; },
        states: () => {
            marshal.drain();
            return statuses.map((status) => status.state);
        }
    };
}

describe('ConnectionManager', () => {
    let h: Harness;

    beforeEach(() => {
        h = harness();
    });

    it('stays offline without a token and spawns no client', () => {
        h.setToken('  ');

        expect(h.manager.start()).toBe('not-configured');
        h.marshal.drain();

        expect(h.clients).toHaveLength(0);
        expect(h.manager.state).toBe('offline');
        expect(h.statuses).toEqual([{ state: 'offline', detail: 'Not configured: No bot token configured', reason: 'not-configured' }]);
    });

    it('connects and reports online', () => {
        expect(h.manager.start()).toBe('started');

        expect(h.states()).toEqual(['connecting', 'online']);
        expect(h.statuses[1].detail).toBe('Online as TestBot#0001');
        expect(h.clients[0].connectedWith).toBe('test-token');
    });

    it('prefers an explicit token over the stored one', () => {
        h.manager.start('test-override');

        expect(h.clients[0].connectedWith).toBe('test-override');
    });

    it('spawns one worker when started twice while connecting', () => {
        h = harness({});

        expect(h.manager.start()).toBe('started');
        expect(h.manager.state).toBe('connecting');
        expect(h.manager.start()).toBe('already-running');

        expect(h.clients).toHaveLength(1);
        expect(h.states()).toEqual(['connecting']);
    });

    it('reports a failed login and frees the slot', async () => {
        h = harness({ failWith: 'An invalid token was provided.' });

        h.manager.start();
        await tick();

        expect(h.manager.isRunning).toBe(false);
        expect(h.clients[0].closed).toBe(true);
        h.marshal.drain();
        expect(h.statuses[h.statuses.length - 1]).toEqual({
            state: 'offline',
            detail: 'Start failed: An invalid token was provided.',
            reason: 'connection-error'
        });
    });

    it('stops idempotently', async () => {
        h.manager.start();

        await Promise.all([h.manager.stop(), h.manager.stop()]);
        await h.manager.stop();

        expect(h.manager.isRunning).toBe(false);
        expect(h.clients[0].closed).toBe(true);
        expect(h.states()).toEqual(['connecting', 'online', 'offline']);
        expect(h.statuses[2]).toEqual({ state: 'offline', detail: 'Stopped', reason: 'stopped' });
    });

    it('gives up waiting for a client that will not close', async () => {
        h = harness({ autoReady: true, hangOnClose: true }, 20);
        h.manager.start();

        await h.manager.stop();

        expect(h.manager.isRunning).toBe(false);
        expect(h.manager.state).toBe('offline');
    });

    it('passes through offline on restart', async () => {
        h.manager.start();

        expect(await h.manager.restart()).toBe('started');

        expect(h.states()).toEqual(['connecting', 'online', 'offline', 'connecting', 'online']);
        expect(h.clients).toHaveLength(2);
        expect(h.clients[0].closed).toBe(true);
    });

    it('ends offline and not configured when the token was cleared before restart', async () => {
        h.manager.start();
        h.setToken('');

        expect(await h.manager.restart()).toBe('not-configured');

        expect(h.states()).toEqual(['connecting', 'online', 'offline', 'offline']);
        expect(h.statuses[3].reason).toBe('not-configured');
        expect(h.clients).toHaveLength(1);
    });

    it('refuses start while a restart is pending', async () => {
        h.manager.start();

        const restarting = h.manager.restart();
        expect(h.manager.start()).toBe('restart-pending');
        await restarting;

        expect(h.clients).toHaveLength(2);
        expect(h.manager.start()).toBe('already-running');
    });

    it('runs overlapping restarts one after another', async () => {
        h.manager.start();

        const outcomes = await Promise.all([h.manager.restart(), h.manager.restart()]);

        expect(outcomes).toEqual(['started', 'started']);
        expect(h.clients).toHaveLength(3);
        expect(h.clients.filter((client) => !client.closed)).toHaveLength(1);
    });

    it('ignores events from a replaced client', async () => {
        h.manager.start();
        await h.manager.restart();
        h.marshal.drain();
        const before = h.statuses.length;

        h.clients[0].handlers.onDisconnect('late');
        h.clients[0].receive({ senderId: '42' });

        h.marshal.drain();
        expect(h.statuses).toHaveLength(before);
        expect(h.received).toEqual([]);
    });

    it('frees the slot when the transport gives up, so start() connects again', () => {
        h.manager.start();

        h.clients[0].handlers.onDisconnect('gateway closed (4004)');

        expect(h.manager.isRunning).toBe(false);
        expect(h.clients[0].closed).toBe(true);
        expect(h.states()).toEqual(['connecting', 'online', 'offline']);
        expect(h.statuses[2]).toEqual({ state: 'offline', detail: 'Disconnected: gateway closed (4004)', reason: 'disconnected' });

        expect(h.manager.start()).toBe('started');
        expect(h.clients).toHaveLength(2);
        expect(h.states()).toEqual(['connecting', 'online', 'offline', 'connecting', 'online']);
    });

    it('shows a recoverable drop as connecting until the session is back', () => {
        h.manager.start();
        const client = h.clients[0];

        client.handlers.onReconnecting();
        client.handlers.onReconnecting();
        expect(h.manager.state).toBe('connecting');
        expect(h.manager.isRunning).toBe(true);

        client.handlers.onReady('TestBot#0001');
        client.handlers.onReady('TestBot#0001');

        expect(h.states()).toEqual(['connecting', 'online', 'connecting', 'online']);
        expect(h.statuses[2].detail).toBe('Reconnecting...');
        expect(h.manager.start()).toBe('already-running');
        expect(h.clients).toHaveLength(1);
    });

    it('stops cleanly after the transport already gave up', async () => {
        h.manager.start();
        h.clients[0].handlers.onDisconnect('gateway closed (4014)');

        await h.manager.stop();

        expect(h.states()).toEqual(['connecting', 'online', 'offline']);
    });

    it('filters its own and automated messages', () => {
        h.manager.start();
        const client = h.clients[0];

        client.receive({ senderId: 'bot-self' });
        client.receive({ senderId: '7', isAutomated: true });
        client.receive({ senderId: '7', text: 'real' });

        expect(h.received.map((message) => message.text)).toEqual(['real']);
    });

    it('drops messages once stopping has begun', async () => {
        h.manager.start();
        const client = h.clients[0];

        const stopping = h.manager.stop();
        client.receive({ senderId: '7' });
        await stopping;

        expect(h.received).toEqual([]);
    });
});
