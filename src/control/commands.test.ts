import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'path';
import TalkAlertApp from '../core/app';
import ConfigStore from '../core/config';
import EventMarshal from '../core/event-marshal';
import { formatRule, type CommandResult, maskSecret, parseArgs, parseBoolean, runCommand, tokenize, HELP_LINES } from './commands';
import { FakeAudioEngine, FakePushSender, FakeTrayBackend, fakeClientFactory, makeTempDir, removeDir } from '../../test/fakes';

describe('command parsing', () => {
    it('splits words and keeps quoted groups together', () => {
        expect(tokenize(`add 123 "C:\\My Sounds\\ding.wav" --name 'Big Boss'`)).toEqual([
            'add', '123', 'C:\\My Sounds\\ding.wav', '--name', 'Big Boss'
        ]);
        expect(tokenize('   ')).toEqual([]);
    });

    it('separates flags from positionals', () => {
        expect(parseArgs(['1', '--volume', '40', 'a.wav', '--name=Al', '--push-sound'])).toEqual({
            positionals: ['1', 'a.wav'],
            flags: { volume: '40', name: 'Al', 'push-sound': '' }
        });
    });

    it('reads on/off words', () => {
        expect(parseBoolean('ON')).toBe(true);
        expect(parseBoolean('no')).toBe(false);
        expect(parseBoolean('maybe')).toBeNull();
    });

    it('shows only the tail of a secret', () => {
        expect(maskSecret('test-secret')).toBe('****cret');
        expect(maskSecret('abc')).toBe('****');
        expect(maskSecret('')).toBe('(not set)');
    });

    it('formats a rule line', () => {
        expect(formatRule({ name: '', senderId: '1', soundPath: 'a.wav', volume: 70, pushSound: 'bike' }, 0))
            .toBe('1. -  1  a.wav  70%  push: bike');
    });
});

describe('runCommand', () => {
    let dir: string;
    let engine: FakeAudioEngine;
    let push: FakePushSender;
    let app: TalkAlertApp;

    beforeEach(() => {
        dir = makeTempDir();
        engine = new FakeAudioEngine();
        push = new FakePushSender();
        app = new TalkAlertApp({
            store: new ConfigStore(path.join(dir, 'TalkAlert')),
            engine,
            push,
            marshal: new EventMarshal({ autoDrain: false }),
            createClient: fakeClientFactory({ autoReady: true }).factory,
            createTrayBackend: () => new FakeTrayBackend(),
            env: {},
            exit: () => undefined,
            restartDelayMs: 0
        });
    });

    afterEach(() => {
        removeDir(dir);
    });

    function run(line: string): Promise<CommandResult> {
        return runCommand(app, tokenize(line));
    }

    it('adds and lists rules', async () => {
        expect(await run('add 123 ding.wav --name Boss --volume 80')).toEqual({ ok: true, lines: ['Added rule for 123'] });
        await run('add 456 "chime two.mp3"');

        expect((await run('rules')).lines).toEqual([
            '1. Boss  123  ding.wav  80%',
            '2. -  456  chime two.mp3  100%'
        ]);
    });

    it('reports validation errors without changing anything', async () => {
        await run('add 123 ding.wav');

        expect(await run('add 123 other.wav')).toEqual({ ok: false, lines: ['A rule for sender 123 already exists'] });
        expect((await run('add 9 x.ogg')).ok).toBe(false);
        expect(await run('add 9 x.wav --volume loud')).toEqual({ ok: false, lines: ['Invalid volume: loud'] });
        expect(app.rules.size).toBe(1);
    });

    it('updates only the given fields', async () => {
        await run('add 123 ding.wav --name Boss --volume 80');

        expect((await run('update 123 --id 321 --volume 10')).lines).toEqual(['Updated rule for 321']);
        expect(app.rules.find('321')).toEqual({ name: 'Boss', senderId: '321', soundPath: 'ding.wav', volume: 10, pushSound: '' });
        expect(await run('update 999')).toEqual({ ok: false, lines: ['No rule for sender 999'] });
    });

    it('moves, sorts and removes', async () => {
        await run('add 1 a.wav --name c');
        await run('add 2 b.wav --name a');
        await run('add 3 c.wav --name b');

        await run('move 3 1');
        expect(app.rules.all().map((rule) => rule.senderId)).toEqual(['3', '1', '2']);

        await run('sort');
        expect(app.rules.all().map((rule) => rule.senderId)).toEqual(['2', '3', '1']);

        expect((await run('remove 3')).lines).toEqual(['Removed rule for 3']);
        expect((await run('remove 3')).lines).toEqual(['No rule for 3']);
        expect((await run('move 1 0')).ok).toBe(false);
    });

    it('sets a rule volume', async () => {
        await run('add 1 a.wav');

        expect(await run('volume 1 35')).toEqual({ ok: true, lines: ['Volume for 1: 35%'] });
        expect(await run('volume 1')).toEqual({ ok: false, lines: ['Usage: volume <id> <0-100>'] });
    });

    it('mutes and unmutes', async () => {
        await run('mute');
        expect(app.getSettings().muted).toBe(true);
        await run('set mute off');
        expect(app.getSettings().muted).toBe(false);
    });

    it('plays a rule sound on request and surfaces failures', async () => {
        await run('add 1 a.wav --volume 40');

        expect(await run('test 1')).toEqual({ ok: true, lines: ['Playing a.wav'] });
        expect(app.nowPlaying).toEqual({ ruleId: '1', volume: 40 });

        engine.missing.add('gone.wav');
        expect(await run('test --sound gone.wav')).toEqual({
            ok: false,
            lines: ['Cannot play sound: Sound file not found: gone.wav']
        });
    });

    it('changes settings and masks secrets', async () => {
        expect(await run('set push-app test-secret')).toEqual({ ok: true, lines: ['push-app: ****cret'] });
        expect((await run('set push on')).ok).toBe(true);
        expect(await run('set push sometimes')).toEqual({ ok: false, lines: ['push takes on/off'] });
        expect((await run('set colour blue')).ok).toBe(false);

        const lines = (await run('settings')).lines;
        expect(lines).toContain('push: on');
        expect(lines).toContain('push-app: ****cret');
        expect(lines).toContain('push-user: (not set)');
        expect(app.getSettings().pushAppToken).toBe('test-secret');
    });

    it('reports the test push result', async () => {
        push.result = { delivered: false, reason: 'Pushover app token / user key not configured' };

        expect(await run('test-push')).toEqual({
            ok: false,
            lines: ['Push failed: Pushover app token / user key not configured']
        });
    });

    it('refuses restart without a token', async () => {
        expect(await run('restart')).toEqual({ ok: false, lines: ['No bot token configured (set token <TOKEN>)'] });
    });

    it('shows status', async () => {
        await run('add 1 a.wav');

        expect((await run('status')).lines).toEqual([
            'Connection: offline (Not started)',
            'Muted: no',
            'Now playing: nothing',
            'Rules: 1'
        ]);
    });

    it('prints help, quits and rejects unknown commands', async () => {
        expect((await run('help')).lines).toEqual(HELP_LINES);
        expect(await run('quit')).toEqual({ ok: true, lines: [], quit: true });
        expect(await run('dance')).toEqual({ ok: false, lines: ['Unknown command: dance. Type "help" for commands.'] });
        expect(await run('')).toEqual({ ok: true, lines: [] });
    });
});
