import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import { ProcessAudioEngine, buildPlayerCommand, psQuote } from './audio-engine';
import { PlaybackUnavailableError } from '../core/errors';
import { makeTempDir, removeDir, tick } from '../../test/fakes';

describe('buildPlayerCommand', () => {
    it('passes gain to afplay as a fraction', () => {
        expect(buildPlayerCommand('afplay', 'a.wav', 0.5)).toEqual(['afplay', ['-v', '0.50', 'a.wav']]);
    });

    it('passes gain to ffplay as a percentage', () => {
        expect(buildPlayerCommand('ffplay', 'a.mp3', 0.3)).toEqual([
            'ffplay',
            ['-nodisp', '-autoexit', '-loglevel', 'quiet', '-volume', '30', 'a.mp3']
        ]);
    });

    it('scales paplay volume to its 16-bit range', () => {
        expect(buildPlayerCommand('paplay', 'a.wav', 0.5)).toEqual(['paplay', ['--volume=32768', 'a.wav']]);
    });

    it('quotes the file for PowerShell', () => {
        const [command, args] = buildPlayerCommand('powershell', "it's.wav", 1);

        expect(command).toBe('powershell');
        expect(args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
        expect(args[3]).toContain(`$p.Open([uri]${psQuote(path.resolve("it's.wav"))})`);
        expect(args[3]).toContain('$p.Volume = 1.00');
    });

    it('doubles single quotes', () => {
        expect(psQuote("a'b")).toBe("'a''b'");
    });
});

describe('ProcessAudioEngine', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('is unavailable when no player is installed', () => {
        const engine = new ProcessAudioEngine({ platform: 'darwin', probe: () => false });

        expect(engine.init()).toBe(false);
    });

    it('picks the platform player', () => {
        const probed: string[] = [];
        const engine = new ProcessAudioEngine({
            platform: 'win32',
            probe: (command) => { probed.push(command); return true; }
        });

        expect(engine.init()).toBe(true);
        expect(probed).toEqual(['powershell']);
    });

    it('rejects a file that does not exist', () => {
        const engine = new ProcessAudioEngine({ platform: 'linux', probe: () => true });
        engine.init();

        expect(() => engine.load(path.join(dir, 'missing.wav'))).toThrow(PlaybackUnavailableError);
    });

    it('cannot play mp3 with only paplay', () => {
        const file = path.join(dir, 'alert.mp3');
        fs.writeFileSync(file, 'x');
        const engine = new ProcessAudioEngine({ platform: 'linux', probe: (command) => command === 'paplay' });

        expect(engine.init()).toBe(true);
        expect(() => engine.load(file)).toThrow('No player available for .mp3 files');
    });

    it('accepts wav with only paplay', () => {
        const file = path.join(dir, 'alert.wav');
        fs.writeFileSync(file, 'x');
        const engine = new ProcessAudioEngine({ platform: 'linux', probe: (command) => command === 'paplay' });
        engine.init();

        expect(() => engine.load(file)).not.toThrow();
        expect(engine.isBusy()).toBe(false);
    });

    it('refuses to play with nothing loaded', () => {
        const engine = new ProcessAudioEngine({ platform: 'linux', probe: () => true });
        engine.init();

        expect(() => engine.play()).toThrow('Nothing loaded');
    });

    it('is idle again after a player that fails to start', async () => {
        const file = path.join(dir, 'alert.wav');
        fs.writeFileSync(file, 'x');
        const launched: string[] = [];
        const engine = new ProcessAudioEngine({
            platform: 'linux',
            probe: () => true,
            launch: (command, args) => {
                launched.push(command);
                return spawn(path.join(dir, 'no-such-player'), args, { stdio: 'ignore' });
            }
        });
        engine.init();
        engine.load(file);

        engine.play();
        await tick(50);

        expect(launched).toEqual(['ffplay']);
        expect(engine.isBusy()).toBe(false);
    });
});
