/**
 * Audio output backed by the platform's command-line player.
 *
 * macOS: afplay. Linux: ffplay, falling back to paplay for .wav files.
 * Windows: PowerShell driving System.Windows.Media.MediaPlayer.
 * One child process is the single output slot.
 */

import { execSync, spawn, type ChildProcess } from 'child_process';
import fs from 'fs';
import path from 'path';
import Logger from '../core/logger';
import { PlaybackUnavailableError } from '../core/errors';

export interface AudioEngine {
    /** Returns whether playback can work on this host. */
    init(): boolean;
    /** Throws PlaybackUnavailableError when the source cannot be used. */
    load(filePath: string): void;
    /** Gain in 0..1. */
    setVolume(gain: number): void;
    play(): void;
    stop(): void;
    isBusy(): boolean;
    dispose(): void;
}

type Player = 'afplay' | 'ffplay' | 'paplay' | 'powershell';

type CommandProbe = (command: string) => boolean;

/** Starts a player process. */
export type PlayerLauncher = (command: string, args: string[]) => ChildProcess;

const launchPlayer: PlayerLauncher = (command, args) => spawn(command, args, { stdio: 'ignore', windowsHide: true });

function commandExists(command: string): boolean {
    try {
        const probe = process.platform === 'win32' ? `where ${command}` : `command -v ${command}`;
        execSync(probe, { stdio: 'ignore' });
        return true;
    } catch {
        return false;
    }
}

export function psQuote(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Command and arguments that play `filePath` at `gain` with the given player.
 */
export function buildPlayerCommand(player: Player, filePath: string, gain: number): [string, string[]] {
    switch (player) {
        case 'afplay':
            return ['afplay', ['-v', gain.toFixed(2), filePath]];
        case 'ffplay':
            return ['ffplay', ['-nodisp', '-autoexit', '-loglevel', 'quiet', '-volume', String(Math.round(gain * 100)), filePath]];
        case 'paplay':
            return ['paplay', [`--volume=${Math.round(gain * 65536)}`, filePath]];
        case 'powershell': {
            const script = [
                'Add-Type -AssemblyName presentationCore',
                '$p = New-Object System.Windows.Media.MediaPlayer',
                `$p.Open([uri]${psQuote(path.resolve(filePath))})`,
                `$p.Volume = ${gain.toFixed(2)}`,
                '$p.Play()',
                'while (-not $p.NaturalDuration.HasTimeSpan) { Start-Sleep -Milliseconds 50 }',
                'Start-Sleep -Milliseconds ([int]$p.NaturalDuration.TimeSpan.TotalMilliseconds)',
                '$p.Close()'
            ].join('; ');
            return ['powershell', ['-NoProfile', '-NonInteractive', '-Command', script]];
        }
    }
}

export class ProcessAudioEngine implements AudioEngine {
    logger: Logger;
    platform: NodeJS.Platform;
    private readonly probe: CommandProbe;
    private readonly launch: PlayerLauncher;
    private players: Player[] = [];
    private source: string | null = null;
    private gain = 1;
    private child: ChildProcess | null = null;

    constructor(options: { platform?: NodeJS.Platform; probe?: CommandProbe; launch?: PlayerLauncher; logger?: Logger } = {}) {
        this.platform = options.platform || process.platform;
        this.probe = options.probe || commandExists;
        this.launch = options.launch || launchPlayer;
        this.logger = options.logger || new Logger('Audio');
    }

    init(): boolean {
        const candidates: Player[] = this.platform === 'darwin'
            ? ['afplay']
            : this.platform === 'win32'
                ? ['powershell']
                : ['ffplay', 'paplay'];
        this.players = candidates.filter((player) => this.probe(player));
        if (this.players.length === 0) {
            this.logger.warn(`No audio player found for ${this.platform} (tried ${candidates.join(', ')})`);
            return false;
        }
        this.logger.debug(`Audio players: ${this.players.join(', ')}`);
        return true;
    }

    load(filePath: string): void {
        if (!fs.existsSync(filePath)) {
            throw new PlaybackUnavailableError(`Sound file not found: ${filePath}`);
        }
        if (!this.playerFor(filePath)) {
            throw new PlaybackUnavailableError(`No player available for ${path.extname(filePath)} files`);
        }
        this.source = filePath;
    }

    /**
     * Command-line players take their gain at launch, so a change while a
     * sound is playing applies from the next play().
     */
    setVolume(gain: number): void {
        this.gain = Math.max(0, Math.min(1, gain));
        if (this.isBusy()) {
            this.logger.debug('Volume change applies to the next playback');
        }
    }

    play(): void {
        if (!this.source) {
            throw new PlaybackUnavailableError('Nothing loaded');
        }
        const player = this.playerFor(this.source);
        if (!player) {
            throw new PlaybackUnavailableError('No audio player available');
        }
        this.stop();
        const [command, args] = buildPlayerCommand(player, this.source, this.gain);
        const child = this.launch(command, args);
        child.on('error', (error) => {
            this.logger.warn(`${command} failed:`, error.message);
            // a process that failed to start may never emit 'exit'
            if (this.child === child) this.child = null;
        });
        child.on('exit', () => {
            if (this.child === child) this.child = null;
        });
        child.unref();
        this.child = child;
    }

    stop(): void {
        const child = this.child;
        this.child = null;
        if (child && child.exitCode === null && !child.killed) {
            child.kill();
        }
    }

    isBusy(): boolean {
        return this.child !== null && this.child.exitCode === null && !this.child.killed;
    }

    dispose(): void {
        this.stop();
        this.source = null;
    }

    private playerFor(filePath: string): Player | undefined {
        const isWav = path.extname(filePath).toLowerCase() === '.wav';
        return this.players.find((player) => player !== 'paplay' || isWav);
    }
}
