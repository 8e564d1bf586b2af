/**
 * Playback Controller
 *
 * Owns the single audio output slot. A new play() always replaces whatever is
 * sounding; there is no mixing and no queue. NowPlaying remembers which rule
 * is audible so its volume can be changed live.
 */

import Logger from '../core/logger';
import { PlaybackUnavailableError, errorMessage } from '../core/errors';
import { clampVolume } from '../rules/rule-table';
import type { AudioEngine } from './audio-engine';
import type { NowPlaying } from '../types';

export interface PlaybackPort {
    play(soundPath: string, volume: number, ruleId: string): void;
}

class PlaybackController implements PlaybackPort {
    logger: Logger;
    private readonly engine: AudioEngine;
    private ready = false;
    private current: NowPlaying | null = null;

    constructor(engine: AudioEngine, logger?: Logger) {
        this.engine = engine;
        this.logger = logger || new Logger('Playback');
    }

    init(): boolean {
        try {
            this.ready = this.engine.init();
        } catch (error: unknown) {
            this.logger.warn('Audio engine failed to initialise:', errorMessage(error));
            this.ready = false;
        }
        return this.ready;
    }

    get isReady(): boolean {
        return this.ready;
    }

    /**
     * What is audible now. Cleared once the engine reports it has finished.
     */
    get nowPlaying(): NowPlaying | null {
        if (this.current && !this.engine.isBusy()) {
            this.current = null;
        }
        return this.current ? { ...this.current } : null;
    }

    play(soundPath: string, volume: number, ruleId: string): void {
        if (!this.ready) {
            throw new PlaybackUnavailableError('Audio output is not available');
        }
        this.stop();
        const level = clampVolume(volume);
        try {
            this.engine.load(soundPath);
            this.engine.setVolume(level / 100);
            this.engine.play();
        } catch (error: unknown) {
            if (error instanceof PlaybackUnavailableError) throw error;
            throw new PlaybackUnavailableError(`Cannot play ${soundPath}: ${errorMessage(error)}`);
        }
        this.current = { ruleId, volume: level };
        this.logger.debug(`Playing ${soundPath} at ${level}% for ${ruleId}`);
    }

    stop(): void {
        if (this.ready) {
            try {
                this.engine.stop();
            } catch (error: unknown) {
                this.logger.warn('Failed to stop playback:', errorMessage(error));
            }
        }
        this.current = null;
    }

    /**
     * Change the gain of the sound now playing, but only when it belongs to
     * `ruleId`. Returns whether anything changed.
     */
    setLiveVolume(ruleId: string, volume: number): boolean {
        const playing = this.nowPlaying;
        if (!playing || playing.ruleId !== ruleId) return false;
        const level = clampVolume(volume);
        this.engine.setVolume(level / 100);
        this.current = { ruleId, volume: level };
        return true;
    }

    dispose(): void {
        this.stop();
        if (this.ready) {
            this.engine.dispose();
            this.ready = false;
        }
    }
}

export default PlaybackController;
