/**
 * Event Marshal
 *
 * FIFO queue of zero-argument callbacks. Code running outside the control
 * context (the connection worker, push requests, the tray helper) submits a
 * callback here instead of touching control-owned state directly; the control
 * context runs them one at a time in submission order.
 */

import Logger from './logger';
import { errorMessage } from './errors';

export type MarshalledCallback = () => void;

export interface EventMarshalOptions {
    /** Schedule a drain on the event loop after each submit (default true). */
    autoDrain?: boolean;
    logger?: Logger;
}

class EventMarshal {
    logger: Logger;
    private readonly autoDrain: boolean;
    private queue: MarshalledCallback[] = [];
    private scheduled: NodeJS.Immediate | null = null;
    private draining = false;
    private closed = false;

    constructor(options: EventMarshalOptions = {}) {
        this.autoDrain = options.autoDrain !== false;
        this.logger = options.logger || new Logger('Marshal');
    }

    get pending(): number {
        return this.queue.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Queue a callback for the control context. Returns false once closed.
     */
    submit(callback: MarshalledCallback): boolean {
        if (this.closed) {
            this.logger.debug('Marshal closed, dropping callback');
            return false;
        }
        this.queue.push(callback);
        if (this.autoDrain && !this.scheduled) {
            this.scheduled = setImmediate(() => {
                this.scheduled = null;
                this.drain();
            });
        }
        return true;
    }

    /**
     * Run queued callbacks in order until the queue is empty, including ones
     * submitted while draining. Re-entrant calls return immediately.
     */
    drain(): number {
        if (this.draining) return 0;
        this.draining = true;
        let ran = 0;
        try {
            let callback = this.queue.shift();
            while (callback) {
                try {
                    callback();
                } catch (error: unknown) {
                    this.logger.error('Marshalled callback failed:', errorMessage(error));
                }
                ran++;
                callback = this.queue.shift();
            }
        } finally {
            this.draining = false;
        }
        return ran;
    }

    /**
     * Run what is queued and reject further submissions.
     */
    close(): void {
        if (this.closed) return;
        if (this.scheduled) {
            clearImmediate(this.scheduled);
            this.scheduled = null;
        }
        this.drain();
        this.closed = true;
        this.queue = [];
    }
}

export default EventMarshal;
