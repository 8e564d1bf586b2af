/**
 * Notification Dispatcher
 *
 * Decides what one inbound message triggers. Local playback is handed to the
 * control context through the Event Marshal; the push request runs on its own
 * and is only logged. Neither branch waits for the other.
 */

import Logger from '../core/logger';
import type EventMarshal from '../core/event-marshal';
import { errorMessage } from '../core/errors';
import type { RuleLookup } from '../rules/rule-table';
import type { PlaybackPort } from '../audio/playback-controller';
import type { DeliveryResult, PushNotification } from '../channels/base/channel';
import { APP_NAME } from '../utils/paths';
import type { InboundMessage, Rule, Settings } from '../types';

export const EMPTY_TEXT_PLACEHOLDER = '(no text)';

export const PUSH_URL_TITLE = 'Open in Discord';

export interface PushSender {
    send(notification: PushNotification): Promise<DeliveryResult>;
}

export interface DispatcherDeps {
    rules: RuleLookup;
    /** Current settings; read at dispatch time. */
    settings: () => Readonly<Settings>;
    playback: PlaybackPort;
    push: PushSender;
    marshal: EventMarshal;
    logger?: Logger;
}

export type PlaybackDecision = 'queued' | 'muted';

export type PushDecision = 'sent' | 'disabled' | 'not-configured' | 'muted';

export type DispatchOutcome =
    | { matched: false }
    | { matched: true; ruleId: string; playback: PlaybackDecision; push: PushDecision };

export function composePushBody(who: string, where: string, text: string, includeMessage: boolean): string {
    if (!includeMessage) return `${who} @ ${where}`;
    return `${who} @ ${where}: ${text.trim() || EMPTY_TEXT_PLACEHOLDER}`;
}

export function pushDecision(settings: Readonly<Settings>): PushDecision | null {
    if (!settings.pushEnabled) return 'disabled';
    if (!settings.pushAppToken || !settings.pushUserKey) return 'not-configured';
    if (settings.muted && !settings.pushWhenMuted) return 'muted';
    return null;
}

class NotificationDispatcher {
    logger: Logger;
    private readonly deps: DispatcherDeps;
    private readonly inflight = new Set<Promise<void>>();

    constructor(deps: DispatcherDeps) {
        this.deps = deps;
        this.logger = deps.logger || new Logger('Dispatcher');
    }

    get pendingPushes(): number {
        return this.inflight.size;
    }

    dispatch(message: InboundMessage): DispatchOutcome {
        const rule = this.deps.rules.find(message.senderId);
        if (!rule) return { matched: false };

        const settings = this.deps.settings();
        this.logger.debug(`Message from watched sender ${rule.senderId}`);

        let playback: PlaybackDecision = 'muted';
        if (!settings.muted) {
            playback = 'queued';
            this.queuePlayback(rule);
        }

        const blocked = pushDecision(settings);
        if (!blocked) {
            this.startPush(rule, message, settings);
        }

        return { matched: true, ruleId: rule.senderId, playback, push: blocked || 'sent' };
    }

    /**
     * Wait for push requests already started.
     */
    async flush(): Promise<void> {
        await Promise.all([...this.inflight]);
    }

    private queuePlayback(rule: Rule): void {
        this.deps.marshal.submit(() => {
            // mute may have been switched on since the message arrived
            if (this.deps.settings().muted) return;
            try {
                this.deps.playback.play(rule.soundPath, rule.volume, rule.senderId);
            } catch (error: unknown) {
                this.logger.warn(`Alert sound for ${rule.senderId} not played:`, errorMessage(error));
            }
        });
    }

    private startPush(rule: Rule, message: InboundMessage, settings: Readonly<Settings>): void {
        const who = rule.name || message.senderDisplayName || 'User';
        const notification: PushNotification = {
            appToken: settings.pushAppToken,
            userKey: settings.pushUserKey,
            title: APP_NAME,
            message: composePushBody(who, message.locationLabel, message.text, settings.pushIncludeMessage),
            url: message.url,
            urlTitle: PUSH_URL_TITLE,
            sound: rule.pushSound
        };

        const task = this.deps.push.send(notification)
            .then((result) => {
                if (result.delivered) {
                    this.logger.debug(`Push delivered for ${rule.senderId}`);
                } else {
                    this.logger.info(`Push for ${rule.senderId} not delivered: ${result.reason}`);
                }
            })
            .catch((error: unknown) => {
                this.logger.warn(`Push for ${rule.senderId} failed:`, errorMessage(error));
            })
            .finally(() => {
                this.inflight.delete(task);
            });
        this.inflight.add(task);
    }
}

export default NotificationDispatcher;
