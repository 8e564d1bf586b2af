/**
 * Base Notification Channel
 * Abstract base class for remote notification channels
 */

import Logger from '../../core/logger';
import { PushDeliveryFailedError, errorMessage } from '../../core/errors';
import { APP_NAME } from '../../utils/paths';

export interface PushNotification {
    appToken: string;
    userKey: string;
    title: string;
    message: string;
    url?: string;
    urlTitle?: string;
    /** Provider sound name; empty means the device default. */
    sound?: string;
}

export interface DeliveryResult {
    delivered: boolean;
    /** Empty when delivered. */
    reason: string;
}

export interface ChannelConfig {
    logger?: Logger;
}

abstract class NotificationChannel {
    name: string;
    logger: Logger;

    constructor(name: string, config: ChannelConfig = {}) {
        this.name = name;
        this.logger = config.logger || new Logger(`Channel:${name}`);
    }

    /**
     * Send a notification once. Never throws; failures come back as
     * `delivered: false` with a reason.
     */
    async send(notification: PushNotification): Promise<DeliveryResult> {
        const configured = this.validateConfig(notification);
        if (!configured.valid) {
            this.logger.debug('Channel not configured:', configured.error);
            return { delivered: false, reason: configured.error || 'not configured' };
        }

        this.logger.debug('Sending notification:', notification.title);

        try {
            const result = await this._sendImpl(notification);
            this.logger.info('Notification delivered');
            return result;
        } catch (error: unknown) {
            const reason = errorMessage(error);
            if (error instanceof PushDeliveryFailedError) {
                this.logger.warn('Notification not delivered:', reason);
            } else {
                this.logger.error('Error sending notification:', reason);
            }
            return { delivered: false, reason };
        }
    }

    /**
     * Send a fixed test message with the given credentials.
     */
    async test(credentials: Pick<PushNotification, 'appToken' | 'userKey'>): Promise<DeliveryResult> {
        this.logger.debug('Testing channel...');

        return await this.send({
            ...credentials,
            title: APP_NAME,
            message: `Test notification from ${APP_NAME} (${this.name} channel)`
        });
    }

    /**
     * Implementation-specific send logic. Throws PushDeliveryFailedError when
     * the provider refuses the notification.
     */
    abstract _sendImpl(notification: PushNotification): Promise<DeliveryResult>;

    /**
     * Check what a notification needs before any network call.
     */
    validateConfig(_notification: PushNotification): { valid: boolean; error?: string } {
        return { valid: true };
    }
}

export default NotificationChannel;
