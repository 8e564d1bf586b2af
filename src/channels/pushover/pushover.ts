/**
 * Pushover Notification Channel
 * One bounded POST to the Pushover messages API per notification, no retry
 */

import NotificationChannel, { type ChannelConfig, type DeliveryResult, type PushNotification } from '../base/channel';
import { postForm, type FormFields, type FormPoster } from '../../utils/http-request';
import { PushDeliveryFailedError } from '../../core/errors';

export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';

export const PUSH_TIMEOUT_MS = 10000;

interface PushoverConfig extends ChannelConfig {
    apiUrl?: string;
    timeoutMs?: number;
    transport?: FormPoster;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeErrors(data: Record<string, unknown>, raw: string): string {
    const errors = data.errors ?? data.error;
    if (Array.isArray(errors)) return errors.map(String).join('; ');
    if (typeof errors === 'string' && errors) return errors;
    return raw;
}

class PushoverChannel extends NotificationChannel {
    apiUrl: string;
    timeoutMs: number;
    private readonly transport: FormPoster;

    constructor(config: PushoverConfig = {}) {
        super('pushover', config);
        this.apiUrl = config.apiUrl || PUSHOVER_API_URL;
        this.timeoutMs = config.timeoutMs || PUSH_TIMEOUT_MS;
        this.transport = config.transport || postForm;
    }

    validateConfig(notification: PushNotification): { valid: boolean; error?: string } {
        if (!notification.appToken.trim() || !notification.userKey.trim()) {
            return { valid: false, error: 'Pushover app token / user key not configured' };
        }
        return { valid: true };
    }

    buildFields(notification: PushNotification): FormFields {
        const fields: FormFields = {
            token: notification.appToken.trim(),
            user: notification.userKey.trim(),
            title: notification.title,
            message: notification.message
        };
        if (notification.url) {
            fields.url = notification.url;
            fields.url_title = notification.urlTitle || 'Open in Discord';
        }
        if (notification.sound) {
            fields.sound = notification.sound;
        }
        return fields;
    }

    async _sendImpl(notification: PushNotification): Promise<DeliveryResult> {
        const response = await this.transport(this.apiUrl, this.buildFields(notification), { timeout: this.timeoutMs });

        if (response.status !== 200) {
            throw new PushDeliveryFailedError(`HTTP ${response.status ?? '?'}: ${response.raw}`);
        }

        const body = response.data;
        if (!isRecord(body)) {
            // 200 with a body that is not JSON
            return { delivered: true, reason: '' };
        }

        if (Number(body.status) === 1) {
            return { delivered: true, reason: '' };
        }
        throw new PushDeliveryFailedError(describeErrors(body, response.raw));
    }
}

export default PushoverChannel;
