import { describe, it, expect } from '@jest/globals';
import PushoverChannel, { PUSHOVER_API_URL, PUSH_TIMEOUT_MS } from './pushover';
import type { FormFields, FormPoster, HttpOptions, HttpResponse } from '../../utils/http-request';
import type { PushNotification } from '../base/channel';

interface Call {
    url: string;
    fields: FormFields;
    opts?: HttpOptions;
}

function fakeTransport(response: HttpResponse | Error): { transport: FormPoster; calls: Call[] } {
    const calls: Call[] = [];
    const transport: FormPoster = async (url, fields, opts) => {
        calls.push({ url, fields, opts });
        if (response instanceof Error) throw response;
        return response;
    };
    return { transport, calls };
}

const notification: PushNotification = {
    appToken: 'test-app',
    userKey: 'test-user',
    title: 'TalkAlert',
    message: 'Alice @ Guild / #general: hi'
};

describe('PushoverChannel', () => {
    it('posts the form fields once with the bounded timeout', async () => {
        const { transport, calls } = fakeTransport({ status: 200, data: { status: 1 }, raw: '{"status":1}' });
        const channel = new PushoverChannel({ transport });

        const result = await channel.send({
            ...notification,
            url: 'https://discord.com/channels/1/2/3',
            urlTitle: 'Open in Discord',
            sound: 'cosmic'
        });

        expect(result).toEqual({ delivered: true, reason: '' });
        expect(calls).toEqual([{
            url: PUSHOVER_API_URL,
            fields: {
                token: 'test-app',
                user: 'test-user',
                title: 'TalkAlert',
                message: 'Alice @ Guild / #general: hi',
                url: 'https://discord.com/channels/1/2/3',
                url_title: 'Open in Discord',
                sound: 'cosmic'
            },
            opts: { timeout: PUSH_TIMEOUT_MS }
        }]);
    });

    it('leaves out url and sound when not given', async () => {
        const { transport, calls } = fakeTransport({ status: 200, data: { status: 1 }, raw: '' });
        const channel = new PushoverChannel({ transport });

        await channel.send({ ...notification, sound: '' });

        expect(calls[0].fields).toEqual({
            token: 'test-app',
            user: 'test-user',
            title: 'TalkAlert',
            message: 'Alice @ Guild / #general: hi'
        });
    });

    it('does not call out without credentials', async () => {
        const { transport, calls } = fakeTransport({ status: 200, data: { status: 1 }, raw: '' });
        const channel = new PushoverChannel({ transport });

        const result = await channel.send({ ...notification, userKey: ' ' });

        expect(result).toEqual({ delivered: false, reason: 'Pushover app token / user key not configured' });
        expect(calls).toHaveLength(0);
    });

    it('reports API errors joined', async () => {
        const { transport } = fakeTransport({
            status: 200,
            data: { status: 0, errors: ['user identifier is invalid', 'application token is invalid'] },
            raw: '{}'
        });
        const channel = new PushoverChannel({ transport });

        const result = await channel.send(notification);

        expect(result).toEqual({ delivered: false, reason: 'user identifier is invalid; application token is invalid' });
    });

    it('reports a non-200 status with the body', async () => {
        const { transport } = fakeTransport({ status: 429, data: 'slow down', raw: 'slow down' });
        const channel = new PushoverChannel({ transport });

        expect(await channel.send(notification)).toEqual({ delivered: false, reason: 'HTTP 429: slow down' });
    });

    it('treats a 200 without a JSON body as delivered', async () => {
        const { transport } = fakeTransport({ status: 200, data: 'ok', raw: 'ok' });
        const channel = new PushoverChannel({ transport });

        expect(await channel.send(notification)).toEqual({ delivered: true, reason: '' });
    });

    it('turns a transport failure into a reason', async () => {
        const { transport, calls } = fakeTransport(new Error('Request timed out after 10000ms'));
        const channel = new PushoverChannel({ transport });

        const result = await channel.send(notification);

        expect(result).toEqual({ delivered: false, reason: 'Request timed out after 10000ms' });
        expect(calls).toHaveLength(1);
    });

    it('sends a fixed test message', async () => {
        const { transport, calls } = fakeTransport({ status: 200, data: { status: 1 }, raw: '' });
        const channel = new PushoverChannel({ transport });

        await channel.test({ appToken: 'test-app', userKey: 'test-user' });

        expect(calls[0].fields.title).toBe('TalkAlert');
        expect(calls[0].fields.message).toBe('Test notification from TalkAlert (pushover channel)');
    });
});
