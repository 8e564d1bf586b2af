/**
 * Lightweight HTTPS helper using Node's built-in https module.
 *
 * Form-encoded POST with a timeout that bounds the whole request, not just
 * socket idle.
 */

import https from 'https';
import { URL, URLSearchParams } from 'url';

export interface HttpOptions {
    timeout?: number;
}

export interface HttpResponse {
    status: number | undefined;
    /** Parsed JSON, or the raw text when the body is not JSON. */
    data: unknown;
    raw: string;
}

export type FormFields = Record<string, string>;

export type FormPoster = (url: string, fields: FormFields, opts?: HttpOptions) => Promise<HttpResponse>;

const DEFAULT_TIMEOUT = 10000;

/**
 * POST application/x-www-form-urlencoded fields and read the reply.
 */
export const postForm: FormPoster = (url, fields, opts = {}) => {
    return new Promise((resolve, reject) => {
        const parsed = new URL(url);
        const payload = new URLSearchParams(fields).toString();
        const timeout = opts.timeout || DEFAULT_TIMEOUT;

        const options: https.RequestOptions = {
            hostname: parsed.hostname,
            port: parsed.port || 443,
            path: parsed.pathname + parsed.search,
            method: 'POST',
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                'Content-Length': Buffer.byteLength(payload)
            },
            timeout,
        };

        const req = https.request(options, (res) => {
            let data = '';
            res.setEncoding('utf8');
            res.on('data', (chunk: string) => { data += chunk; });
            res.on('end', () => {
                clearTimeout(deadline);
                let parsedData: unknown;
                try {
                    parsedData = JSON.parse(data);
                } catch {
                    parsedData = data;
                }
                resolve({ status: res.statusCode, data: parsedData, raw: data });
            });
            res.on('error', (error) => {
                clearTimeout(deadline);
                reject(error);
            });
        });

        const deadline = setTimeout(() => {
            req.destroy(new Error(`Request timed out after ${timeout}ms`));
        }, timeout);
        deadline.unref();

        req.on('error', (error) => {
            clearTimeout(deadline);
            reject(error);
        });
        req.on('timeout', () => {
            req.destroy(new Error('Request timed out'));
        });

        req.write(payload);
        req.end();
    });
};
