/**
 * HTTP utilities
 * Uses native Node.js http/https modules; the AI providers only need
 * JSON over POST and a reachability GET.
 */

import * as https from 'https';
import * as http from 'http';

export interface HttpResponse {
    statusCode: number;
    body: string;
    headers: http.IncomingHttpHeaders;
}

export interface HttpRequestOptions {
    headers?: Record<string, string>;
    /** Request timeout in ms (default 30000) */
    timeout?: number;
}

const DEFAULT_TIMEOUT_MS = 30000;
const USER_AGENT = 'tidyfold';

/**
 * Make an HTTP request using native Node.js modules
 *
 * @param method HTTP method
 * @param url The URL to call
 * @param body Optional request body, sent as-is
 */
export function httpRequest(
    method: 'GET' | 'POST',
    url: string,
    body?: string,
    options?: HttpRequestOptions
): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
        const urlObj = new URL(url);
        const isHttps = urlObj.protocol === 'https:';
        const client = isHttps ? https : http;

        const headers: Record<string, string | number> = {
            'User-Agent': USER_AGENT,
            'Accept': 'application/json',
            ...options?.headers,
        };
        if (body !== undefined) {
            headers['Content-Length'] = Buffer.byteLength(body);
        }

        const requestOptions: https.RequestOptions = {
            hostname: urlObj.hostname,
            port: urlObj.port || (isHttps ? 443 : 80),
            path: urlObj.pathname + urlObj.search,
            method,
            headers,
            timeout: options?.timeout || DEFAULT_TIMEOUT_MS,
        };

        const req = client.request(requestOptions, (res) => {
            let responseBody = '';

            res.setEncoding('utf-8');
            res.on('data', (chunk) => {
                responseBody += chunk;
            });

            res.on('end', () => {
                resolve({
                    statusCode: res.statusCode || 0,
                    body: responseBody,
                    headers: res.headers,
                });
            });
        });

        req.on('error', (error) => {
            reject(error);
        });

        req.on('timeout', () => {
            req.destroy();
            reject(new Error('Request timed out'));
        });

        if (body !== undefined) {
            req.write(body);
        }
        req.end();
    });
}

/**
 * Make an HTTP GET request
 */
export function httpGet(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return httpRequest('GET', url, undefined, options);
}

/**
 * POST a JSON payload and parse the JSON reply.
 * Non-2xx replies are rejected with the server's message where it sends one.
 */
export async function httpPostJson(
    url: string,
    payload: unknown,
    options?: HttpRequestOptions
): Promise<unknown> {
    const response = await httpRequest('POST', url, JSON.stringify(payload), {
        ...options,
        headers: {
            'Content-Type': 'application/json',
            ...options?.headers,
        },
    });

    if (response.statusCode >= 200 && response.statusCode < 300) {
        return JSON.parse(response.body);
    }

    throw new Error(`HTTP ${response.statusCode}: ${extractErrorMessage(response.body)}`);
}

/**
 * Pull a readable message out of an error body: `{message}`,
 * `{error: {message}}` or `{error: "..."}`, else the raw text.
 */
function extractErrorMessage(body: string): string {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        return body.substring(0, 200);
    }

    if (isRecord(parsed)) {
        if (typeof parsed.message === 'string') {
            return parsed.message;
        }
        const error = parsed.error;
        if (typeof error === 'string') {
            return error;
        }
        if (isRecord(error) && typeof error.message === 'string') {
            return error.message;
        }
    }
    return body.substring(0, 200);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
