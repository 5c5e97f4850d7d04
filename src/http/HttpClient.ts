import * as http from 'http';
import * as https from 'https';
import * as zlib from 'zlib';
import { URL } from 'url';
import { BuiltRequest, HeaderEntry } from '../models/Request';
import { getLogger } from '../logger';
import { errorMessage } from '../utils/errors';
import { ReqfileSettings, getSettings } from '../settings';
import { EncodedBody, encodeBody } from './BodyEncoder';
import { HttpResponse, ResponseBodyError, SendRequestError } from './HttpResponse';

export interface HttpClientOptions {
    timeout?: number;
    followRedirects?: boolean;
    maxRedirects?: number;
    rejectUnauthorized?: boolean;
}

/**
 * Anything that can send a built request. The runner only needs this much.
 */
export interface RequestExecutor {
    execute(request: BuiltRequest<unknown>): Promise<HttpResponse>;
}

type Sendable = Pick<BuiltRequest<unknown>, 'method' | 'url' | 'headers' | 'body'>;

const REDIRECT_STATUSES = [301, 302, 303, 307, 308];

function pickClientOptions(settings: ReqfileSettings): Required<HttpClientOptions> {
    return {
        timeout: settings.timeout,
        followRedirects: settings.followRedirects,
        maxRedirects: settings.maxRedirects,
        rejectUnauthorized: settings.rejectUnauthorized,
    };
}

/**
 * Build the outgoing header map. Repeated names are sent as repeated header
 * lines under the spelling of their first occurrence.
 */
export function buildOutgoingHeaders(headers: readonly HeaderEntry[], encoded: EncodedBody): http.OutgoingHttpHeaders {
    const grouped = new Map<string, { name: string; values: string[] }>();
    for (const header of headers) {
        const key = header.name.toLowerCase();
        if (encoded.contentType && key === 'content-type') {
            continue;
        }
        const existing = grouped.get(key);
        if (existing) {
            existing.values.push(header.value);
        } else {
            grouped.set(key, { name: header.name, values: [header.value] });
        }
    }

    const result: http.OutgoingHttpHeaders = {};
    for (const { name, values } of grouped.values()) {
        result[name] = values.length === 1 ? values[0] : values;
    }

    if (encoded.contentType) {
        result['Content-Type'] = encoded.contentType;
    }
    // Add Accept-Encoding for compression support if not set
    if (!grouped.has('accept-encoding')) {
        result['Accept-Encoding'] = 'gzip, deflate';
    }
    if (encoded.payload && !grouped.has('content-length')) {
        result['Content-Length'] = encoded.payload.length.toString();
    }
    return result;
}

interface RawExchange {
    res: http.IncomingMessage;
    raw: Buffer;
}

/**
 * HTTP Client using Node.js native http/https modules. Configured once and
 * shared by every request parsed from a file.
 */
export class HttpClient implements RequestExecutor {
    private options: Required<HttpClientOptions>;

    constructor(options: HttpClientOptions = {}, settings: ReqfileSettings = getSettings()) {
        this.options = { ...pickClientOptions(settings), ...options };
    }

    /**
     * Execute a built request and return the response
     */
    async execute(request: BuiltRequest<unknown>): Promise<HttpResponse> {
        return this.executeWithRedirects(request, 0, performance.now());
    }

    private async executeWithRedirects(request: Sendable, redirectCount: number, startTime: number): Promise<HttpResponse> {
        const logger = getLogger();
        const url = new URL(request.url);

        logger.debug('Executing HTTP request', { method: request.method, url: request.url });

        const encoded = encodeBody(request.body);
        const headers = buildOutgoingHeaders(request.headers, encoded);
        const { res, raw } = await this.send(url, request.method, headers, encoded.payload);

        if (this.options.followRedirects &&
            res.statusCode &&
            REDIRECT_STATUSES.includes(res.statusCode) &&
            res.headers.location) {

            if (redirectCount >= this.options.maxRedirects) {
                logger.error('Maximum redirects exceeded', { maxRedirects: this.options.maxRedirects });
                throw new SendRequestError(new Error(`Maximum redirects (${this.options.maxRedirects}) exceeded`));
            }

            const redirectUrl = new URL(res.headers.location, url);
            logger.debug('Following redirect', {
                statusCode: res.statusCode,
                location: redirectUrl.toString(),
                redirectCount: redirectCount + 1,
            });

            // For 303, change method to GET and drop the body
            const redirectRequest: Sendable = res.statusCode === 303
                ? { ...request, url: redirectUrl.toString(), method: 'GET', body: { kind: 'none' } }
                : { ...request, url: redirectUrl.toString() };
            return this.executeWithRedirects(redirectRequest, redirectCount + 1, startTime);
        }

        const body = await this.decompress(raw, res.headers['content-encoding']);
        const time = performance.now() - startTime;

        const responseHeaders: Record<string, string> = {};
        for (const [key, value] of Object.entries(res.headers)) {
            if (value !== undefined) {
                responseHeaders[key] = Array.isArray(value) ? value.join(', ') : value;
            }
        }
        const contentLengthHeader = res.headers['content-length'];
        const contentLength = contentLengthHeader !== undefined ? parseInt(contentLengthHeader, 10) : NaN;

        const response: HttpResponse = {
            status: res.statusCode || 0,
            statusText: res.statusMessage || '',
            headers: responseHeaders,
            body,
            time,
            size: raw.length,
            contentLength: Number.isNaN(contentLength) ? undefined : contentLength,
        };

        logger.debug('HTTP request completed', {
            status: response.status,
            time: `${Math.round(time)}ms`,
            size: `${raw.length} bytes`,
        });
        return response;
    }

    private send(
        url: URL,
        method: string,
        headers: http.OutgoingHttpHeaders,
        payload: Buffer | undefined
    ): Promise<RawExchange> {
        const logger = getLogger();
        const isHttps = url.protocol === 'https:';
        const requestOptions: https.RequestOptions = {
            hostname: url.hostname,
            port: url.port || (isHttps ? 443 : 80),
            path: url.pathname + url.search,
            method,
            headers,
            timeout: this.options.timeout,
        };
        if (isHttps) {
            requestOptions.rejectUnauthorized = this.options.rejectUnauthorized;
        }

        return new Promise((resolve, reject) => {
            const onResponse = (res: http.IncomingMessage) => {
                const chunks: Buffer[] = [];
                res.on('data', (chunk: Buffer) => {
                    chunks.push(chunk);
                });
                res.on('end', () => {
                    resolve({ res, raw: Buffer.concat(chunks) });
                });
                res.on('error', (error) => {
                    logger.error('Response error', { error: error.message });
                    reject(new ResponseBodyError(error));
                });
            };

            const req = isHttps
                ? https.request(requestOptions, onResponse)
                : http.request(requestOptions, onResponse);

            req.on('error', (error) => {
                logger.error('Request error', { error: error.message });
                reject(new SendRequestError(error));
            });

            req.on('timeout', () => {
                logger.error('Request timeout', { timeout: this.options.timeout });
                req.destroy();
                reject(new SendRequestError(new Error(`Request timed out after ${this.options.timeout}ms`)));
            });

            if (payload) {
                req.write(payload);
            }
            req.end();
        });
    }

    private async decompress(raw: Buffer, contentEncoding: string | undefined): Promise<Buffer> {
        try {
            if (contentEncoding === 'gzip') {
                return await this.decompressGzip(raw);
            }
            if (contentEncoding === 'deflate') {
                return await this.decompressDeflate(raw);
            }
        } catch (error) {
            // Undecodable payloads are reported as received
            getLogger().warn('Failed to decompress response body', {
                encoding: contentEncoding,
                error: errorMessage(error),
            });
        }
        return raw;
    }

    private decompressGzip(buffer: Buffer): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            zlib.gunzip(buffer, (err, result) => {
                if (err) {
                    reject(err);
                } else {
                    resolve(result);
                }
            });
        });
    }

    private decompressDeflate(buffer: Buffer): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            zlib.inflate(buffer, (err, result) => {
                if (err) {
                    // Try raw deflate if regular deflate fails
                    zlib.inflateRaw(buffer, (err2, result2) => {
                        if (err2) {
                            reject(err);
                        } else {
                            resolve(result2);
                        }
                    });
                } else {
                    resolve(result);
                }
            });
        });
    }

    /**
     * Get current options
     */
    getOptions(): Required<HttpClientOptions> {
        return { ...this.options };
    }
}
