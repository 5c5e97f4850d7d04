import { errorMessage } from '../utils/errors';

/**
 * HTTP Response interface
 */
export interface HttpResponse {
    status: number;
    statusText: string;
    headers: Record<string, string>;
    body: Buffer;
    time: number;  // milliseconds, fractional
    size: number;  // bytes on the wire
    /** Value of the Content-Length header, when the server sent one */
    contentLength?: number;
}

export class SendRequestError extends Error {
    constructor(cause: unknown) {
        super(`Error sending request: ${errorMessage(cause)}`, { cause });
        this.name = 'SendRequestError';
    }
}

export class ResponseBodyError extends Error {
    constructor(cause: unknown) {
        super(`Error reading response: ${errorMessage(cause)}`, { cause });
        this.name = 'ResponseBodyError';
    }
}

export function getHeader(response: HttpResponse, name: string): string | undefined {
    const lowerName = name.toLowerCase();
    for (const [key, value] of Object.entries(response.headers)) {
        if (key.toLowerCase() === lowerName) {
            return value;
        }
    }
    return undefined;
}
