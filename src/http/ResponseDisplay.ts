import { BuiltRequest, describeBody } from '../models/Request';
import { maskAuthHeaders } from './HeaderSanitizer';
import { HttpResponse, getHeader } from './HttpResponse';

export interface OutputStream {
    write(chunk: string): unknown;
}

const RULE = '-'.repeat(80);

/**
 * Format byte size for display
 */
export function formatSize(bytes: number): string {
    if (bytes < 1024) {
        return `${bytes} B`;
    } else if (bytes < 1024 * 1024) {
        return `${(bytes / 1024).toFixed(2)} KB`;
    } else {
        return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
    }
}

/**
 * Content length as advertised by the server, or the body size when it
 * did not send one.
 */
export function contentLengthOf(response: HttpResponse): number {
    return response.contentLength ?? response.body.length;
}

/**
 * One-line summary printed after every request.
 */
export function formatSummary(response: HttpResponse): string {
    const status = `${response.status} ${response.statusText}`.trim();
    const length = contentLengthOf(response);
    return `Response code: ${status}; ` +
        `Time: ${Math.round(response.time)}ms (${response.time.toFixed(3)}ms); ` +
        `Content length: ${length} bytes (${(length / 1_000_000).toFixed(2)} MB)`;
}

function isJson(contentType: string): boolean {
    const type = contentType.toLowerCase().split(';')[0].trim();
    return type === 'application/json' || type === 'text/json' || type.endsWith('+json');
}

/**
 * Format the response body for display
 */
export function formatBody(body: Buffer, contentType: string | undefined): string {
    const text = body.toString('utf8');
    if (contentType && isJson(contentType)) {
        try {
            return JSON.stringify(JSON.parse(text), null, 2);
        } catch {
            // Return as-is if not valid JSON
            return text;
        }
    }
    return text;
}

/**
 * Writes requests and responses to the terminal.
 */
export class ResponseDisplay {
    constructor(private readonly out: OutputStream = process.stdout) { }

    private print(line = ''): void {
        this.out.write(line + '\n');
    }

    /**
     * Verbose preview of a request before it is sent. Credentials are masked.
     */
    showRequest(request: BuiltRequest<unknown>): void {
        this.print();
        if (request.name) {
            this.print(`### ${request.name}`);
        }
        this.print(`${request.method} ${request.url}`);
        for (const header of maskAuthHeaders(request.headers)) {
            this.print(`${header.name}: ${header.value}`);
        }
        this.print(`Body: ${describeBody(request.body)}`);
        this.print(RULE);
    }

    showResponse(response: HttpResponse, verbose: boolean): void {
        if (verbose) {
            this.showDetails(response);
        }
        this.print();
        this.print(formatSummary(response));
    }

    private showDetails(response: HttpResponse): void {
        for (const [name, value] of Object.entries(response.headers)) {
            this.print(`${name}: ${value}`);
        }
        this.print(`Size: ${formatSize(response.size)}`);

        const contentType = getHeader(response, 'content-type');
        if (contentType) {
            if (!contentType.toLowerCase().startsWith('image/')) {
                this.print(formatBody(response.body, contentType));
            }
            this.print(`Content type: ${contentType}`);
        }
    }
}
