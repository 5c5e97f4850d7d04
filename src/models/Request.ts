export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'CONNECT', 'OPTIONS', 'TRACE', 'PATCH'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export function isHttpMethod(token: string): token is HttpMethod {
    return (HTTP_METHODS as readonly string[]).includes(token);
}

/**
 * Raw text of a request file plus the directory that relative body paths
 * are resolved against.
 */
export interface RequestFile {
    readonly content: string;
    readonly directory: string;
}

export interface BlockLine {
    /** 1-based position within the request file */
    readonly number: number;
    readonly text: string;
}

export interface RequestBlock {
    readonly lines: readonly BlockLine[];
    readonly name?: string;
}

export interface RequestLine {
    readonly method: HttpMethod;
    readonly url: URL;
}

export interface HeaderEntry {
    readonly name: string;
    readonly value: string;
}

export interface FormField {
    readonly key: string;
    readonly value: string;
}

export interface MultipartField {
    readonly kind: 'field';
    readonly name: string;
    readonly value: string;
}

export interface MultipartFile {
    readonly kind: 'file';
    readonly name: string;
    readonly filename: string;
    /** Absolute path the attachment was read from */
    readonly path: string;
    readonly contentType: string;
    readonly data: Buffer;
}

export type MultipartPart = MultipartField | MultipartFile;

export type RequestBody =
    | { readonly kind: 'none' }
    | { readonly kind: 'raw'; readonly data: Buffer; readonly path?: string }
    | { readonly kind: 'urlencoded'; readonly fields: readonly FormField[] }
    | { readonly kind: 'multipart'; readonly boundary: string; readonly parts: readonly MultipartPart[] };

/**
 * A fully assembled request, bound to the client that will send it.
 */
export interface BuiltRequest<TClient = unknown> {
    readonly client: TClient;
    readonly name?: string;
    readonly method: HttpMethod;
    readonly url: string;
    readonly headers: readonly HeaderEntry[];
    readonly body: RequestBody;
}

export function findHeader(headers: readonly HeaderEntry[], name: string): HeaderEntry | undefined {
    const lowerName = name.toLowerCase();
    return headers.find(h => h.name.toLowerCase() === lowerName);
}

export function describeBody(body: RequestBody): string {
    switch (body.kind) {
        case 'none':
            return 'no body';
        case 'raw':
            return body.path
                ? `${body.data.length} bytes from ${body.path}`
                : `${body.data.length} bytes`;
        case 'urlencoded':
            return `form with ${body.fields.length} field(s)`;
        case 'multipart': {
            const files = body.parts.filter(p => p.kind === 'file').length;
            return `multipart form with ${body.parts.length} part(s), ${files} file(s)`;
        }
    }
}
