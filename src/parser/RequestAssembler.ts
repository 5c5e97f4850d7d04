import { BuiltRequest, HeaderEntry, MultipartPart, RequestBody, RequestLine } from '../models/Request';

function freezeBody(body: RequestBody): RequestBody {
    switch (body.kind) {
        case 'none':
        case 'raw':
            return Object.freeze({ ...body });
        case 'urlencoded':
            return Object.freeze({
                ...body,
                fields: Object.freeze(body.fields.map(f => Object.freeze({ ...f }))),
            });
        case 'multipart':
            return Object.freeze({
                ...body,
                parts: Object.freeze(body.parts.map((p): MultipartPart => Object.freeze({ ...p }))),
            });
    }
}

/**
 * Bind a parsed request to the client that will send it. Every piece is
 * copied and frozen, so built requests never share mutable state with each
 * other or with the parser.
 */
export function assembleRequest<TClient>(
    client: TClient,
    requestLine: RequestLine,
    headers: readonly HeaderEntry[],
    body: RequestBody,
    name?: string
): BuiltRequest<TClient> {
    return Object.freeze({
        client,
        name,
        method: requestLine.method,
        url: requestLine.url.toString(),
        headers: Object.freeze(headers.map(h => Object.freeze({ name: h.name, value: h.value }))),
        body: freezeBody(body),
    });
}
