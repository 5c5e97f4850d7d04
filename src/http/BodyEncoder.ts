import { MultipartPart, RequestBody } from '../models/Request';

export interface EncodedBody {
    payload?: Buffer;
    /** Content-Type that must replace whatever the request declared */
    contentType?: string;
}

const CRLF = '\r\n';

// Field names and filenames are escaped the way browsers do for form-data
function escapeQuoted(value: string): string {
    return value.replace(/"/g, '%22').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function encodePart(part: MultipartPart, boundary: string): Buffer[] {
    const lines = [`--${boundary}`];
    if (part.kind === 'file') {
        lines.push(`Content-Disposition: form-data; name="${escapeQuoted(part.name)}"; filename="${escapeQuoted(part.filename)}"`);
        lines.push(`Content-Type: ${part.contentType}`);
    } else {
        lines.push(`Content-Disposition: form-data; name="${escapeQuoted(part.name)}"`);
    }
    const head = Buffer.from(lines.join(CRLF) + CRLF + CRLF, 'utf8');
    const content = part.kind === 'file' ? part.data : Buffer.from(part.value, 'utf8');
    return [head, content, Buffer.from(CRLF)];
}

export function encodeMultipart(parts: readonly MultipartPart[], boundary: string): Buffer {
    const chunks = parts.flatMap(part => encodePart(part, boundary));
    chunks.push(Buffer.from(`--${boundary}--${CRLF}`));
    return Buffer.concat(chunks);
}

/**
 * Turn a parsed body into the bytes that go on the wire. Form fields are
 * percent-encoded here, not when the file is parsed.
 */
export function encodeBody(body: RequestBody): EncodedBody {
    switch (body.kind) {
        case 'none':
            return {};
        case 'raw':
            return { payload: body.data };
        case 'urlencoded': {
            const params = new URLSearchParams(body.fields.map<[string, string]>(f => [f.key, f.value]));
            return { payload: Buffer.from(params.toString(), 'utf8') };
        }
        case 'multipart':
            return {
                payload: encodeMultipart(body.parts, body.boundary),
                contentType: `multipart/form-data; boundary=${body.boundary}`,
            };
    }
}
