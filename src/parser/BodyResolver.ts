import * as path from 'path';
import * as mime from 'mime-types';
import { BlockLine, FormField, HeaderEntry, MultipartPart, RequestBody, findHeader } from '../models/Request';
import { FileSystem } from '../storage/FileSystem';
import { errorMessage } from '../utils/errors';
import { BodyFileError, InvalidBodyError } from './errors';
import { parseHeaderLine } from './HeaderParser';

export const FORM_URLENCODED = 'application/x-www-form-urlencoded';
export const MULTIPART_FORM_DATA = 'multipart/form-data';
const DEFAULT_ATTACHMENT_TYPE = 'application/octet-stream';

const FILE_REFERENCE = /^<\s+(\S.*)$/;
const BOUNDARY_PARAM = /;\s*boundary=(?:"([^"]+)"|([^;\s]+))/i;

export interface BodyContext {
    directory: string;
    fs: FileSystem;
}

/**
 * Media type of the first Content-Type header, lower-cased and without
 * parameters.
 */
export function mediaType(headers: readonly HeaderEntry[]): string | undefined {
    const header = findHeader(headers, 'content-type');
    if (!header) {
        return undefined;
    }
    return header.value.split(';')[0].trim().toLowerCase();
}

function isBlank(line: BlockLine): boolean {
    return line.text.trim() === '';
}

function trimTrailingBlankLines(lines: readonly BlockLine[]): readonly BlockLine[] {
    let end = lines.length;
    while (end > 0 && isBlank(lines[end - 1])) {
        end--;
    }
    return lines.slice(0, end);
}

function trimBlankLines(lines: readonly BlockLine[]): readonly BlockLine[] {
    const start = lines.findIndex(l => !isBlank(l));
    return start === -1 ? [] : trimTrailingBlankLines(lines.slice(start));
}

function fileReference(lines: readonly BlockLine[]): string | undefined {
    if (lines.length !== 1) {
        return undefined;
    }
    const match = lines[0].text.trim().match(FILE_REFERENCE);
    return match ? match[1].trim() : undefined;
}

function readBodyFile(reference: string, line: BlockLine, context: BodyContext): { path: string; data: Buffer } {
    const absolutePath = path.resolve(context.directory, reference);
    try {
        return { path: absolutePath, data: context.fs.readFile(absolutePath) };
    } catch (error) {
        throw new BodyFileError(absolutePath, errorMessage(error), line.number);
    }
}

function parseRawBody(lines: readonly BlockLine[], context: BodyContext): RequestBody {
    const reference = fileReference(lines);
    if (reference !== undefined) {
        const file = readBodyFile(reference, lines[0], context);
        return { kind: 'raw', data: file.data, path: file.path };
    }
    return { kind: 'raw', data: Buffer.from(lines.map(l => l.text).join('\n'), 'utf8') };
}

/**
 * `key=value` pairs, one per line and/or separated by `&`. Values are kept
 * exactly as written; encoding happens when the request is sent.
 */
export function parseFormFields(lines: readonly BlockLine[]): FormField[] {
    const fields: FormField[] = [];
    for (const line of lines) {
        for (const segment of line.text.split('&')) {
            const trimmed = segment.trim();
            if (!trimmed) {
                continue;
            }
            const equalsIndex = trimmed.indexOf('=');
            if (equalsIndex === -1) {
                fields.push({ key: trimmed, value: '' });
            } else {
                fields.push({
                    key: trimmed.substring(0, equalsIndex).trim(),
                    value: trimmed.substring(equalsIndex + 1).trim(),
                });
            }
        }
    }
    return fields;
}

function dispositionParam(disposition: string, param: string): string | undefined {
    const pattern = new RegExp(`(?:^|;)\\s*${param}=(?:"([^"]*)"|([^;\\s]*))`, 'i');
    const match = disposition.match(pattern);
    if (!match) {
        return undefined;
    }
    return match[1] ?? match[2];
}

function parsePart(lines: readonly BlockLine[], marker: BlockLine, context: BodyContext): MultipartPart {
    const headers: HeaderEntry[] = [];
    let index = 0;
    while (index < lines.length && !isBlank(lines[index])) {
        headers.push(parseHeaderLine(lines[index]));
        index++;
    }
    const content = trimTrailingBlankLines(lines.slice(index + 1));

    const disposition = findHeader(headers, 'content-disposition');
    if (!disposition) {
        throw new InvalidBodyError('multipart part without a Content-Disposition header', marker.number);
    }
    const name = dispositionParam(disposition.value, 'name');
    if (!name) {
        throw new InvalidBodyError('multipart part without a name', marker.number);
    }

    const reference = fileReference(content);
    if (reference === undefined) {
        return { kind: 'field', name, value: content.map(l => l.text).join('\n') };
    }

    const file = readBodyFile(reference, content[0], context);
    const partType = findHeader(headers, 'content-type');
    return {
        kind: 'file',
        name,
        filename: dispositionParam(disposition.value, 'filename') ?? path.basename(file.path),
        path: file.path,
        contentType: partType ? partType.value : mime.lookup(file.path) || DEFAULT_ATTACHMENT_TYPE,
        data: file.data,
    };
}

/**
 * Parts are introduced by `--boundary` and the form is closed by
 * `--boundary--`. Without a `boundary` parameter on the Content-Type header
 * the boundary is taken from the first line of the body. Expects `lines`
 * to be non-empty with no leading blank line.
 */
export function parseMultipart(lines: readonly BlockLine[], contentType: string, context: BodyContext): RequestBody {
    const first = lines[0];

    const param = contentType.match(BOUNDARY_PARAM);
    let boundary = param ? (param[1] ?? param[2]) : undefined;
    if (boundary === undefined) {
        const firstText = first.text.trim();
        if (!firstText.startsWith('--') || firstText.length <= 2) {
            throw new InvalidBodyError('multipart body must start with a boundary line', first.number);
        }
        boundary = firstText.substring(2);
    }

    const delimiter = `--${boundary}`;
    const terminator = `${delimiter}--`;
    if (first.text.trim() !== delimiter) {
        throw new InvalidBodyError(`expected boundary line '${delimiter}'`, first.number);
    }

    const parts: MultipartPart[] = [];
    let marker = first;
    let partLines: BlockLine[] = [];
    for (let i = 1; i < lines.length; i++) {
        const text = lines[i].text.trim();
        if (text === delimiter || text === terminator) {
            parts.push(parsePart(partLines, marker, context));
            if (text === terminator) {
                break;
            }
            marker = lines[i];
            partLines = [];
            continue;
        }
        partLines.push(lines[i]);
        if (i === lines.length - 1) {
            // Unterminated form: the block end closes the last part
            parts.push(parsePart(partLines, marker, context));
        }
    }

    if (parts.length === 0) {
        throw new InvalidBodyError('multipart body has no parts', first.number);
    }
    return { kind: 'multipart', boundary, parts };
}

/**
 * Materialize the body region of a block. The kind is chosen by the
 * Content-Type header; referenced files are read right away so a missing
 * file fails the parse before anything is sent.
 */
export function resolveBody(
    headers: readonly HeaderEntry[],
    bodyLines: readonly BlockLine[],
    context: BodyContext
): RequestBody {
    const lines = trimBlankLines(bodyLines);
    if (lines.length === 0) {
        return { kind: 'none' };
    }

    switch (mediaType(headers)) {
        case FORM_URLENCODED:
            return { kind: 'urlencoded', fields: parseFormFields(lines) };
        case MULTIPART_FORM_DATA: {
            const contentType = findHeader(headers, 'content-type');
            return parseMultipart(lines, contentType ? contentType.value : MULTIPART_FORM_DATA, context);
        }
        default:
            return parseRawBody(lines, context);
    }
}
