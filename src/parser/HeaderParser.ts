import { BlockLine, HeaderEntry } from '../models/Request';
import { InvalidHeaderError } from './errors';

// RFC 9110 token
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
// Control characters other than HTAB are not allowed in field values
const FORBIDDEN_VALUE_CHARS = /[\x00-\x08\x0a-\x1f\x7f]/;

export interface HeaderSection {
    headers: HeaderEntry[];
    /** Index of the first line after the header section */
    next: number;
}

/**
 * Parse a single `Name: value` line. The value is trimmed; the name is kept
 * as written and must not have whitespace before the colon.
 */
export function parseHeaderLine(line: BlockLine): HeaderEntry {
    const text = line.text.trim();
    const colonIndex = text.indexOf(':');
    if (colonIndex === -1) {
        throw new InvalidHeaderError(line.text, line.number);
    }

    const name = text.substring(0, colonIndex);
    const value = text.substring(colonIndex + 1).trim();
    if (!HEADER_NAME_PATTERN.test(name) || FORBIDDEN_VALUE_CHARS.test(value)) {
        throw new InvalidHeaderError(line.text, line.number);
    }

    return { name, value };
}

/**
 * Parse header lines starting at `start` up to the first blank line or the
 * end of the block.
 */
export function parseHeaders(lines: readonly BlockLine[], start: number): HeaderSection {
    const headers: HeaderEntry[] = [];
    let index = start;
    while (index < lines.length && lines[index].text.trim() !== '') {
        headers.push(parseHeaderLine(lines[index]));
        index++;
    }
    return { headers, next: index };
}
