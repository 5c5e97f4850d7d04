import { BlockLine, RequestBlock, isHttpMethod } from '../models/Request';
import { EmptyRequestError } from './errors';

const SEPARATOR_PREFIX = '###';
const NAME_DIRECTIVE = /^(?:#|\/\/)\s*@name\s+(\S+)/;
const COMMENT_PATTERN = /^(?:#|\/\/)/;
const METHOD_LIKE_WORD = /^[A-Za-z-]+$/;

function isComment(trimmedLine: string): boolean {
    return COMMENT_PATTERN.test(trimmedLine) && !trimmedLine.startsWith(SEPARATOR_PREFIX);
}

/**
 * Whether a line would open a new request: a known method, a method-like word
 * in any case followed by something URL-shaped, or a lone URL. The last two
 * start a block so a bad method or a missing one still gets reported.
 */
export function looksLikeRequestLine(line: string): boolean {
    const tokens = line.trim().split(/\s+/);
    const [first, second] = tokens;
    if (!first) {
        return false;
    }
    if (isHttpMethod(first)) {
        return true;
    }
    if (tokens.length === 1) {
        return first.includes('://');
    }
    return METHOD_LIKE_WORD.test(first) && second.includes('://');
}

/**
 * After a blank line inside a body, decide whether the upcoming lines
 * (skipping comments) open the next request.
 */
function startsNextRequest(lines: string[], index: number): boolean {
    for (let i = index; i < lines.length; i++) {
        const trimmed = lines[i].trim();
        if (trimmed === '' || isComment(trimmed)) {
            continue;
        }
        return !trimmed.startsWith(SEPARATOR_PREFIX) && looksLikeRequestLine(trimmed);
    }
    return false;
}

/**
 * Split request file text into one block per request, in file order.
 * Blocks are separated by `###` lines, or by blank lines followed by a new
 * request line. Comments before a request line are dropped, and so are
 * comments among its headers; body lines are kept verbatim.
 */
export function splitBlocks(content: string): RequestBlock[] {
    const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
    const blocks: RequestBlock[] = [];

    let current: BlockLine[] | null = null;
    let currentName: string | undefined;
    let pendingName: string | undefined;
    let inBody = false;

    const finalizeBlock = () => {
        if (current) {
            while (current.length > 0 && current[current.length - 1].text.trim() === '') {
                current.pop();
            }
            if (current.length > 0) {
                blocks.push({ lines: current, name: currentName });
            }
        }
        current = null;
        currentName = undefined;
        inBody = false;
    };

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        const trimmedLine = line.trim();
        const lineNumber = i + 1;

        if (trimmedLine.startsWith(SEPARATOR_PREFIX)) {
            finalizeBlock();
            const separatorName = trimmedLine.substring(SEPARATOR_PREFIX.length).trim();
            if (separatorName) {
                pendingName = separatorName;
            }
            continue;
        }

        if (current && inBody && trimmedLine !== '') {
            const previous = current[current.length - 1];
            if (previous.text.trim() === '' && startsNextRequest(lines, i)) {
                finalizeBlock();
            }
        }

        if (!current) {
            if (trimmedLine === '') {
                continue;
            }
            const nameMatch = trimmedLine.match(NAME_DIRECTIVE);
            if (nameMatch) {
                pendingName = nameMatch[1];
                continue;
            }
            if (isComment(trimmedLine)) {
                continue;
            }
            current = [{ number: lineNumber, text: line }];
            currentName = pendingName;
            pendingName = undefined;
            continue;
        }

        if (inBody) {
            current.push({ number: lineNumber, text: line });
            continue;
        }

        // Header section
        if (trimmedLine === '') {
            current.push({ number: lineNumber, text: '' });
            inBody = true;
            continue;
        }
        if (isComment(trimmedLine)) {
            continue;
        }
        current.push({ number: lineNumber, text: line });
    }

    finalizeBlock();

    if (blocks.length === 0) {
        throw new EmptyRequestError();
    }
    return blocks;
}
