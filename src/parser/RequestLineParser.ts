import { BlockLine, RequestLine, isHttpMethod } from '../models/Request';
import { errorMessage } from '../utils/errors';
import { InvalidMethodError, InvalidUrlError, NoRequestLineError, NotEnoughPartsError } from './errors';

/**
 * Parse `METHOD URL [HTTP-VERSION]`. Anything after the URL is ignored.
 */
export function parseRequestLine(line: BlockLine | undefined): RequestLine {
    if (!line) {
        throw new NoRequestLineError();
    }

    const text = line.text.trim();
    const parts = text.split(/\s+/);
    if (parts.length < 2) {
        throw new NotEnoughPartsError(text, line.number);
    }

    const [method, rawUrl] = parts;
    if (!isHttpMethod(method)) {
        throw new InvalidMethodError(method, line.number);
    }

    return { method, url: parseAbsoluteUrl(rawUrl, line.number) };
}

function parseAbsoluteUrl(rawUrl: string, lineNumber: number): URL {
    let url: URL;
    try {
        url = new URL(rawUrl);
    } catch (error) {
        throw new InvalidUrlError(rawUrl, errorMessage(error), lineNumber);
    }
    if (!url.hostname) {
        throw new InvalidUrlError(rawUrl, 'missing host', lineNumber);
    }
    return url;
}
