import * as mime from 'mime-types';
import { HttpResponse, getHeader } from '../http/HttpResponse';
import { getLogger } from '../logger';
import { errorMessage } from '../utils/errors';
import { FileSystem, nodeFileSystem } from './FileSystem';

// Content types that are never worth a file of their own
const UNSAVED_CONTENT_TYPES = ['application/octet-stream', 'text/plain', 'text/plain; charset=utf-8'];

/**
 * File extension for a response content type, or undefined when the body
 * should not be saved.
 */
export function responseExtension(contentType: string | undefined): string | undefined {
    if (!contentType) {
        return undefined;
    }
    if (UNSAVED_CONTENT_TYPES.includes(contentType.trim().toLowerCase())) {
        return undefined;
    }
    return mime.extension(contentType) || undefined;
}

/**
 * `response-<UTC time to the second>.<ext>`
 */
export function defaultFileName(extension: string, now: Date): string {
    const timestamp = now.toISOString().replace(/\.\d{3}Z$/, 'Z');
    return `response-${timestamp}.${extension}`;
}

export interface ResponseWriterOptions {
    /** Fixed output file; every saved response overwrites it */
    output?: string;
    fs?: FileSystem;
}

/**
 * Saves response bodies to disk.
 */
export class ResponseWriter {
    private readonly output?: string;
    private readonly fs: FileSystem;

    constructor(options: ResponseWriterOptions = {}) {
        this.output = options.output;
        this.fs = options.fs ?? nodeFileSystem;
    }

    /**
     * Write the body if its content type maps to a file extension.
     * A failed write is logged; it never stops the run.
     * @returns The file written, if any
     */
    save(response: HttpResponse, now: Date = new Date()): string | undefined {
        const logger = getLogger();
        const contentType = getHeader(response, 'content-type');
        const extension = responseExtension(contentType);
        if (!extension) {
            logger.debug('Response body not saved', { contentType: contentType ?? 'none' });
            return undefined;
        }

        const fileName = this.output ?? defaultFileName(extension, now);
        try {
            this.fs.writeFile(fileName, response.body);
        } catch (error) {
            logger.error('Failed to write response to file', {
                file: fileName,
                error: errorMessage(error),
            });
            return undefined;
        }
        logger.debug('Response body saved', { file: fileName, contentType, extension });
        return fileName;
    }
}
