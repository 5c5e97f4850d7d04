import * as path from 'path';
import { FileSystem } from '../storage/FileSystem';
import { HttpResponse } from '../http/HttpResponse';
import { LogSink } from '../logger';

export const BASE_DIR = path.resolve('/requests');

/**
 * In-memory stand-in for the filesystem. Keys are absolute paths.
 */
export class MemoryFileSystem implements FileSystem {
    readonly files = new Map<string, Buffer>();
    readonly reads: string[] = [];

    constructor(files: Record<string, string | Buffer> = {}) {
        for (const [file, content] of Object.entries(files)) {
            this.files.set(file, typeof content === 'string' ? Buffer.from(content, 'utf8') : content);
        }
    }

    readFile(file: string): Buffer {
        this.reads.push(file);
        const data = this.files.get(file);
        if (!data) {
            throw new Error(`ENOENT: no such file or directory, open '${file}'`);
        }
        return data;
    }

    writeFile(file: string, data: Buffer): void {
        this.files.set(file, data);
    }
}

/**
 * Collects whatever is written to it, for logger and display assertions.
 */
export class MemorySink implements LogSink {
    readonly chunks: string[] = [];

    write(chunk: string): boolean {
        this.chunks.push(chunk);
        return true;
    }

    get text(): string {
        return this.chunks.join('');
    }

    get lines(): string[] {
        return this.text.split('\n').filter(line => line !== '');
    }
}

export function makeResponse(overrides: Partial<HttpResponse> = {}): HttpResponse {
    return {
        status: 200,
        statusText: 'OK',
        headers: { 'content-type': 'application/json' },
        body: Buffer.from('{"ok":true}'),
        time: 12.25,
        size: 11,
        ...overrides,
    };
}
