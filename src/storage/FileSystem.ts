import * as fs from 'fs';

/**
 * The filesystem access the parser and the response writer need.
 * Injected so tests can run against an in-memory stand-in.
 */
export interface FileSystem {
    readFile(path: string): Buffer;
    writeFile(path: string, data: Buffer): void;
}

export const nodeFileSystem: FileSystem = {
    readFile(path: string): Buffer {
        return fs.readFileSync(path);
    },
    writeFile(path: string, data: Buffer): void {
        fs.writeFileSync(path, data);
    },
};
