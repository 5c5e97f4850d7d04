import { BuiltRequest, RequestBlock, RequestFile } from '../models/Request';
import { FileSystem, nodeFileSystem } from '../storage/FileSystem';
import { resolveBody } from './BodyResolver';
import { splitBlocks } from './BlockSplitter';
import { parseHeaders } from './HeaderParser';
import { assembleRequest } from './RequestAssembler';
import { parseRequestLine } from './RequestLineParser';

export interface ParseOptions {
    /** Filesystem used to read bodies and attachments (default: the real one) */
    fs?: FileSystem;
}

/**
 * Build one request from a block: request line, headers, then body.
 */
export function buildRequest<TClient>(
    block: RequestBlock,
    client: TClient,
    directory: string,
    options: ParseOptions = {}
): BuiltRequest<TClient> {
    const requestLine = parseRequestLine(block.lines[0]);
    const { headers, next } = parseHeaders(block.lines, 1);
    const body = resolveBody(headers, block.lines.slice(next + 1), {
        directory,
        fs: options.fs ?? nodeFileSystem,
    });
    return assembleRequest(client, requestLine, headers, body, block.name);
}

/**
 * Parse a request file into built requests, in file order.
 * The first invalid block aborts the whole parse.
 * @param content The raw content of the request file
 * @param client Client every request is bound to
 * @param directory Base directory for relative body and attachment paths
 */
export function parseRequests<TClient>(
    content: string,
    client: TClient,
    directory: string,
    options: ParseOptions = {}
): BuiltRequest<TClient>[] {
    return splitBlocks(content).map(block => buildRequest(block, client, directory, options));
}

export function parseRequestFile<TClient>(
    file: RequestFile,
    client: TClient,
    options: ParseOptions = {}
): BuiltRequest<TClient>[] {
    return parseRequests(file.content, client, file.directory, options);
}
