export type RequestFileErrorKind =
    | 'EmptyRequest'
    | 'NoRequestLine'
    | 'NotEnoughParts'
    | 'InvalidMethod'
    | 'InvalidUrl'
    | 'InvalidHeader'
    | 'InvalidBody'
    | 'BodyFile';

/**
 * Base class for everything that can go wrong while turning a request file
 * into built requests. Any of these aborts the whole file.
 */
export abstract class RequestFileError extends Error {
    abstract readonly kind: RequestFileErrorKind;

    /** 1-based line in the request file, when the failure can be pinned to one */
    readonly line?: number;

    constructor(message: string, line?: number) {
        super(message);
        this.name = new.target.name;
        this.line = line;
    }
}

export class EmptyRequestError extends RequestFileError {
    readonly kind = 'EmptyRequest';

    constructor() {
        super('Empty request file');
    }
}

export class NoRequestLineError extends RequestFileError {
    readonly kind = 'NoRequestLine';

    constructor(line?: number) {
        super('No request line found', line);
    }
}

export class NotEnoughPartsError extends RequestFileError {
    readonly kind = 'NotEnoughParts';

    constructor(readonly requestLine: string, line?: number) {
        super(`Not enough parts in request line: ${requestLine}`, line);
    }
}

export class InvalidMethodError extends RequestFileError {
    readonly kind = 'InvalidMethod';

    constructor(readonly method: string, line?: number) {
        super(`Invalid method: ${method}`, line);
    }
}

export class InvalidUrlError extends RequestFileError {
    readonly kind = 'InvalidUrl';

    constructor(readonly url: string, readonly reason: string, line?: number) {
        super(`Invalid url '${url}': ${reason}`, line);
    }
}

export class InvalidHeaderError extends RequestFileError {
    readonly kind = 'InvalidHeader';

    constructor(readonly headerLine: string, line?: number) {
        super(`Invalid header: ${headerLine}`, line);
    }
}

export class InvalidBodyError extends RequestFileError {
    readonly kind = 'InvalidBody';

    constructor(readonly reason: string, line?: number) {
        super(`Invalid body: ${reason}`, line);
    }
}

/**
 * A file referenced from a body could not be read.
 */
export class BodyFileError extends RequestFileError {
    readonly kind = 'BodyFile';

    constructor(readonly path: string, readonly reason: string, line?: number) {
        super(`Cannot read body file '${path}': ${reason}`, line);
    }
}
