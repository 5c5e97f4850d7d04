// Request file parser exports
export { parseRequests, parseRequestFile, buildRequest } from './HttpParser';
export type { ParseOptions } from './HttpParser';
export { splitBlocks, looksLikeRequestLine } from './BlockSplitter';
export { parseRequestLine } from './RequestLineParser';
export { parseHeaders, parseHeaderLine } from './HeaderParser';
export type { HeaderSection } from './HeaderParser';
export { resolveBody, parseFormFields, parseMultipart, mediaType, FORM_URLENCODED, MULTIPART_FORM_DATA } from './BodyResolver';
export type { BodyContext } from './BodyResolver';
export { assembleRequest } from './RequestAssembler';

// Errors
export {
    RequestFileError,
    EmptyRequestError,
    NoRequestLineError,
    NotEnoughPartsError,
    InvalidMethodError,
    InvalidUrlError,
    InvalidHeaderError,
    InvalidBodyError,
    BodyFileError,
} from './errors';
export type { RequestFileErrorKind } from './errors';
