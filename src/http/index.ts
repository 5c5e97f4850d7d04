/**
 * HTTP module exports
 */
export { HttpClient, buildOutgoingHeaders } from './HttpClient';
export type { HttpClientOptions, RequestExecutor } from './HttpClient';
export { SendRequestError, ResponseBodyError, getHeader } from './HttpResponse';
export type { HttpResponse } from './HttpResponse';
export { ResponseDisplay, formatSummary, formatBody, formatSize, contentLengthOf } from './ResponseDisplay';
export type { OutputStream } from './ResponseDisplay';
export { encodeBody, encodeMultipart } from './BodyEncoder';
export type { EncodedBody } from './BodyEncoder';
export { maskAuthHeaders } from './HeaderSanitizer';
