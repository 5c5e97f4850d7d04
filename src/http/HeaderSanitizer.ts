import { HeaderEntry } from '../models/Request';

// Headers that contain authentication credentials or session data
const SENSITIVE_REQUEST_HEADERS = [
    'authorization', 'cookie', 'proxy-authorization'
];

// Patterns to match in header names (case-insensitive substring match)
// Catches headers like X-Api-Key, X-Config-Key, X-Auth-Token, etc.
const SENSITIVE_HEADER_PATTERNS = [
    'key', 'token', 'secret', 'auth', 'credential', 'password', 'bearer', 'jwt'
];

// Never masked even if they match a pattern above
const SAFE_HEADERS = [
    'set-cookie', 'etag', 'cache-control', 'content-type'
];

const MASK = '***';

function isSensitiveHeaderName(headerName: string): boolean {
    const lowerName = headerName.toLowerCase();
    if (SAFE_HEADERS.includes(lowerName)) {
        return false;
    }
    return SENSITIVE_REQUEST_HEADERS.includes(lowerName) ||
        SENSITIVE_HEADER_PATTERNS.some(pattern => lowerName.includes(pattern));
}

/**
 * Masks values of credential-bearing request headers before they are printed.
 * Matches exact header names (Authorization, Cookie) and pattern-based names
 * (anything with key, token, secret, auth, etc.).
 */
export function maskAuthHeaders(headers: readonly HeaderEntry[]): HeaderEntry[] {
    return headers.map(header => {
        if (isSensitiveHeaderName(header.name)) {
            return { name: header.name, value: MASK };
        }
        return header;
    });
}
