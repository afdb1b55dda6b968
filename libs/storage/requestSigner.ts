import crypto from 'crypto';
import { RestoreError } from '../errors/sanitizer.js';

/** File service REST version sent with every read. */
export const FILE_SERVICE_VERSION = '2021-08-06';

/**
 * Placeholders for Content-Encoding, Content-Language, Content-Length, Content-MD5,
 * Content-Type, Date, If-Modified-Since, If-Match, If-None-Match, If-Unmodified-Since
 * and Range. A bodiless GET sends none of them.
 */
const STANDARD_HEADER_COUNT = 11;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export interface SignatureInput {
    readonly method: 'GET';
    /** `/<account>/<share>/<path>` */
    readonly canonicalResource: string;
    /** RFC 1123 UTC timestamp, sent verbatim as `x-ms-date`. */
    readonly dateHeaderValue: string;
    readonly protocolVersion: string;
    /** Base64-encoded storage account key. */
    readonly signingKey: string | undefined;
}

export function buildStringToSign(input: Omit<SignatureInput, 'signingKey'>): string {
    return [
        input.method,
        ...Array<string>(STANDARD_HEADER_COUNT).fill(''),
        `x-ms-date:${input.dateHeaderValue}`,
        `x-ms-version:${input.protocolVersion}`,
        input.canonicalResource
    ].join('\n');
}

function decodeSigningKey(signingKey: string | undefined): Buffer {
    if (signingKey === undefined || signingKey.trim() === '') {
        throw new RestoreError('InvalidCredential', 'Signing key is absent');
    }
    const trimmed = signingKey.trim();
    if (!BASE64_PATTERN.test(trimmed)) {
        throw new RestoreError('InvalidCredential', 'Signing key is not valid base64');
    }
    return Buffer.from(trimmed, 'base64');
}

/**
 * SharedKey signature for one read request: HMAC-SHA256 over the string to sign,
 * keyed with the decoded account key, base64-encoded.
 */
export function signRequest(input: SignatureInput): string {
    const key = decodeSigningKey(input.signingKey);
    return crypto
        .createHmac('sha256', key)
        .update(buildStringToSign(input), 'utf8')
        .digest('base64');
}

export function authorizationHeader(accountIdentifier: string, signature: string): string {
    return `SharedKey ${accountIdentifier}:${signature}`;
}
