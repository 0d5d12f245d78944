/**
 * @fileoverview Redaction helpers for safe logging.
 * @module utils/redact
 * @version 1.0.0
 */

/**
 * Redact common sensitive tokens in a string.
 *
 * Intended for logging only. This does not guarantee complete sanitization for all cases.
 */
export function redactSensitiveTokens(value: string): string {
    return value
        .replace(/Token="[^"]*"/g, 'Token="REDACTED"')
        .replace(/api_key=[^&\s]*/gi, 'api_key=REDACTED')
        .replace(/access_token=[^&\s]*/gi, 'access_token=REDACTED')
        .replace(/\bsecret=[^&\s]*/gi, 'secret=REDACTED')
        .replace(/\btoken=(?!")[^&\s]*/gi, 'token=REDACTED');
}

/**
 * Strip credentials, sensitive query parameters and fragments from a URL.
 */
export function redactUrl(url: string): string {
    try {
        const parsed = new URL(url);
        parsed.username = '';
        parsed.password = '';
        for (const key of ['api_key', 'ApiKey', 'token', 'access_token', 'secret', 'Secret']) {
            if (parsed.searchParams.has(key)) {
                parsed.searchParams.set(key, 'REDACTED');
            }
        }
        if (parsed.hash) {
            parsed.hash = '';
        }
        return parsed.toString();
    } catch {
        return redactSensitiveTokens(url);
    }
}
