/**
 * Pattern Matcher - decides whether a request is exempt from CSRF verification
 *
 * Rules are compiled once when configuration loads:
 *   - literal paths           `api/ping`
 *   - wildcard paths          `stripe/*`  (`*` matches any run of characters)
 *   - full URIs               `https://hooks.example.com/inbound/*`
 * Path rules are compared with the normalized request path, URI rules with the
 * normalized request URI. Matching is case-sensitive.
 */

import { ExclusionRule, MatchTarget } from '../types/csrf';
import { CsrfConfigError } from './errors';

const URI_RULE = /^[a-z][a-z0-9+.-]*:\/\//i;
const FORBIDDEN_CHARS = /[\s\u0000-\u001f\u007f?#]/;

/**
 * Decode, collapse duplicate slashes and strip the leading slash.
 * The root path normalizes to `/`. Trailing slashes are kept.
 */
export function normalizePath(raw: string): string {
    let decoded: string;
    try {
        decoded = decodeURIComponent(raw);
    } catch {
        decoded = raw;
    }

    const collapsed = decoded.replace(/\/{2,}/g, '/').replace(/^\//, '');
    return collapsed === '' ? '/' : collapsed;
}

/**
 * Reduce an absolute URI to `scheme://host[/path]`, without query or fragment.
 * Returns null when the input is not an absolute URI.
 */
export function normalizeUri(raw: string): string | null {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        return null;
    }

    const path = normalizePath(url.pathname);
    const origin = `${url.protocol}//${url.host}`;
    return path === '/' ? origin : `${origin}/${path}`;
}

function toRegex(pattern: string): RegExp {
    const source = pattern
        .split('*')
        .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    return new RegExp(`^${source}$`);
}

function compileRule(pattern: string): ExclusionRule {
    if (pattern.trim() === '') {
        throw new CsrfConfigError('ExclusionConfigInvalid', 'Exclusion pattern must not be empty');
    }
    if (FORBIDDEN_CHARS.test(pattern)) {
        throw new CsrfConfigError(
            'ExclusionConfigInvalid',
            `Exclusion pattern "${pattern}" contains whitespace, control characters, "?" or "#"`
        );
    }

    if (URI_RULE.test(pattern)) {
        let host: string;
        try {
            host = new URL(pattern.replace(/\*/g, 'x')).host;
        } catch {
            host = '';
        }
        if (!host) {
            throw new CsrfConfigError('ExclusionConfigInvalid', `Exclusion URI "${pattern}" has no valid host`);
        }

        // `https://example.com/` and `https://example.com` name the same root
        const trimmed = pattern.replace(/^([a-z][a-z0-9+.-]*:\/\/[^/]+)\/$/i, '$1');
        const wildcard = trimmed.includes('*');
        return {
            pattern: trimmed,
            scope: 'uri',
            kind: wildcard ? 'wildcard' : 'literal',
            regex: wildcard ? toRegex(trimmed) : null,
        };
    }

    const path = pattern === '/' ? '/' : pattern.replace(/^\/+/, '');
    if (path === '') {
        throw new CsrfConfigError('ExclusionConfigInvalid', `Exclusion pattern "${pattern}" reduces to nothing`);
    }

    const wildcard = path.includes('*');
    return {
        pattern: path,
        scope: 'path',
        kind: wildcard ? 'wildcard' : 'literal',
        regex: wildcard ? toRegex(path) : null,
    };
}

/**
 * Validate and compile exclusion patterns. Throws CsrfConfigError on the first bad one.
 */
export function compileExclusionRules(patterns: readonly string[]): readonly ExclusionRule[] {
    return Object.freeze(patterns.map((pattern) => Object.freeze(compileRule(pattern))));
}

export function matches(target: MatchTarget, rule: ExclusionRule): boolean {
    const subject = rule.scope === 'uri' ? target.uri : target.path;
    if (subject === null) return false;

    return rule.regex ? rule.regex.test(subject) : subject === rule.pattern;
}

export function isExcluded(target: MatchTarget, rules: readonly ExclusionRule[]): boolean {
    return rules.some((rule) => matches(target, rule));
}
