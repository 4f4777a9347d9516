/**
 * Glob Utilities
 *
 * Minimal glob matching for include/exclude patterns.
 *
 * Supported syntax: `*` (any run of characters except `/`), `**` (any number
 * of path segments), `?` (one character except `/`). Patterns without a `/`
 * match a file's base name; patterns with one match the `/`-separated path
 * relative to the source directory.
 */

const REGEX_SPECIAL = /[.+^${}()|[\]\\]/g;

const compiled = new Map<string, RegExp>();

/**
 * Convert a glob pattern to an anchored regular expression.
 */
export function globToRegExp(pattern: string): RegExp {
    const cachedRegExp = compiled.get(pattern);
    if (cachedRegExp) {
        return cachedRegExp;
    }

    let source = '';
    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i];
        if (char === '*') {
            if (pattern[i + 1] === '*') {
                // `**/` matches zero or more whole segments
                if (pattern[i + 2] === '/') {
                    source += '(?:.*/)?';
                    i += 2;
                } else {
                    source += '.*';
                    i += 1;
                }
            } else {
                source += '[^/]*';
            }
        } else if (char === '?') {
            source += '[^/]';
        } else {
            source += char.replace(REGEX_SPECIAL, '\\$&');
        }
    }

    const regExp = new RegExp(`^${source}$`);
    compiled.set(pattern, regExp);
    return regExp;
}

/**
 * Whether a relative path matches a pattern.
 *
 * @param relativePath - `/`-separated path relative to the scan root
 * @param pattern - Glob pattern; trailing `/` is ignored
 */
export function matchesGlob(relativePath: string, pattern: string): boolean {
    const normalized = pattern.replace(/\\/g, '/').replace(/\/+$/, '').replace(/^\.\//, '');
    if (normalized === '') {
        return false;
    }
    if (!normalized.includes('/')) {
        const baseName = relativePath.slice(relativePath.lastIndexOf('/') + 1);
        return globToRegExp(normalized).test(baseName);
    }
    return globToRegExp(normalized).test(relativePath);
}

/**
 * Whether a relative path matches any of the patterns.
 */
export function matchesAnyGlob(relativePath: string, patterns: readonly string[]): boolean {
    return patterns.some(pattern => matchesGlob(relativePath, pattern));
}
