/**
 * Shell glob matching for route patterns
 *
 * Supported syntax:
 *   *        any run of characters, including "/"
 *   ?        exactly one character
 *   [seq]    one character from seq (ranges like a-z allowed)
 *   [!seq]   one character not in seq
 *
 * Brace expansion is not supported: "{" and "}" match themselves. Matching is
 * case-sensitive on every platform.
 */

import _ from 'lodash';

function escapeClassMember(c: string): string {
    return _.replace(c, /[\\\]\[^-]/g, '\\$&');
}

function translateClass(body: string): string {
    const negate = _.startsWith(body, '!');
    const chars = negate ? body.slice(1) : body;
    const members: string[] = [];

    let k = 0;
    while(k < chars.length) {
        const first = chars.charAt(k);
        if(k + 2 < chars.length && chars.charAt(k + 1) === '-') {
            const last = chars.charAt(k + 2);
            // A reversed range such as z-a is empty and contributes nothing
            if(first <= last) {
                members.push(`${escapeClassMember(first)}-${escapeClassMember(last)}`);
            }
            k += 3;
        } else {
            members.push(escapeClassMember(first));
            k++;
        }
    }

    if(_.isEmpty(members)) {
        return negate ? '[\\s\\S]' : '[^\\s\\S]';
    }

    return negate ? `[^${members.join('')}]` : `[${members.join('')}]`;
}

function translate(pattern: string): string {
    let out = '';
    let i = 0;
    const n = pattern.length;

    while(i < n) {
        const c = pattern.charAt(i);
        i++;

        if(c === '*') {
            while(pattern.charAt(i) === '*') {
                i++;
            }
            out += '.*';
        } else if(c === '?') {
            out += '.';
        } else if(c === '[') {
            let j = i;
            if(pattern.charAt(j) === '!') {
                j++;
            }
            // "]" right after "[" or "[!" is a member, not the terminator
            if(pattern.charAt(j) === ']') {
                j++;
            }
            while(j < n && pattern.charAt(j) !== ']') {
                j++;
            }
            if(j >= n) {
                out += '\\[';
            } else {
                out += translateClass(pattern.slice(i, j));
                i = j + 1;
            }
        } else {
            out += _.escapeRegExp(c);
        }
    }

    return out;
}

/**
 * Compile a glob to an anchored RegExp. Results are cached per pattern.
 */
export const compilePattern = _.memoize((pattern: string): RegExp => new RegExp(`^${translate(pattern)}$`, 's'));

export function matchesPattern(pattern: string, path: string): boolean {
    return compilePattern(pattern).test(path);
}

/**
 * Characters in a pattern that users often expect to be special but are matched literally
 */
export function unsupportedSyntax(pattern: string): string[] {
    return _.uniq(_.filter(pattern.split(''), c => c === '{' || c === '}'));
}
