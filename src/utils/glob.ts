/**
 * File-name glob matching for test discovery
 *
 * Patterns apply to a basename only: `*` matches any run of characters,
 * `?` a single character, and `[...]` a character class (`[!...]` negated).
 */

const REGEXP_SPECIAL = /[\\^$.+(){}|]/;

export function globToRegExp(pattern: string): RegExp {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];

    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close);
      if (body.startsWith('!')) {
        body = '^' + body.slice(1);
      }
      source += `[${body.replace(/\\/g, '\\\\')}]`;
      i = close;
    } else if (REGEXP_SPECIAL.test(char) || char === ']') {
      source += `\\${char}`;
    } else {
      source += char;
    }
  }

  return new RegExp(`^${source}$`);
}

export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}
