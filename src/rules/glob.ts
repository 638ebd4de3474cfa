export interface GlobOptions {
  /** Let `*` and `?` match `/` (whole-path matching). */
  crossSegments?: boolean;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Translate a shell glob into an unanchored regular expression source without capturing groups. */
export function globToSource(pattern: string, options: GlobOptions = {}): string {
  const any = options.crossSegments ? '.' : '[^/]';
  let i = 0;
  let out = '';

  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '\\') {
      const next = pattern[i + 1];
      if (next) {
        out += escapeRegex(next);
        i += 2;
      } else {
        out += '\\\\';
        i += 1;
      }
      continue;
    }
    if (ch === '*') {
      while (pattern[i + 1] === '*') i += 1;
      out += `${any}*`;
      i += 1;
      continue;
    }
    if (ch === '?') {
      out += any;
      i += 1;
      continue;
    }
    if (ch === '[') {
      // a leading "]" (after an optional "!") is part of the class
      let start = i + 1;
      if (pattern[start] === '!') start += 1;
      if (pattern[start] === ']') start += 1;
      const end = pattern.indexOf(']', start);
      if (end === -1) {
        out += '\\[';
        i += 1;
        continue;
      }
      let body = pattern.slice(i + 1, end);
      const negate = body.startsWith('!');
      if (negate) body = body.slice(1);
      body = body.replace(/\\/g, '\\\\').replace(/^\]/, '\\]');
      if (!negate && body.startsWith('^')) body = `\\${body}`;
      out += `[${negate ? '^' : ''}${body}]`;
      i = end + 1;
      continue;
    }
    out += escapeRegex(ch);
    i += 1;
  }

  return out;
}

export function globToRegExp(pattern: string, options: GlobOptions & { ignoreCase?: boolean } = {}): RegExp {
  return new RegExp(`^${globToSource(pattern, options)}$`, options.ignoreCase ? 'i' : '');
}

const nameCache = new Map<string, RegExp>();

/** Match a single entry name against a glob, caching the compiled expression. */
export function matchName(pattern: string, name: string): boolean {
  let re = nameCache.get(pattern);
  if (!re) {
    re = globToRegExp(pattern);
    nameCache.set(pattern, re);
  }
  return re.test(name);
}
