import { parse } from 'ini';

/** Section name -> lowercased key -> value. */
export type RuleSections = Map<string, Record<string, string>>;

const SECTION_HEADER = /^\[(.*)\]$/;
const KEY_DELIMITER = /[=:]/;

interface PendingEntry {
  key: string;
  lines: string[];
  indent: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (Array.isArray(value)) return value.map(stringify).join(',');
  if (value === null || value === undefined) return '';
  return String(value);
}

/**
 * Rewrites rule-file text into a form `ini` reads without loss. Section names are
 * glob patterns, so they are replaced by their index in `names` (`ini` would split
 * them at dots). Indented lines continue the previous value, and every value is
 * written JSON-quoted so `;` and `#` inside it are kept. Lines before the first
 * section are dropped.
 */
function normalize(text: string, names: string[]): string {
  const out: string[] = [];
  let entry: PendingEntry | undefined;

  const flush = (): void => {
    if (!entry) return;
    out.push(`${entry.key} = ${JSON.stringify(entry.lines.join('\n').trim())}`);
    entry = undefined;
  };

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === '' || line.startsWith(';') || line.startsWith('#')) continue;

    const indent = raw.length - raw.trimStart().length;
    if (entry && indent > entry.indent) {
      entry.lines.push(line);
      continue;
    }
    flush();

    const header = SECTION_HEADER.exec(line);
    if (header) {
      names.push(header[1].trim());
      out.push(`[${names.length - 1}]`);
      continue;
    }
    if (names.length === 0) continue;

    const delimiter = line.search(KEY_DELIMITER);
    if (delimiter <= 0) {
      out.push(line);
      continue;
    }
    entry = { key: line.slice(0, delimiter).trim(), lines: [line.slice(delimiter + 1).trim()], indent };
  }
  flush();
  return out.join('\n');
}

export function parseRuleFile(text: string): RuleSections {
  const names: string[] = [];
  const decoded: unknown = parse(normalize(text, names));
  const sections: RuleSections = new Map();
  if (!isRecord(decoded)) return sections;

  names.forEach((name, index) => {
    const section = decoded[String(index)];
    const own = sections.get(name) ?? {};
    if (isRecord(section)) {
      for (const [key, value] of Object.entries(section)) {
        own[key.toLowerCase()] = stringify(value);
      }
    }
    sections.set(name, own);
  });
  return sections;
}
