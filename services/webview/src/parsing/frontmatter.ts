import { RecordParseError } from '../errors';

export type FrontmatterMap = Record<string, string>;

const DELIMITER = '---';
const NULL_TOKENS = new Set(['null', 'none', '~']);

export function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

export function normalizeNullToken(value: string): string {
  return NULL_TOKENS.has(value.trim().toLowerCase()) ? '' : value;
}

function cleanValue(raw: string): string {
  return normalizeNullToken(unquote(raw));
}

/**
 * Reads the `---` delimited header at the top of a markdown file into a flat map.
 *
 * Only `key: value` lines and `- item` lists are understood. List items are
 * joined into one comma-separated string under their key, so
 *
 *     tags:
 *       - a
 *       - b
 *
 * yields `{ tags: 'a,b' }`.
 *
 * @throws RecordParseError (`malformed_frontmatter`) when either delimiter is missing.
 */
export function parseFrontmatter(content: string): FrontmatterMap {
  const lines = content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines.length === 0 || lines[0].trim() !== DELIMITER) {
    throw new RecordParseError('malformed_frontmatter', 'Missing frontmatter start marker');
  }

  const result: FrontmatterMap = {};
  let currentKey = '';
  let closed = false;

  for (let i = 1; i < lines.length; i += 1) {
    const raw = lines[i];
    const trimmed = raw.trim();
    if (trimmed === DELIMITER) {
      closed = true;
      break;
    }
    if (!trimmed) continue;

    const colon = raw.indexOf(':');
    const isKeyLine = colon !== -1 && raw[0] !== ' ' && raw[0] !== '\t';
    if (isKeyLine) {
      currentKey = raw.slice(0, colon).trim();
      result[currentKey] = cleanValue(raw.slice(colon + 1));
      continue;
    }

    // the separator goes in before null normalization, so `- null` leaves a trailing comma
    if (currentKey && (raw.startsWith('- ') || raw.startsWith('  -'))) {
      const item = trimmed.slice(1).trim();
      if (!item) continue;
      const existing = result[currentKey] ?? '';
      result[currentKey] = `${existing ? `${existing},` : ''}${cleanValue(item)}`;
    }
  }

  if (!closed) {
    throw new RecordParseError('malformed_frontmatter', 'Missing frontmatter end marker');
  }
  return result;
}
