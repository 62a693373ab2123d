export type PropertyFilters = Readonly<Record<string, unknown>>;

/** A filter simple enough to embed in a path expression. */
export type ServerSideFilter = readonly [key: string, value: boolean | number | string];

const KEY_PATTERN = /^[A-Za-z0-9_]+$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const NAMED_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x5c, '\\\\'],
  [0x22, '\\"'],
  [0x27, "\\'"],
  [0x0a, '\\n'],
  [0x0d, '\\r'],
  [0x09, '\\t'],
]);

const encoder = new TextEncoder();

/**
 * Whether `key=value` can be evaluated by the backend. Keys must be bare
 * identifiers; values must be booleans, 32-bit integers, or strings without
 * control characters.
 */
export function isServerSideFilter(key: string, value: unknown): value is ServerSideFilter[1] {
  if (!KEY_PATTERN.test(key)) return false;
  if (typeof value === 'boolean') return true;
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
  }
  if (typeof value === 'string') return !CONTROL_CHARACTERS.test(value);
  return false;
}

/**
 * Escape a string for a quoted predicate value. Works on the UTF-8 bytes:
 * backslash and quotes get a backslash, newline, carriage return and tab keep
 * their short escapes, every other byte outside printable ASCII becomes `\xHH`.
 */
export function escapeFilterString(value: string): string {
  let escaped = '';
  for (const byte of encoder.encode(value)) {
    const named = NAMED_ESCAPES.get(byte);
    if (named !== undefined) {
      escaped += named;
    } else if (byte < 0x20 || byte > 0x7e) {
      escaped += `\\x${byte.toString(16).padStart(2, '0')}`;
    } else {
      escaped += String.fromCharCode(byte);
    }
  }
  return escaped;
}

/**
 * Render one predicate: `visible=True`, `size=12`, `Name="btn1"`.
 */
export function formatFilter(key: string, value: boolean | number | string): string {
  if (typeof value === 'boolean') return `${key}=${value ? 'True' : 'False'}`;
  if (typeof value === 'number') return `${key}=${value}`;
  return `${key}="${escapeFilterString(value)}"`;
}

/**
 * The first filter, in insertion order, that the backend can evaluate.
 * Only one predicate is ever sent; every filter is checked again client-side.
 */
export function firstServerSideFilter(filters: PropertyFilters): ServerSideFilter | undefined {
  for (const [key, value] of Object.entries(filters)) {
    if (isServerSideFilter(key, value)) return [key, value];
  }
  return undefined;
}
