/**
 * Canonical JSON serialization for signed bodies.
 *
 * Two structurally equal values always serialize to the same text: object
 * keys are sorted by UTF-16 code unit, there is no insignificant whitespace,
 * and strings (keys included) are normalized to NFC. Object members whose
 * value is `undefined` are omitted.
 */

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function serialize(value: unknown, path: string): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot canonicalize non-finite number at ${path}`);
      }
      return JSON.stringify(value);
    case 'string':
      return JSON.stringify(value.normalize('NFC'));
    case 'object':
      break;
    default:
      throw new TypeError(`Cannot canonicalize ${typeof value} at ${path}`);
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, index) => {
      if (item === undefined) {
        throw new TypeError(`Cannot canonicalize undefined at ${path}[${index}]`);
      }
      return serialize(item, `${path}[${index}]`);
    });
    return `[${items.join(',')}]`;
  }

  if (!isPlainObject(value)) {
    throw new TypeError(`Cannot canonicalize ${Object.prototype.toString.call(value)} at ${path}`);
  }

  const members: Array<[string, string]> = [];
  const seen = new Set<string>();
  for (const [key, member] of Object.entries(value)) {
    if (member === undefined) continue;
    const normalizedKey = key.normalize('NFC');
    if (seen.has(normalizedKey)) {
      throw new TypeError(`Duplicate key "${normalizedKey}" after normalization at ${path}`);
    }
    seen.add(normalizedKey);
    members.push([normalizedKey, serialize(member, `${path}.${key}`)]);
  }

  members.sort((a, b) => compareKeys(a[0], b[0]));
  return `{${members.map(([key, text]) => `${JSON.stringify(key)}:${text}`).join(',')}}`;
}

/** Deterministic JSON text. Throws `TypeError` for values JSON cannot carry faithfully. */
export function canonicalize(value: unknown): string {
  return serialize(value, '$');
}

/** UTF-8 bytes of {@link canonicalize}. These are the bytes that get signed. */
export function encodeCanonical(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalize(value));
}
