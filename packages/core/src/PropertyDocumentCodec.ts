import { DocumentDecodeError } from './errors';
import { PropertyDocumentSchema } from './schemas';
import type { MergeResult, PropertyDocument, PropertyValue } from './types';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * True for JSON objects (not arrays, not null).
 */
export function isPropertyDocument(value: PropertyValue | undefined): value is PropertyDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural equality over property values.
 * Object key order is ignored, array order is significant.
 */
export function isDeepEqual(a: PropertyValue | undefined, b: PropertyValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => isDeepEqual(item, b[i]));
  }

  if (isPropertyDocument(a) && isPropertyDocument(b)) {
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) return false;
    return keysA.every((key) => Object.prototype.hasOwnProperty.call(b, key) && isDeepEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Serializes a document to UTF-8 JSON bytes.
 */
export function encodeDocument(doc: PropertyDocument): Uint8Array {
  return textEncoder.encode(JSON.stringify(doc));
}

/**
 * Deserializes a stored payload.
 * A missing or zero-length payload is the empty document.
 *
 * @throws DocumentDecodeError if the bytes are not UTF-8 JSON or the top level is not an object
 */
export function decodeDocument(data: Uint8Array | null | undefined): PropertyDocument {
  if (!data || data.length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(data));
  } catch (err) {
    throw new DocumentDecodeError(
      'Cluster properties payload is not valid JSON',
      err instanceof Error ? err.message : String(err)
    );
  }

  const result = PropertyDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new DocumentDecodeError('Cluster properties payload is not a JSON object', reason);
  }
  return result.data;
}

/**
 * Deep-merges `overlay` into a copy of `base`; `base` is left untouched.
 *
 * - nested objects on both sides merge recursively
 * - any other overlay value replaces the base value
 * - a `null` overlay value removes the key
 * - keys missing from `overlay` are kept
 *
 * `changed` reports whether the merged document differs from `base`,
 * so callers can skip a write when nothing would change.
 */
export function mergeDocuments(base: PropertyDocument, overlay: PropertyDocument): MergeResult {
  const merged: PropertyDocument = { ...base };
  let changed = false;

  for (const [key, value] of Object.entries(overlay)) {
    const current = Object.prototype.hasOwnProperty.call(base, key) ? base[key] : undefined;

    if (value === null) {
      if (current !== undefined && current !== null) {
        delete merged[key];
        changed = true;
      }
      continue;
    }

    if (isPropertyDocument(current) && isPropertyDocument(value)) {
      const nested = mergeDocuments(current, value);
      merged[key] = nested.merged;
      changed = changed || nested.changed;
      continue;
    }

    if (!isDeepEqual(current, value)) {
      merged[key] = value;
      changed = true;
    }
  }

  return { merged, changed };
}

/**
 * Encode/decode/merge entry points for the stored properties document.
 */
export const PropertyDocumentCodec = {
  encode: encodeDocument,
  decode: decodeDocument,
  merge: mergeDocuments,
  isDeepEqual,
} as const;
