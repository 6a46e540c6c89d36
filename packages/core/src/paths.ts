import { isPropertyDocument } from './PropertyDocumentCodec';
import type { PropertyDocument, PropertyValue } from './types';

const INDEX_SEGMENT = /^\d+$/;

/**
 * Splits a property path into segments.
 * `"defaults/collection/numShards"` → `['defaults', 'collection', 'numShards']`.
 * A leading or trailing `/` is ignored.
 */
export function splitPropertyPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Looks up a (possibly nested) value by `/`-separated path.
 * Numeric segments index into arrays.
 *
 * @returns the value, or undefined when any segment is missing
 *
 * @example
 * ```typescript
 * getByPath({ defaults: { cluster: { useLegacy: true } } }, 'defaults/cluster/useLegacy'); // true
 * getByPath({ hosts: ['a', 'b'] }, 'hosts/1'); // 'b'
 * ```
 */
export function getByPath(doc: PropertyDocument, path: string): PropertyValue | undefined {
  const segments = splitPropertyPath(path);
  if (segments.length === 0) return undefined;

  let current: PropertyValue | undefined = doc;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      if (!INDEX_SEGMENT.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isPropertyDocument(current)) {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}
