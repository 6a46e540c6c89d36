/**
 * A JSON-like value stored under a cluster property name.
 * Bulk updates may carry arbitrarily nested values; single-key updates only strings.
 */
export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | PropertyDocument;

/**
 * The shared cluster properties document. Key order follows insertion order.
 * An absent document is equivalent to an empty one.
 */
export interface PropertyDocument {
  [name: string]: PropertyValue;
}

/**
 * Revision of the stored document, required for conditional writes.
 * A created node starts at 0 and every successful write increments it.
 */
export type VersionStamp = number;

export interface MergeResult {
  merged: PropertyDocument;
  /** False exactly when `merged` is structurally equal to the base document */
  changed: boolean;
}
