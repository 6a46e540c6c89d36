export type { PropertyDocument, PropertyValue, VersionStamp, MergeResult } from './types';
export {
  PropertyDocumentCodec,
  encodeDocument,
  decodeDocument,
  mergeDocuments,
  isDeepEqual,
  isPropertyDocument,
} from './PropertyDocumentCodec';
export { getByPath, splitPropertyPath } from './paths';
export { DocumentDecodeError } from './errors';
export { PropertyValueSchema, PropertyDocumentSchema } from './schemas';
