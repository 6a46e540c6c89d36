// packages/core/src/schemas/document-schemas.ts
import { z } from 'zod';
import type { PropertyDocument, PropertyValue } from '../types';

// --- Property Values ---

export const PropertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(PropertyValueSchema),
    z.record(PropertyValueSchema),
  ]),
);

/**
 * Top level of the stored document. Arrays and scalars are rejected:
 * the document always decodes to a mapping.
 */
export const PropertyDocumentSchema: z.ZodType<PropertyDocument> = z.record(PropertyValueSchema);
