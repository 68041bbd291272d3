import type { RecordKind, XmlNode } from '@/modules/record-tree/index.js';

/**
 * Structural schema check of a whole document. Implemented outside the
 * engine (an XML Schema validator); the engine only records pass or fail.
 */
export interface SchemaValidator {
  validate(root: XmlNode, version: string, kind: RecordKind): boolean;
}
