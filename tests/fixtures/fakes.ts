/**
 * Test fakes
 */

import type { SchemaValidator } from '@/modules/file-stats/index.js';
import type { RecordKind, XmlNode } from '@/modules/record-tree/index.js';

export interface SchemaValidatorCall {
  root: XmlNode;
  version: string;
  kind: RecordKind;
}

/**
 * Schema validator stand-in. Passes every document unless `passes` says
 * otherwise; records the calls it receives.
 */
export const makeSchemaValidator = (
  passes: (root: XmlNode, version: string) => boolean = () => true
): SchemaValidator & { calls: SchemaValidatorCall[] } => {
  const calls: SchemaValidatorCall[] = [];
  return {
    calls,
    validate(root, version, kind) {
      calls.push({ root, version, kind });
      return passes(root, version);
    },
  };
};
