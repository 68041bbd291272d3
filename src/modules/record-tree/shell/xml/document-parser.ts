/**
 * XML adapter: turns an activity or organisation document into record trees.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { err, ok, type Result } from 'neverthrow';

import { createInvalidDocumentError, type InvalidDocumentError } from '../../core/errors.js';
import { RECORD_TAGS, type RecordInput, type RecordKind, type XmlNode } from '../../core/types.js';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  htmlEntities: true,
});

export interface ParsedDocument {
  readonly root: XmlNode;
  /** null when the root is neither `iati-activities` nor `iati-organisations` */
  readonly kind: RecordKind | null;
  readonly version: string | null;
  readonly records: RecordInput[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toAttributes = (raw: unknown): Record<string, string> => {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes[name] = typeof value === 'string' ? value : String(value);
  }
  return attributes;
};

const toNodes = (entries: unknown): XmlNode[] => {
  if (!Array.isArray(entries)) return [];

  const nodes: XmlNode[] = [];
  for (const entry of entries) {
    const node = toNode(entry);
    if (node !== null) nodes.push(node);
  }
  return nodes;
};

const textOf = (entries: unknown): string | null => {
  if (!Array.isArray(entries)) return null;

  const parts: string[] = [];
  for (const entry of entries) {
    if (isRecord(entry) && TEXT_KEY in entry) {
      const value = entry[TEXT_KEY];
      parts.push(typeof value === 'string' ? value : String(value));
    }
  }
  return parts.length === 0 ? null : parts.join('');
};

function toNode(entry: unknown): XmlNode | null {
  if (!isRecord(entry)) return null;

  const tag = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
  // text nodes are collected by their parent; `?xml` declarations are skipped
  if (tag === undefined || tag === TEXT_KEY || tag.startsWith('?')) return null;

  const body = entry[tag];
  return {
    tag,
    attributes: toAttributes(entry[ATTRIBUTES_KEY]),
    text: textOf(body),
    children: toNodes(body),
  };
}

const kindOfRoot = (tag: string): RecordKind | null => {
  if (tag === RECORD_TAGS.activity.root) return 'activity';
  if (tag === RECORD_TAGS.organisation.root) return 'organisation';
  return null;
};

/**
 * Parses one source document. Malformed XML is reported as an
 * InvalidDocumentError; an unexpected root yields a document without records.
 */
export const parseXmlDocument = (xml: string): Result<ParsedDocument, InvalidDocumentError> => {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return err(createInvalidDocumentError(validation.err.msg, validation.err.line));
  }

  const root = toNodes(parser.parse(xml))[0];
  if (root === undefined) {
    return err(createInvalidDocumentError('Document has no root element'));
  }

  const kind = kindOfRoot(root.tag);
  const version = root.attributes['version'] ?? null;
  const records: RecordInput[] =
    kind === null
      ? []
      : root.children
          .filter((c) => c.tag === RECORD_TAGS[kind].record)
          .map((element) => ({ kind, element, documentVersion: version }));

  return ok({ root, kind, version, records });
};

/**
 * Parses a fragment holding a single element (an activity on its own).
 */
export const parseXmlElement = (xml: string): Result<XmlNode, InvalidDocumentError> =>
  parseXmlDocument(xml).map((document) => document.root);
