/**
 * Record tree model.
 *
 * A record is one reporting unit (an `iati-activity` or an `iati-organisation`
 * element) handed over by the parser as an immutable tree. The engine only
 * ever reads it.
 */

export interface XmlNode {
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
  /** Direct text content, or null when the element holds no text */
  readonly text: string | null;
  readonly children: readonly XmlNode[];
}

export type RecordKind = 'activity' | 'organisation';

export interface RecordInput {
  readonly kind: RecordKind;
  readonly element: XmlNode;
  /** `version` attribute of the enclosing document root, null when the root carries none */
  readonly documentVersion: string | null;
}

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export const RECORD_TAGS: Record<RecordKind, { root: string; record: string }> = {
  activity: { root: 'iati-activities', record: 'iati-activity' },
  organisation: { root: 'iati-organisations', record: 'iati-organisation' },
};
