import type { CodelistName, MajorVersion, ReferenceTables } from './types.js';

export const isCodeIn = (
  tables: ReferenceTables,
  major: MajorVersion,
  codelist: CodelistName,
  code: string | null | undefined
): boolean => code != null && tables.codelists[major][codelist].has(code);

export interface OrgPrefixMatch {
  readonly valid: boolean;
  /** Matched prefix, or `null` when the reference matches none */
  readonly prefix: string | null;
}

/**
 * Matches an organisation reference against the known identifier prefixes.
 * A reference is valid when it starts with a registration
 * agency code or a CRS channel code.
 */
export function validOrgPrefix(
  tables: ReferenceTables,
  major: MajorVersion,
  ref: string
): OrgPrefixMatch {
  for (const prefix of tables.orgIdPrefixes[major]) {
    if (ref.startsWith(prefix)) {
      return { valid: true, prefix };
    }
  }
  return { valid: false, prefix: null };
}

export const languagesFor = (tables: ReferenceTables, country: string): readonly string[] =>
  tables.countryLanguages.get(country) ?? [];
