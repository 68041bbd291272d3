import { describe, expect, it } from 'vitest';

import { LEGACY_VERSION, majorVersionOf, resolveVersion } from '@/modules/statistics/index.js';

import { makeTables, organisationFacts, plain } from '../../fixtures/builders.js';

describe('resolveVersion', () => {
  const tables = makeTables();

  it('keeps versions the Version codelist knows', () => {
    expect(resolveVersion('2.02', tables)).toEqual({ version: '2.02', major: '2', fallback: false });
    expect(resolveVersion('1.05', tables)).toEqual({ version: '1.05', major: '1', fallback: false });
  });

  it('falls back to the legacy version', () => {
    expect(resolveVersion(null, tables)).toEqual({ version: LEGACY_VERSION, major: '1', fallback: true });
    expect(resolveVersion('', tables)).toEqual({ version: '1.01', major: '1', fallback: true });
    expect(resolveVersion('3.0', tables)).toEqual({ version: '1.01', major: '1', fallback: true });
  });

  it('maps versions to their major', () => {
    expect(majorVersionOf('2.03')).toBe('2');
    expect(majorVersionOf('1.04')).toBe('1');
  });
});

describe('OrganisationFacts', () => {
  it('counts element paths of an organisation record', () => {
    const facts = organisationFacts(
      '<organisation-identifier>GB-CHC-1</organisation-identifier>' +
        '<name><narrative xml:lang="">Example Charity</narrative></name>'
    );

    expect(facts.version).toBe('2.03');
    expect(facts.codes.commitment).toBe('2');
    expect(plain(facts.elementCounts.value)).toEqual({
      'iati-organisation': '1',
      'iati-organisation/organisation-identifier': '1',
      'iati-organisation/name': '1',
      'iati-organisation/name/narrative': '1',
    });
  });

  it('uses version 1 codes for undeclared versions', () => {
    const facts = organisationFacts('', null);

    expect(facts.versionFallback).toBe(true);
    expect(facts.codes.commitment).toBe('C');
  });
});
