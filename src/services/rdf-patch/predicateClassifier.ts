/**
 * Classifies subject and predicate IRIs into tagged variants so the patch
 * engine can dispatch with one exhaustive switch per subject kind.
 */

import { compactIri, PROV, WIKIBASE, WIKIDATABOTS } from './namespaces.js';

export type SubjectKind =
  | { kind: 'entity'; entityId: string }
  | { kind: 'statement'; entityId: string; guid: string }
  | { kind: 'valueAssertion' }
  | { kind: 'unknown' };

export type PredicateKind =
  | { kind: 'directValue'; propertyId: string }
  | { kind: 'statementContainer'; propertyId: string }
  | { kind: 'statementValue'; propertyId: string }
  | { kind: 'qualifier'; propertyId: string }
  | { kind: 'qualifierExclusive'; propertyId: string }
  | { kind: 'referenceValue'; propertyId: string }
  | { kind: 'rank' }
  | { kind: 'derivedFrom' }
  | { kind: 'onlyDerivedFrom' }
  | { kind: 'editSummary' }
  | { kind: 'assertValue' }
  | { kind: 'unknown' };

const ITEM_ID = /^Q\d+$/;
const PROPERTY_ID = /^P\d+$/;
const STATEMENT_LOCAL_NAME = /^([Qq]\d+)-(.+)$/;

export function isItemId(value: string): boolean {
  return ITEM_ID.test(value);
}

export function isPropertyId(value: string): boolean {
  return PROPERTY_ID.test(value);
}

/**
 * Parse a `wds:` local name (`Q42-<uuid>` or `q42-<uuid>`) into the owning
 * item id and the statement GUID as stored on the entity (`Q42$<uuid>`).
 * The case of the GUID prefix is kept; the item id is upper-cased.
 */
export function parseStatementLocalName(localName: string): { entityId: string; guid: string } | null {
  const match = STATEMENT_LOCAL_NAME.exec(localName);
  if (!match) {
    return null;
  }
  const [, prefix, uuid] = match;
  return { entityId: prefix.toUpperCase(), guid: `${prefix}$${uuid}` };
}

export function classifySubject(iri: string): SubjectKind {
  if (iri === WIKIDATABOTS.testSubject) {
    return { kind: 'valueAssertion' };
  }

  const { prefix, localName } = compactIri(iri);
  if (prefix === 'wd' && isItemId(localName)) {
    return { kind: 'entity', entityId: localName };
  }
  if (prefix === 'wds') {
    const parsed = parseStatementLocalName(localName);
    if (parsed) {
      return { kind: 'statement', ...parsed };
    }
  }
  return { kind: 'unknown' };
}

export function classifyPredicate(iri: string): PredicateKind {
  switch (iri) {
    case WIKIBASE.rank:
      return { kind: 'rank' };
    case PROV.wasDerivedFrom:
      return { kind: 'derivedFrom' };
    case PROV.wasOnlyDerivedFrom:
      return { kind: 'onlyDerivedFrom' };
    case WIKIDATABOTS.editSummary:
      return { kind: 'editSummary' };
    case WIKIDATABOTS.assertValue:
      return { kind: 'assertValue' };
  }

  const { prefix, localName } = compactIri(iri);
  if (!isPropertyId(localName)) {
    return { kind: 'unknown' };
  }

  const propertyId = localName;
  switch (prefix) {
    case 'wdt':
      return { kind: 'directValue', propertyId };
    case 'p':
      return { kind: 'statementContainer', propertyId };
    case 'ps':
    case 'psv':
      return { kind: 'statementValue', propertyId };
    case 'pq':
    case 'pqv':
      return { kind: 'qualifier', propertyId };
    case 'pqe':
    case 'pqve':
      return { kind: 'qualifierExclusive', propertyId };
    case 'pr':
    case 'prv':
      return { kind: 'referenceValue', propertyId };
    default:
      return { kind: 'unknown' };
  }
}
