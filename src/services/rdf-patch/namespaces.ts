/**
 * Namespace vocabulary of RDF patch documents
 *
 * Every document is parsed with these prefixes predeclared, and IRIs are
 * compacted against the same table when the engine dispatches on them.
 */

export const NAMESPACES = {
  bd: 'http://www.bigdata.com/rdf#',
  cc: 'http://creativecommons.org/ns#',
  dct: 'http://purl.org/dc/terms/',
  geo: 'http://www.opengis.net/ont/geosparql#',
  hint: 'http://www.bigdata.com/queryHints#',
  ontolex: 'http://www.w3.org/ns/lemon/ontolex#',
  owl: 'http://www.w3.org/2002/07/owl#',
  prov: 'http://www.w3.org/ns/prov#',
  rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
  rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
  schema: 'http://schema.org/',
  skos: 'http://www.w3.org/2004/02/skos/core#',
  xsd: 'http://www.w3.org/2001/XMLSchema#',

  p: 'http://www.wikidata.org/prop/',
  pq: 'http://www.wikidata.org/prop/qualifier/',
  pqe: 'http://www.wikidata.org/prop/qualifier/exclusive/',
  pqn: 'http://www.wikidata.org/prop/qualifier/value-normalized/',
  pqv: 'http://www.wikidata.org/prop/qualifier/value/',
  pqve: 'http://www.wikidata.org/prop/qualifier/value-exclusive/',
  pr: 'http://www.wikidata.org/prop/reference/',
  prn: 'http://www.wikidata.org/prop/reference/value-normalized/',
  prv: 'http://www.wikidata.org/prop/reference/value/',
  psv: 'http://www.wikidata.org/prop/statement/value/',
  ps: 'http://www.wikidata.org/prop/statement/',
  psn: 'http://www.wikidata.org/prop/statement/value-normalized/',
  wd: 'http://www.wikidata.org/entity/',
  wdata: 'http://www.wikidata.org/wiki/Special:EntityData/',
  wdno: 'http://www.wikidata.org/prop/novalue/',
  wdref: 'http://www.wikidata.org/reference/',
  wds: 'http://www.wikidata.org/entity/statement/',
  wdt: 'http://www.wikidata.org/prop/direct/',
  wdtn: 'http://www.wikidata.org/prop/direct-normalized/',
  wdv: 'http://www.wikidata.org/value/',
  wikibase: 'http://wikiba.se/ontology#',

  wikidatabots: 'https://github.com/josh/wikidatabots#',
  commonsMedia: 'http://commons.wikimedia.org/wiki/Special:FilePath/',
} as const;

export type NamespacePrefix = keyof typeof NAMESPACES;

const PREFIX_BY_NAMESPACE = new Map<string, NamespacePrefix>();
for (const [prefix, iri] of Object.entries(NAMESPACES)) {
  if (isNamespacePrefix(prefix)) {
    PREFIX_BY_NAMESPACE.set(iri, prefix);
  }
}

function isNamespacePrefix(value: string): value is NamespacePrefix {
  return Object.prototype.hasOwnProperty.call(NAMESPACES, value);
}

/**
 * Turtle prefix header prepended to every input document
 */
export const PREFIXES = Object.entries(NAMESPACES)
  .map(([prefix, iri]) => `@prefix ${prefix}: <${iri}> .`)
  .join('\n')
  .concat('\n\n');

export const XSD = {
  string: `${NAMESPACES.xsd}string`,
  decimal: `${NAMESPACES.xsd}decimal`,
  integer: `${NAMESPACES.xsd}integer`,
  date: `${NAMESPACES.xsd}date`,
  dateTime: `${NAMESPACES.xsd}dateTime`,
} as const;

export const RDF_TYPE = `${NAMESPACES.rdf}type`;
export const RDF_LANG_STRING = `${NAMESPACES.rdf}langString`;
export const GEO_WKT_LITERAL = `${NAMESPACES.geo}wktLiteral`;

export const WIKIBASE = {
  rank: `${NAMESPACES.wikibase}rank`,
  NormalRank: `${NAMESPACES.wikibase}NormalRank`,
  PreferredRank: `${NAMESPACES.wikibase}PreferredRank`,
  DeprecatedRank: `${NAMESPACES.wikibase}DeprecatedRank`,
  QuantityValue: `${NAMESPACES.wikibase}QuantityValue`,
  quantityAmount: `${NAMESPACES.wikibase}quantityAmount`,
  quantityUpperBound: `${NAMESPACES.wikibase}quantityUpperBound`,
  quantityLowerBound: `${NAMESPACES.wikibase}quantityLowerBound`,
  quantityUnit: `${NAMESPACES.wikibase}quantityUnit`,
  TimeValue: `${NAMESPACES.wikibase}TimeValue`,
  timeValue: `${NAMESPACES.wikibase}timeValue`,
  timePrecision: `${NAMESPACES.wikibase}timePrecision`,
  timeTimezone: `${NAMESPACES.wikibase}timeTimezone`,
  timeCalendarModel: `${NAMESPACES.wikibase}timeCalendarModel`,
} as const;

export const PROV = {
  wasDerivedFrom: `${NAMESPACES.prov}wasDerivedFrom`,
  wasOnlyDerivedFrom: `${NAMESPACES.prov}wasOnlyDerivedFrom`,
} as const;

export const WIKIDATABOTS = {
  editSummary: `${NAMESPACES.wikidatabots}editSummary`,
  testSubject: `${NAMESPACES.wikidatabots}testSubject`,
  assertValue: `${NAMESPACES.wikidatabots}assertValue`,
} as const;

export interface CompactIri {
  /** Empty when the IRI is outside every known namespace */
  prefix: NamespacePrefix | '';
  /** Local name, or the full IRI when `prefix` is empty */
  localName: string;
}

/**
 * Split an IRI into a known prefix and local name.
 * The namespace is everything up to the last `/` or `#`.
 */
export function compactIri(iri: string): CompactIri {
  const split = Math.max(iri.lastIndexOf('/'), iri.lastIndexOf('#')) + 1;
  const prefix = split > 0 ? PREFIX_BY_NAMESPACE.get(iri.slice(0, split)) : undefined;
  if (prefix === undefined) {
    return { prefix: '', localName: iri };
  }
  return { prefix, localName: iri.slice(split) };
}
