/**
 * Term Resolver
 *
 * Turns graph terms (IRIs, literals, structured blank nodes) into Wikibase
 * data values, and checks them against the property's declared datatype.
 */

import type { Literal } from 'n3';
import { DatatypeMismatchError, ConsistencyError, ResolutionError } from '../../types/errors.js';
import {
  DATA_TYPE_VALUE_TYPES,
  isKnownDataType,
  type DataValue,
  type QuantityDataValue,
  type QuantityValue,
  type TimeDataValue,
  type TimeValue,
  type ValueSnak,
} from '../../types/wikibase.js';
import type { GraphTerm, RdfGraph } from './RdfGraph.js';
import { isItemId, isPropertyId } from './predicateClassifier.js';
import {
  compactIri,
  GEO_WKT_LITERAL,
  RDF_LANG_STRING,
  RDF_TYPE,
  WIKIBASE,
  XSD,
} from './namespaces.js';

export const GREGORIAN_CALENDAR = 'http://www.wikidata.org/entity/Q1985727';
export const EARTH_GLOBE = 'http://www.wikidata.org/entity/Q2';
export const UNITLESS = '1';

const DAY_PRECISION = 11;
const WKT_POINT = /^Point\(([-0-9.]+) ([-0-9.]+)\)/;
const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const INTEGER = /^[+-]?\d+$/;
const ISO_DATE_TIME = /^([+-]?)(\d{4,})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?$/;

/**
 * Canonical Wikibase amount for an xsd:decimal lexical value: explicit sign,
 * no leading zeros, no bare leading or trailing `.`
 */
export function signedDecimal(lexical: string): string {
  const match = DECIMAL.exec(lexical.trim());
  if (!match || (match[2] === '' && !match[3])) {
    throw new ResolutionError(`Invalid decimal value: ${lexical}`, { value: lexical });
  }
  const [, sign, integer, fraction] = match;
  const digits = integer.replace(/^0+/, '') || '0';
  return `${sign === '-' ? '-' : '+'}${digits}${fraction ? `.${fraction}` : ''}`;
}

function parseCoordinate(part: string, wkt: string): number {
  const parsed = Number(part);
  if (part === '' || !Number.isFinite(parsed)) {
    throw new ResolutionError(`Invalid wktLiteral: ${wkt}`, { value: wkt });
  }
  return parsed;
}

function parseInteger(literal: Literal, field: string): number {
  if (!INTEGER.test(literal.value.trim())) {
    throw new ResolutionError(`Invalid ${field}: ${literal.value}`, { [field]: literal.value });
  }
  return parseInt(literal.value, 10);
}

/**
 * Format an xsd:date or xsd:dateTime lexical value as a Wikibase timestamp
 * (`+YYYY-MM-DDThh:mm:ssZ`). Fractional seconds and offsets are dropped.
 */
export function formatTimestamp(lexical: string): string {
  const match = ISO_DATE_TIME.exec(lexical.trim());
  if (!match) {
    throw new ResolutionError(`Invalid date/time value: ${lexical}`, { value: lexical });
  }
  const [, sign, year, month, day, hour = '00', minute = '00', second = '00'] = match;
  return `${sign === '-' ? '-' : '+'}${year}-${month}-${day}T${hour}:${minute}:${second}Z`;
}

function resolveIri(iri: string): DataValue {
  const { prefix, localName } = compactIri(iri);

  if (prefix === 'wd' && isItemId(localName)) {
    return {
      type: 'wikibase-entityid',
      value: { 'entity-type': 'item', 'numeric-id': parseInt(localName.slice(1), 10), id: localName },
    };
  }
  if (prefix === 'wd' && isPropertyId(localName)) {
    return {
      type: 'wikibase-entityid',
      value: { 'entity-type': 'property', 'numeric-id': parseInt(localName.slice(1), 10), id: localName },
    };
  }
  if (prefix === 'commonsMedia') {
    return { type: 'string', value: decodeURIComponent(localName) };
  }
  if (prefix === '') {
    return { type: 'string', value: iri };
  }
  throw new ResolutionError(`Unknown URI: ${prefix}:${localName} <${iri}>`, { iri });
}

function resolveLiteral(literal: Literal): DataValue {
  const datatype = literal.datatype.value;

  if (literal.language && datatype === RDF_LANG_STRING) {
    return { type: 'monolingualtext', value: { language: literal.language, text: literal.value } };
  }

  switch (datatype) {
    case XSD.decimal:
      return { type: 'quantity', value: { amount: signedDecimal(literal.value), unit: UNITLESS } };
    case XSD.string:
      return { type: 'string', value: literal.value };
    case XSD.date:
    case XSD.dateTime:
      return {
        type: 'time',
        value: {
          time: formatTimestamp(literal.value),
          timezone: 0,
          before: 0,
          after: 0,
          precision: DAY_PRECISION,
          calendarmodel: GREGORIAN_CALENDAR,
        },
      };
    case GEO_WKT_LITERAL: {
      const match = WKT_POINT.exec(literal.value);
      if (!match) {
        throw new ResolutionError(`Invalid wktLiteral: ${literal.value}`, { value: literal.value });
      }
      return {
        type: 'globecoordinate',
        value: {
          latitude: parseCoordinate(match[2], literal.value),
          longitude: parseCoordinate(match[1], literal.value),
          altitude: null,
          precision: 0.0001,
          globe: EARTH_GLOBE,
        },
      };
    }
    default:
      throw new ResolutionError(`Unsupported literal datatype: ${datatype}`, { datatype });
  }
}

function literalField(graph: RdfGraph, node: GraphTerm, predicateIri: string, datatypes: string[]): Literal | undefined {
  if (node.termType !== 'BlankNode') {
    return undefined;
  }
  const term = graph.value(node, predicateIri);
  if (term === undefined) {
    return undefined;
  }
  if (term.termType !== 'Literal' || !datatypes.includes(term.datatype.value)) {
    throw new ResolutionError(`Expected ${datatypes.join(' or ')} literal for <${predicateIri}>`, {
      field: predicateIri,
    });
  }
  return term;
}

function iriField(graph: RdfGraph, node: GraphTerm, predicateIri: string): string | undefined {
  if (node.termType !== 'BlankNode') {
    return undefined;
  }
  const term = graph.value(node, predicateIri);
  if (term === undefined) {
    return undefined;
  }
  if (term.termType !== 'NamedNode') {
    throw new ResolutionError(`Expected IRI for <${predicateIri}>`, { field: predicateIri });
  }
  return term.value;
}

function resolveQuantityNode(graph: RdfGraph, node: GraphTerm): QuantityDataValue {
  const amount = literalField(graph, node, WIKIBASE.quantityAmount, [XSD.decimal]);
  const upperBound = literalField(graph, node, WIKIBASE.quantityUpperBound, [XSD.decimal]);
  const lowerBound = literalField(graph, node, WIKIBASE.quantityLowerBound, [XSD.decimal]);
  const unit = iriField(graph, node, WIKIBASE.quantityUnit);

  if (!amount) {
    throw new ResolutionError('missing required field: quantityAmount');
  }

  const value: QuantityValue = { amount: signedDecimal(amount.value), unit: unit ?? UNITLESS };
  if (upperBound) {
    value.upperBound = signedDecimal(upperBound.value);
  }
  if (lowerBound) {
    value.lowerBound = signedDecimal(lowerBound.value);
  }
  return { type: 'quantity', value };
}

function resolveTimeNode(graph: RdfGraph, node: GraphTerm): TimeDataValue {
  const time = literalField(graph, node, WIKIBASE.timeValue, [XSD.dateTime, XSD.date, XSD.string]);
  const precision = literalField(graph, node, WIKIBASE.timePrecision, [XSD.integer]);
  const timezone = literalField(graph, node, WIKIBASE.timeTimezone, [XSD.integer]);
  const calendarModel = iriField(graph, node, WIKIBASE.timeCalendarModel);

  if (!time) {
    throw new ResolutionError('missing required field: timeValue');
  }

  const value: TimeValue = {
    time: formatTimestamp(time.value),
    timezone: timezone ? parseInteger(timezone, 'timeTimezone') : 0,
    before: 0,
    after: 0,
    precision: DAY_PRECISION,
    calendarmodel: calendarModel ?? GREGORIAN_CALENDAR,
  };
  if (precision) {
    const parsed = parseInteger(precision, 'timePrecision');
    if (parsed < 0 || parsed > 14) {
      throw new ResolutionError(`Time precision out of range: ${precision.value}`, { precision: precision.value });
    }
    value.precision = parsed;
  }
  return { type: 'time', value };
}

/**
 * Resolve a graph term into a data value
 * @throws {ResolutionError} For any term shape without a Wikibase equivalent
 */
export function resolveValue(graph: RdfGraph, term: GraphTerm): DataValue {
  switch (term.termType) {
    case 'NamedNode':
      return resolveIri(term.value);
    case 'Literal':
      return resolveLiteral(term);
    case 'BlankNode': {
      const rdfType = graph.value(term, RDF_TYPE);
      if (rdfType?.termType === 'NamedNode' && rdfType.value === WIKIBASE.QuantityValue) {
        return resolveQuantityNode(graph, term);
      }
      if (rdfType?.termType === 'NamedNode' && rdfType.value === WIKIBASE.TimeValue) {
        return resolveTimeNode(graph, term);
      }
      throw new ResolutionError(`Unknown blank node type: ${rdfType?.value ?? 'none'}`);
    }
    default:
      throw new ResolutionError(`Unresolvable term: ${term.termType}`);
  }
}

/**
 * Resolve a term as a value snak of `propertyId`
 * @throws {ConsistencyError} When the property's datatype was not prefetched
 * @throws {DatatypeMismatchError} When the value type does not fit the datatype
 */
export function resolveSnak(
  graph: RdfGraph,
  propertyDatatypes: ReadonlyMap<string, string>,
  propertyId: string,
  term: GraphTerm
): ValueSnak {
  const datatype = propertyDatatypes.get(propertyId);
  if (datatype === undefined) {
    throw new ConsistencyError(`No datatype known for property ${propertyId}`, { propertyId });
  }
  if (!isKnownDataType(datatype)) {
    throw new ResolutionError(`Unsupported property datatype: ${datatype}`, { propertyId, datatype });
  }

  const datavalue = resolveValue(graph, term);
  if (datavalue.type !== DATA_TYPE_VALUE_TYPES[datatype]) {
    throw new DatatypeMismatchError(propertyId, datatype, datavalue.type);
  }

  return buildValueSnak(propertyId, datatype, datavalue);
}

export function buildValueSnak(propertyId: string, datatype: string, datavalue: DataValue): ValueSnak {
  return { snaktype: 'value', property: propertyId, datavalue, datatype };
}
