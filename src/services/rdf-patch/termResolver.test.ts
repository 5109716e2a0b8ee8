import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';
import { ConsistencyError, DatatypeMismatchError, ResolutionError } from '../../types/errors.js';
import { RdfGraph } from './RdfGraph.js';
import { formatTimestamp, resolveSnak, resolveValue, signedDecimal } from './termResolver.js';

/**
 * Resolve the object of `wd:Q1 schema:value <object>`
 */
function resolveObject(object: string) {
  const graph = RdfGraph.parse(`wd:Q1 schema:value ${object} .`);
  const value = graph.value(DataFactory.namedNode('http://www.wikidata.org/entity/Q1'), 'http://schema.org/value');
  if (!value) {
    throw new Error('test document has no object');
  }
  return { graph, term: value };
}

function resolve(object: string) {
  const { graph, term } = resolveObject(object);
  return resolveValue(graph, term);
}

describe('signedDecimal', () => {
  it('adds a plus sign to unsigned amounts', () => {
    expect(signedDecimal('42')).toBe('+42');
    expect(signedDecimal('0.5')).toBe('+0.5');
  });

  it('keeps an explicit sign', () => {
    expect(signedDecimal('-3')).toBe('-3');
    expect(signedDecimal('+7')).toBe('+7');
  });

  it('normalises the lexical form', () => {
    expect(signedDecimal('05')).toBe('+5');
    expect(signedDecimal('0142')).toBe('+142');
    expect(signedDecimal('.5')).toBe('+0.5');
    expect(signedDecimal('5.')).toBe('+5');
    expect(signedDecimal('-007.25')).toBe('-7.25');
    expect(signedDecimal('000')).toBe('+0');
  });

  it('rejects values that are not decimals', () => {
    expect(() => signedDecimal('.')).toThrow('Invalid decimal value: .');
    expect(() => signedDecimal('1.2.3')).toThrow(ResolutionError);
    expect(() => signedDecimal('ten')).toThrow(ResolutionError);
  });
});

describe('formatTimestamp', () => {
  it('pads a date to midnight UTC', () => {
    expect(formatTimestamp('1994-09-23')).toBe('+1994-09-23T00:00:00Z');
  });

  it('drops fractional seconds and offsets', () => {
    expect(formatTimestamp('2020-01-02T03:04:05.678+02:00')).toBe('+2020-01-02T03:04:05Z');
  });

  it('keeps a negative year', () => {
    expect(formatTimestamp('-0500-01-01')).toBe('-0500-01-01T00:00:00Z');
  });

  it('rejects anything else', () => {
    expect(() => formatTimestamp('yesterday')).toThrow('Invalid date/time value: yesterday');
  });
});

describe('resolveValue', () => {
  it('resolves item and property IRIs to entity ids', () => {
    expect(resolve('wd:Q42')).toEqual({
      type: 'wikibase-entityid',
      value: { 'entity-type': 'item', 'numeric-id': 42, id: 'Q42' },
    });
    expect(resolve('wd:P31')).toEqual({
      type: 'wikibase-entityid',
      value: { 'entity-type': 'property', 'numeric-id': 31, id: 'P31' },
    });
  });

  it('resolves Commons file paths to decoded file names', () => {
    expect(resolve('<http://commons.wikimedia.org/wiki/Special:FilePath/Shawshank%20Poster.jpg>')).toEqual({
      type: 'string',
      value: 'Shawshank Poster.jpg',
    });
  });

  it('resolves IRIs outside known namespaces to strings', () => {
    expect(resolve('<https://example.org/page>')).toEqual({ type: 'string', value: 'https://example.org/page' });
  });

  it('rejects IRIs in a known namespace without a value mapping', () => {
    expect(() => resolve('wdt:P31')).toThrow(
      'Unknown URI: wdt:P31 <http://www.wikidata.org/prop/direct/P31>'
    );
  });

  it('resolves plain and language-tagged literals', () => {
    expect(resolve('"tt0111161"')).toEqual({ type: 'string', value: 'tt0111161' });
    expect(resolve('"Die Verurteilten"@de')).toEqual({
      type: 'monolingualtext',
      value: { language: 'de', text: 'Die Verurteilten' },
    });
  });

  it('resolves decimals as unitless quantities', () => {
    expect(resolve('"2.5"^^xsd:decimal')).toEqual({ type: 'quantity', value: { amount: '+2.5', unit: '1' } });
    expect(resolve('"05"^^xsd:decimal')).toEqual({ type: 'quantity', value: { amount: '+5', unit: '1' } });
  });

  it('resolves dates as day precision Gregorian times', () => {
    expect(resolve('"2001-02-03T04:05:06Z"^^xsd:dateTime')).toEqual({
      type: 'time',
      value: {
        time: '+2001-02-03T04:05:06Z',
        timezone: 0,
        before: 0,
        after: 0,
        precision: 11,
        calendarmodel: 'http://www.wikidata.org/entity/Q1985727',
      },
    });
  });

  it('resolves WKT points as coordinates on Earth', () => {
    expect(resolve('"Point(2.3522 48.8566)"^^geo:wktLiteral')).toEqual({
      type: 'globecoordinate',
      value: {
        latitude: 48.8566,
        longitude: 2.3522,
        altitude: null,
        precision: 0.0001,
        globe: 'http://www.wikidata.org/entity/Q2',
      },
    });
  });

  it('rejects malformed WKT and unsupported literal types', () => {
    expect(() => resolve('"LINESTRING(0 0, 1 1)"^^geo:wktLiteral')).toThrow(ResolutionError);
    expect(() => resolve('"Point(- 1.2.3)"^^geo:wktLiteral')).toThrow('Invalid wktLiteral: Point(- 1.2.3)');
    expect(() => resolve('"Point(1-2 3)"^^geo:wktLiteral')).toThrow(ResolutionError);
    expect(() => resolve('true')).toThrow(
      'Unsupported literal datatype: http://www.w3.org/2001/XMLSchema#boolean'
    );
  });

  it('resolves quantity nodes with bounds and unit', () => {
    expect(
      resolve(`[
        a wikibase:QuantityValue ;
        wikibase:quantityAmount "10"^^xsd:decimal ;
        wikibase:quantityUpperBound "11"^^xsd:decimal ;
        wikibase:quantityLowerBound "-9"^^xsd:decimal ;
        wikibase:quantityUnit wd:Q11573
      ]`)
    ).toEqual({
      type: 'quantity',
      value: {
        amount: '+10',
        unit: 'http://www.wikidata.org/entity/Q11573',
        upperBound: '+11',
        lowerBound: '-9',
      },
    });
  });

  it('normalises quantity node amounts and bounds', () => {
    expect(
      resolve(`[
        a wikibase:QuantityValue ;
        wikibase:quantityAmount "0142"^^xsd:decimal ;
        wikibase:quantityUpperBound ".5"^^xsd:decimal ;
        wikibase:quantityLowerBound "-05."^^xsd:decimal
      ]`)
    ).toEqual({
      type: 'quantity',
      value: { amount: '+142', unit: '1', upperBound: '+0.5', lowerBound: '-5' },
    });
  });

  it('requires a quantity amount', () => {
    expect(() => resolve('[ a wikibase:QuantityValue ; wikibase:quantityUnit wd:Q11573 ]')).toThrow(
      'missing required field: quantityAmount'
    );
  });

  it('rejects quantity fields of the wrong type', () => {
    expect(() => resolve('[ a wikibase:QuantityValue ; wikibase:quantityAmount "ten" ]')).toThrow(ResolutionError);
  });

  it('resolves time nodes with precision, timezone and calendar', () => {
    expect(
      resolve(`[
        a wikibase:TimeValue ;
        wikibase:timeValue "1994-01-01"^^xsd:date ;
        wikibase:timePrecision 9 ;
        wikibase:timeTimezone 60 ;
        wikibase:timeCalendarModel wd:Q1985786
      ]`)
    ).toEqual({
      type: 'time',
      value: {
        time: '+1994-01-01T00:00:00Z',
        timezone: 60,
        before: 0,
        after: 0,
        precision: 9,
        calendarmodel: 'http://www.wikidata.org/entity/Q1985786',
      },
    });
  });

  it('rejects out of range time precision', () => {
    expect(() =>
      resolve('[ a wikibase:TimeValue ; wikibase:timeValue "1994-01-01"^^xsd:date ; wikibase:timePrecision 15 ]')
    ).toThrow('Time precision out of range: 15');
  });

  it('rejects a non-integer time zone', () => {
    expect(() =>
      resolve('[ a wikibase:TimeValue ; wikibase:timeValue "1994-01-01"^^xsd:date ; wikibase:timeTimezone "UTC"^^xsd:integer ]')
    ).toThrow('Invalid timeTimezone: UTC');
  });

  it('requires a time value', () => {
    expect(() => resolve('[ a wikibase:TimeValue ; wikibase:timePrecision 9 ]')).toThrow(
      'missing required field: timeValue'
    );
  });

  it('rejects untyped blank nodes', () => {
    expect(() => resolve('[ schema:name "x" ]')).toThrow('Unknown blank node type: none');
  });
});

describe('resolveSnak', () => {
  const datatypes = new Map([
    ['P31', 'wikibase-item'],
    ['P4947', 'external-id'],
    ['P9999', 'entity-schema'],
  ]);

  it('builds a value snak carrying the property datatype', () => {
    const { graph, term } = resolveObject('"278"');
    expect(resolveSnak(graph, datatypes, 'P4947', term)).toEqual({
      snaktype: 'value',
      property: 'P4947',
      datavalue: { type: 'string', value: '278' },
      datatype: 'external-id',
    });
  });

  it('rejects values that do not fit the datatype', () => {
    const { graph, term } = resolveObject('"Q5"');
    expect(() => resolveSnak(graph, datatypes, 'P31', term)).toThrow(DatatypeMismatchError);
  });

  it('rejects properties without a known datatype', () => {
    const { graph, term } = resolveObject('"x"');
    expect(() => resolveSnak(graph, datatypes, 'P1', term)).toThrow(ConsistencyError);
  });

  it('rejects unsupported datatypes', () => {
    const { graph, term } = resolveObject('"x"');
    expect(() => resolveSnak(graph, datatypes, 'P9999', term)).toThrow('Unsupported property datatype: entity-schema');
  });
});
