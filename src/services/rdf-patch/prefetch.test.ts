import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { MockEntityLookup } from '../mocks/MockEntityLookup.js';
import { ConsistencyError } from '../../types/errors.js';
import type { Property } from '../../types/wikibase.js';
import { RdfGraph } from './RdfGraph.js';
import { batchIds, collectReferencedIds, prefetch } from './prefetch.js';

const logger = pino({ level: 'silent' });

function property(id: string, datatype: string): Property {
  return { type: 'property', id, lastrevid: 1, datatype, claims: {} };
}

describe('collectReferencedIds', () => {
  it('collects item and property ids from known namespaces', () => {
    const graph = RdfGraph.parse(`
      wd:Q1 wdt:P31 wd:Q5 ; p:P4947 [ ps:P4947 "1" ] .
      wds:q7-abc pq:P580 "2000-01-01"^^xsd:date .
      <https://example.org/Q9> schema:about wd:P17 .
    `);

    const { itemIds, propertyIds } = collectReferencedIds(graph);
    expect([...itemIds].sort()).toEqual(['Q1', 'Q5', 'Q7']);
    expect([...propertyIds].sort()).toEqual(['P17', 'P31', 'P4947', 'P580']);
  });
});

describe('batchIds', () => {
  it('sorts and splits ids into batches', () => {
    expect(batchIds(['Q3', 'Q1', 'Q2'], 2)).toEqual([['Q1', 'Q2'], ['Q3']]);
    expect(batchIds([])).toEqual([]);
  });

  it('uses batches of 50 by default', () => {
    const ids = Array.from({ length: 120 }, (_, i) => `Q${1000 + i}`);
    expect(batchIds(ids).map((batch) => batch.length)).toEqual([50, 50, 20]);
  });
});

describe('prefetch', () => {
  it('fetches items and property datatypes', async () => {
    const lookup = new MockEntityLookup([
      { type: 'item', id: 'Q1', lastrevid: 7, claims: {} },
      property('P31', 'wikibase-item'),
    ]);
    const graph = RdfGraph.parse('wd:Q1 wdt:P31 wd:Q5 .');

    const { entities, propertyDatatypes } = await prefetch(graph, lookup, logger);

    expect(lookup.requests).toEqual([['Q1', 'Q5'], ['P31']]);
    expect(entities.get('Q1')).toEqual({ type: 'item', id: 'Q1', lastrevid: 7, claims: {} });
    expect(entities.get('Q5')).toEqual({ id: 'Q5', missing: true });
    expect(propertyDatatypes).toEqual(new Map([['P31', 'wikibase-item']]));
  });

  it('splits large documents into several requests', async () => {
    const lookup = new MockEntityLookup([property('P31', 'wikibase-item')]);
    const objects = Array.from({ length: 60 }, (_, i) => `wd:Q${100 + i}`).join(', ');
    await prefetch(RdfGraph.parse(`wd:Q1 wdt:P31 ${objects} .`), lookup, logger);

    expect(lookup.requests.map((batch) => batch.length)).toEqual([50, 11, 1]);
  });

  it('skips missing properties', async () => {
    const lookup = new MockEntityLookup();
    const { propertyDatatypes } = await prefetch(RdfGraph.parse('wd:Q1 wdt:P31 wd:Q5 .'), lookup, logger);
    expect(propertyDatatypes.size).toBe(0);
  });

  it('rejects an item id that resolves to a property', async () => {
    const lookup = new MockEntityLookup([property('Q1', 'string')]);
    await expect(prefetch(RdfGraph.parse('wd:Q1 schema:name "x" .'), lookup, logger)).rejects.toBeInstanceOf(
      ConsistencyError
    );
  });
});
