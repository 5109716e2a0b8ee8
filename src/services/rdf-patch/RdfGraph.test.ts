import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';
import { RdfSyntaxError } from '../../types/errors.js';
import { RdfGraph } from './RdfGraph.js';

const { namedNode } = DataFactory;

describe('RdfGraph', () => {
  it('parses Turtle with the standard prefixes predeclared', () => {
    const graph = RdfGraph.parse('wd:Q42 wdt:P31 wd:Q5 ; wdt:P4947 "278" .');

    expect(graph.size).toBe(2);
    expect(graph.subjects().map((subject) => subject.value)).toEqual(['http://www.wikidata.org/entity/Q42']);
  });

  it('can parse without the prefix header', () => {
    const graph = RdfGraph.parse('<https://example.org/a> <https://example.org/b> "c" .', { withPrefixes: false });
    expect(graph.size).toBe(1);
    expect(() => RdfGraph.parse('wd:Q42 wdt:P31 wd:Q5 .', { withPrefixes: false })).toThrow(RdfSyntaxError);
  });

  it('returns predicate/object pairs in first-seen predicate order', () => {
    const graph = RdfGraph.parse(`
      wd:Q1 schema:b "1" .
      wd:Q2 schema:a "2" ; schema:b "3" .
    `);

    const pairs = graph.predicateObjects(namedNode('http://www.wikidata.org/entity/Q2'));
    expect(pairs.map(([predicate, object]) => [predicate.value, object.value])).toEqual([
      ['http://schema.org/b', '3'],
      ['http://schema.org/a', '2'],
    ]);
  });

  it('looks up single values', () => {
    const graph = RdfGraph.parse('wd:Q1 schema:name "one" .');
    const subject = namedNode('http://www.wikidata.org/entity/Q1');

    expect(graph.value(subject, 'http://schema.org/name')?.value).toBe('one');
    expect(graph.value(subject, 'http://schema.org/description')).toBeUndefined();
  });

  it('detects empty blank nodes', () => {
    const graph = RdfGraph.parse('wd:Q1 schema:empty [] ; schema:full [ schema:name "x" ] .');
    const subject = namedNode('http://www.wikidata.org/entity/Q1');
    const empty = graph.value(subject, 'http://schema.org/empty');
    const full = graph.value(subject, 'http://schema.org/full');

    expect(empty && graph.isEmptyNode(empty)).toBe(true);
    expect(full && graph.isEmptyNode(full)).toBe(false);
    expect(graph.isEmptyNode(subject)).toBe(false);
  });

  it('collects IRIs from every position', () => {
    const graph = RdfGraph.parse('wd:Q1 wdt:P31 wd:Q5 ; schema:name "x" .');
    expect([...graph.iris()].sort()).toEqual([
      'http://schema.org/name',
      'http://www.wikidata.org/entity/Q1',
      'http://www.wikidata.org/entity/Q5',
      'http://www.wikidata.org/prop/direct/P31',
    ]);
  });

  it('wraps parser errors', () => {
    expect(() => RdfGraph.parse('wd:Q1 wdt:P31')).toThrow(RdfSyntaxError);
  });
});
