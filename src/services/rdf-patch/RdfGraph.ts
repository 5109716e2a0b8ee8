/**
 * RdfGraph - in-memory triple store for one patch document
 *
 * Thin wrapper over an n3 Store with the handful of queries the patch
 * engine needs. Iteration follows the order terms first appear in the
 * document.
 */

import { DataFactory, Parser, Store } from 'n3';
import type { NamedNode, Quad_Object, Quad_Subject } from 'n3';
import { RdfSyntaxError } from '../../types/errors.js';
import { PREFIXES } from './namespaces.js';

const { namedNode } = DataFactory;

export type GraphTerm = Quad_Object;

export interface ParseOptions {
  /** Prepend the standard prefix header (default: true) */
  withPrefixes?: boolean;
}

export class RdfGraph {
  private constructor(private readonly store: Store) {}

  /**
   * Parse a Turtle document
   * @throws {RdfSyntaxError} When the document is not valid Turtle
   */
  static parse(text: string, options: ParseOptions = {}): RdfGraph {
    const { withPrefixes = true } = options;
    const parser = new Parser();
    const store = new Store();
    try {
      store.addQuads(parser.parse(withPrefixes ? PREFIXES + text : text));
    } catch (error) {
      throw new RdfSyntaxError(error instanceof Error ? error.message : String(error));
    }
    return new RdfGraph(store);
  }

  get size(): number {
    return this.store.size;
  }

  subjects(): Quad_Subject[] {
    return this.store.getSubjects(null, null, null);
  }

  predicateObjects(subject: Quad_Subject): Array<[NamedNode, GraphTerm]> {
    const pairs: Array<[NamedNode, GraphTerm]> = [];
    for (const quad of this.store.getQuads(subject, null, null, null)) {
      if (quad.predicate.termType === 'NamedNode') {
        pairs.push([quad.predicate, quad.object]);
      }
    }
    return pairs;
  }

  /**
   * First object of `subject predicate ?o`, if any
   */
  value(subject: Quad_Subject, predicateIri: string): GraphTerm | undefined {
    return this.store.getObjects(subject, namedNode(predicateIri), null)[0];
  }

  /**
   * A blank node with no outgoing triples (`[]`)
   */
  isEmptyNode(term: GraphTerm): boolean {
    return term.termType === 'BlankNode' && this.store.countQuads(term, null, null, null) === 0;
  }

  /**
   * Every distinct IRI in subject, predicate or object position
   */
  iris(): Set<string> {
    const iris = new Set<string>();
    for (const quad of this.store.getQuads(null, null, null, null)) {
      for (const term of [quad.subject, quad.predicate, quad.object]) {
        if (term.termType === 'NamedNode') {
          iris.add(term.value);
        }
      }
    }
    return iris;
  }
}
