/**
 * Snak, qualifier, reference and statement builders
 *
 * Mutators only create `qualifiers`, `qualifiers-order` and `references`
 * when something is actually added, so untouched statements stay
 * structurally equal to their fetched form.
 */

import { randomUUID } from 'node:crypto';
import { ResolutionError } from '../../types/errors.js';
import type { Item, NoValueSnak, Rank, Reference, Snak, Statement } from '../../types/wikibase.js';
import type { ProcessContext } from './ProcessContext.js';
import type { GraphTerm } from './RdfGraph.js';
import { classifyPredicate } from './predicateClassifier.js';
import { resolveSnak } from './termResolver.js';
import { anyReferenceEquals, anySnakEquals, onlySnakEquals, referenceEquals } from './valueEquality.js';

export function newStatement(entityId: string, mainsnak: Snak, rank: Rank = 'normal'): Statement {
  return {
    id: `${entityId}$${randomUUID()}`,
    type: 'statement',
    rank,
    mainsnak,
  };
}

export function noValueSnak(propertyId: string): NoValueSnak {
  return { snaktype: 'novalue', property: propertyId };
}

/**
 * Statements of `propertyId` on the item, creating the bucket when absent
 */
export function propertyClaims(item: Item, propertyId: string): Statement[] {
  let claims = item.claims[propertyId];
  if (!claims) {
    claims = [];
    item.claims[propertyId] = claims;
  }
  return claims;
}

function qualifierBucket(statement: Statement, propertyId: string): Snak[] {
  const qualifiers = (statement.qualifiers ??= {});
  const order = (statement['qualifiers-order'] ??= []);
  let bucket = qualifiers[propertyId];
  if (!bucket) {
    bucket = [];
    qualifiers[propertyId] = bucket;
  }
  if (!order.includes(propertyId)) {
    order.push(propertyId);
  }
  return bucket;
}

/**
 * Append a qualifier unless an equal one is already present
 * @returns Whether the statement changed
 */
export function appendQualifier(statement: Statement, snak: Snak): boolean {
  if (anySnakEquals(statement.qualifiers?.[snak.property] ?? [], snak)) {
    return false;
  }
  qualifierBucket(statement, snak.property).push(snak);
  return true;
}

/**
 * Make `snak` the only qualifier of its property
 * @returns Whether the statement changed
 */
export function setExclusiveQualifier(statement: Statement, snak: Snak): boolean {
  if (onlySnakEquals(statement.qualifiers?.[snak.property] ?? [], snak)) {
    return false;
  }
  const bucket = qualifierBucket(statement, snak.property);
  bucket.splice(0, bucket.length, snak);
  return true;
}

/**
 * Remove every qualifier of `propertyId` along with its order entry
 * @returns Whether the statement changed
 */
export function deleteQualifiers(statement: Statement, propertyId: string): boolean {
  let changed = false;

  if (statement.qualifiers && propertyId in statement.qualifiers) {
    delete statement.qualifiers[propertyId];
    changed = true;
    if (Object.keys(statement.qualifiers).length === 0) {
      delete statement.qualifiers;
    }
  }

  const order = statement['qualifiers-order'];
  if (order) {
    const index = order.indexOf(propertyId);
    if (index !== -1) {
      order.splice(index, 1);
      changed = true;
    }
    if (order.length === 0) {
      delete statement['qualifiers-order'];
    }
  }

  return changed;
}

/**
 * Append a reference unless an equal one is already present
 * @returns Whether the statement changed
 */
export function appendReference(statement: Statement, reference: Reference): boolean {
  const references = statement.references ?? [];
  if (anyReferenceEquals(references, reference)) {
    return false;
  }
  statement.references = [...references, reference];
  return true;
}

/**
 * Replace the reference list with `reference` unless it already is exactly that
 * @returns Whether the statement changed
 */
export function setOnlyReference(statement: Statement, reference: Reference): boolean {
  const references = statement.references ?? [];
  if (references.length === 1 && referenceEquals(references[0], reference)) {
    return false;
  }
  statement.references = [reference];
  return true;
}

/**
 * Build a reference from the `pr:`/`prv:` triples of a reference node.
 * Property ids keep the order they first appear in; snaks of the same
 * property are grouped.
 */
export function buildReference(context: ProcessContext, node: GraphTerm): Reference {
  if (node.termType !== 'BlankNode') {
    throw new ResolutionError(`Reference must be a blank node, got ${node.termType} ${node.value}`);
  }

  const reference: Reference = { snaks: {}, 'snaks-order': [] };

  for (const [predicate, object] of context.graph.predicateObjects(node)) {
    const classified = classifyPredicate(predicate.value);
    if (classified.kind !== 'referenceValue') {
      context.logger.error({ predicate: predicate.value }, 'Unhandled reference triple');
      continue;
    }

    const { propertyId } = classified;
    const snak = resolveSnak(context.graph, context.propertyDatatypes, propertyId, object);
    let snaks = reference.snaks[propertyId];
    if (!snaks) {
      snaks = [];
      reference.snaks[propertyId] = snaks;
      reference['snaks-order'].push(propertyId);
    }
    snaks.push(snak);
  }

  if (reference['snaks-order'].length === 0) {
    throw new ResolutionError('Reference has no snaks');
  }
  return reference;
}
