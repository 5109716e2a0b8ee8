/**
 * Patch Engine
 *
 * Visits every IRI subject of the graph once and applies its triples to the
 * working entity copies. Entity subjects (`wd:Q…`) add statements, statement
 * subjects (`wds:Q…-<uuid>`) mutate an existing statement in place.
 */

import type { NamedNode, Quad_Subject } from 'n3';
import { ResolutionError, StatementNotFoundError } from '../../types/errors.js';
import type { Item, Rank, Statement } from '../../types/wikibase.js';
import { isMissingEntity } from '../../types/wikibase.js';
import { addEditSummary, touchStatement, type ProcessContext } from './ProcessContext.js';
import type { GraphTerm } from './RdfGraph.js';
import { WIKIBASE } from './namespaces.js';
import { classifyPredicate, classifySubject } from './predicateClassifier.js';
import {
  appendQualifier,
  appendReference,
  buildReference,
  deleteQualifiers,
  newStatement,
  noValueSnak,
  propertyClaims,
  setExclusiveQualifier,
  setOnlyReference,
} from './snakBuilder.js';
import { resolveSnak, resolveValue } from './termResolver.js';
import { snakEquals } from './valueEquality.js';

const RANKS: ReadonlyMap<string, Rank> = new Map<string, Rank>([
  [WIKIBASE.NormalRank, 'normal'],
  [WIKIBASE.PreferredRank, 'preferred'],
  [WIKIBASE.DeprecatedRank, 'deprecated'],
]);

type Triple = [NamedNode, GraphTerm];

/**
 * Reference replacements run after reference additions on the same subject,
 * so an exclusive reference always ends up as the only one.
 */
function orderReferenceTriples(triples: Triple[]): Triple[] {
  const isExclusive = ([predicate]: Triple) => classifyPredicate(predicate.value).kind === 'onlyDerivedFrom';
  return [...triples.filter((triple) => !isExclusive(triple)), ...triples.filter(isExclusive)];
}

function summaryText(context: ProcessContext, object: GraphTerm): string | null {
  if (object.termType !== 'Literal') {
    context.logger.error({ object: object.value }, 'Edit summary must be a literal');
    return null;
  }
  return object.value;
}

/**
 * The working item for `entityId`, or undefined (with a warning) when it is
 * missing, deleted or was never fetched.
 */
function workingItem(context: ProcessContext, entityId: string): Item | undefined {
  const entity = context.entities.get(entityId);
  if (!entity || isMissingEntity(entity)) {
    context.logger.warn({ entityId }, `Skipping ${entityId}, entity is missing or deleted`);
    return undefined;
  }
  if (entity.type !== 'item') {
    context.logger.warn({ entityId, type: entity.type }, `Skipping ${entityId}, not an item`);
    return undefined;
  }
  return entity;
}

function findStatement(item: Item, guid: string): Statement | undefined {
  for (const statements of Object.values(item.claims)) {
    const statement = statements.find((candidate) => candidate.id === guid);
    if (statement) {
      return statement;
    }
  }
  return undefined;
}

/**
 * Apply the triples of a statement subject (or statement container node).
 * The statement enters the encounter order only once a triple changes it.
 */
export function updateStatement(
  context: ProcessContext,
  entityId: string,
  subject: Quad_Subject,
  statement: Statement
): void {
  let changed = false;

  for (const [predicate, object] of orderReferenceTriples(context.graph.predicateObjects(subject))) {
    const classified = classifyPredicate(predicate.value);

    switch (classified.kind) {
      case 'rank': {
        const rank = object.termType === 'NamedNode' ? RANKS.get(object.value) : undefined;
        if (!rank) {
          throw new ResolutionError(`Unknown rank: ${object.value}`, { rank: object.value });
        }
        if (statement.rank !== rank) {
          statement.rank = rank;
          changed = true;
        }
        break;
      }

      case 'statementValue': {
        if (classified.propertyId !== statement.mainsnak.property) {
          throw new ResolutionError(
            `Main value for ${classified.propertyId} on a ${statement.mainsnak.property} statement`,
            { statementId: statement.id }
          );
        }
        const snak = resolveSnak(context.graph, context.propertyDatatypes, classified.propertyId, object);
        if (!snakEquals(statement.mainsnak, snak)) {
          statement.mainsnak = snak;
          changed = true;
        }
        break;
      }

      case 'qualifier': {
        const snak = resolveSnak(context.graph, context.propertyDatatypes, classified.propertyId, object);
        changed = appendQualifier(statement, snak) || changed;
        break;
      }

      case 'qualifierExclusive': {
        if (context.graph.isEmptyNode(object)) {
          changed = deleteQualifiers(statement, classified.propertyId) || changed;
        } else {
          const snak = resolveSnak(context.graph, context.propertyDatatypes, classified.propertyId, object);
          changed = setExclusiveQualifier(statement, snak) || changed;
        }
        break;
      }

      case 'derivedFrom':
        changed = appendReference(statement, buildReference(context, object)) || changed;
        break;

      case 'onlyDerivedFrom':
        changed = setOnlyReference(statement, buildReference(context, object)) || changed;
        break;

      case 'editSummary': {
        const text = summaryText(context, object);
        if (text !== null) {
          addEditSummary(context, entityId, text);
        }
        break;
      }

      default:
        context.logger.error(
          { statementId: statement.id, predicate: predicate.value, object: object.value },
          'NotImplemented: unhandled statement triple'
        );
    }
  }

  if (changed) {
    touchStatement(context, entityId, statement.id);
  }
}

/**
 * Build a new statement from a `p:` container node and append it
 */
function addContainedStatement(
  context: ProcessContext,
  item: Item,
  propertyId: string,
  node: Quad_Subject
): void {
  const placeholder = noValueSnak(propertyId);
  const statement = newStatement(item.id, placeholder);
  propertyClaims(item, propertyId).push(statement);

  updateStatement(context, item.id, node, statement);

  if (statement.mainsnak === placeholder) {
    throw new ResolutionError(`New ${propertyId} statement on ${item.id} has no main value`, {
      entityId: item.id,
      propertyId,
    });
  }
}

function addDirectValue(context: ProcessContext, item: Item, propertyId: string, object: GraphTerm): void {
  const snak = resolveSnak(context.graph, context.propertyDatatypes, propertyId, object);
  const claims = propertyClaims(item, propertyId);
  const matches = claims.filter((statement) => snakEquals(statement.mainsnak, snak));

  if (matches.some((statement) => statement.rank !== 'deprecated')) {
    return;
  }
  if (matches.length > 0) {
    context.logger.warn(
      { entityId: item.id, propertyId, statementId: matches[0].id },
      `${item.id} ${propertyId} value only exists on a deprecated statement, not adding`
    );
    return;
  }

  const statement = newStatement(item.id, snak);
  claims.push(statement);
  touchStatement(context, item.id, statement.id);
}

export function updateEntity(context: ProcessContext, entityId: string, subject: Quad_Subject): void {
  const item = workingItem(context, entityId);
  if (!item) {
    return;
  }

  for (const [predicate, object] of context.graph.predicateObjects(subject)) {
    const classified = classifyPredicate(predicate.value);

    if (classified.kind === 'directValue') {
      addDirectValue(context, item, classified.propertyId, object);
    } else if (classified.kind === 'statementContainer' && object.termType === 'BlankNode') {
      addContainedStatement(context, item, classified.propertyId, object);
    } else if (classified.kind === 'editSummary') {
      const text = summaryText(context, object);
      if (text !== null) {
        addEditSummary(context, entityId, text);
      }
    } else {
      context.logger.error(
        { entityId, predicate: predicate.value, object: object.value },
        'NotImplemented: unhandled entity triple'
      );
    }
  }
}

function updateStatementSubject(context: ProcessContext, entityId: string, guid: string, subject: Quad_Subject): void {
  const item = workingItem(context, entityId);
  if (!item) {
    return;
  }
  const statement = findStatement(item, guid);
  if (!statement) {
    throw new StatementNotFoundError(guid, entityId);
  }
  updateStatement(context, entityId, subject, statement);
}

/**
 * Resolve and log every asserted value of the value-assertion subject
 */
function checkValueAssertions(context: ProcessContext, subject: Quad_Subject): void {
  for (const [predicate, object] of context.graph.predicateObjects(subject)) {
    if (classifyPredicate(predicate.value).kind !== 'assertValue') {
      context.logger.error({ predicate: predicate.value }, 'NotImplemented: unhandled assertion triple');
      continue;
    }
    const value = resolveValue(context.graph, object);
    context.logger.info({ value }, `Resolved ${object.value} as ${value.type}`);
  }
}

/**
 * Run the patch pass over every subject of the graph
 */
export function applyPatch(context: ProcessContext): void {
  for (const subject of context.graph.subjects()) {
    if (subject.termType !== 'NamedNode') {
      // blank nodes are reached through their parents
      continue;
    }

    const classified = classifySubject(subject.value);
    switch (classified.kind) {
      case 'entity':
        updateEntity(context, classified.entityId, subject);
        break;
      case 'statement':
        updateStatementSubject(context, classified.entityId, classified.guid, subject);
        break;
      case 'valueAssertion':
        checkValueAssertions(context, subject);
        break;
      case 'unknown':
        context.logger.error({ subject: subject.value }, 'NotImplemented: unhandled subject');
        break;
    }
  }
}
