import type { Logger } from '../../utils/logger.js';
import type { Entity, MissingEntity } from '../../types/wikibase.js';
import type { RdfGraph } from './RdfGraph.js';

/**
 * Per-run state of one processGraph call. Nothing here outlives the run.
 */
export interface ProcessContext {
  graph: RdfGraph;
  propertyDatatypes: ReadonlyMap<string, string>;
  /** Snapshot as fetched; never mutated */
  originalEntities: ReadonlyMap<string, Entity | MissingEntity>;
  /** Deep copy of originalEntities that the patch pass mutates */
  entities: Map<string, Entity | MissingEntity>;
  /** Entity id → edit summary texts */
  editSummaries: Map<string, Set<string>>;
  /** Entity id → ids of changed statements, in the order they first changed */
  touchedStatements: Map<string, Set<string>>;
  logger: Logger;
}

export function createProcessContext(
  graph: RdfGraph,
  entities: ReadonlyMap<string, Entity | MissingEntity>,
  propertyDatatypes: ReadonlyMap<string, string>,
  logger: Logger
): ProcessContext {
  return {
    graph,
    propertyDatatypes,
    originalEntities: entities,
    entities: structuredClone(new Map(entities)),
    editSummaries: new Map(),
    touchedStatements: new Map(),
    logger,
  };
}

export function addEditSummary(context: ProcessContext, entityId: string, text: string): void {
  let summaries = context.editSummaries.get(entityId);
  if (!summaries) {
    summaries = new Set();
    context.editSummaries.set(entityId, summaries);
  }
  summaries.add(text);
}

export function touchStatement(context: ProcessContext, entityId: string, statementId: string): void {
  let statementIds = context.touchedStatements.get(entityId);
  if (!statementIds) {
    statementIds = new Set();
    context.touchedStatements.set(entityId, statementIds);
  }
  statementIds.add(statementId);
}

/**
 * Recorded summaries, sorted and joined; null when none were recorded
 */
export function editSummary(context: ProcessContext, entityId: string): string | null {
  const summaries = context.editSummaries.get(entityId);
  if (!summaries || summaries.size === 0) {
    return null;
  }
  return [...summaries].sort().join(', ');
}
