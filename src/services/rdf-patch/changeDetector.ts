/**
 * Change Detector
 *
 * Compares the working entities against the fetched snapshot and emits one
 * edit per entity with net changes. The only place that decides what gets
 * submitted.
 */

import { isDeepStrictEqual } from 'node:util';
import type { Entity, MissingEntity, Statement } from '../../types/wikibase.js';
import { isMissingEntity } from '../../types/wikibase.js';
import { editSummary, type ProcessContext } from './ProcessContext.js';

export interface EntityEdit {
  entityId: string;
  /** `lastrevid` of the entity when it was fetched */
  baseRevisionId: number;
  statements: Statement[];
  summary: string | null;
}

function statementsById(entities: ReadonlyMap<string, Entity | MissingEntity>): Map<string, Statement> {
  const byId = new Map<string, Statement>();
  for (const entity of entities.values()) {
    if (isMissingEntity(entity)) {
      continue;
    }
    for (const statements of Object.values(entity.claims)) {
      for (const statement of statements) {
        byId.set(statement.id, statement);
      }
    }
  }
  return byId;
}

/**
 * Statement ids per entity in encounter order: statements the patch pass
 * changed first, then any other statement of the working entities.
 */
function candidateStatementIds(context: ProcessContext): Map<string, Set<string>> {
  const candidates = new Map<string, Set<string>>();
  for (const [entityId, statementIds] of context.touchedStatements) {
    candidates.set(entityId, new Set(statementIds));
  }
  for (const [entityId, entity] of context.entities) {
    if (isMissingEntity(entity)) {
      continue;
    }
    let statementIds = candidates.get(entityId);
    for (const statements of Object.values(entity.claims)) {
      for (const statement of statements) {
        if (!statementIds) {
          statementIds = new Set();
          candidates.set(entityId, statementIds);
        }
        statementIds.add(statement.id);
      }
    }
  }
  return candidates;
}

function isChanged(statement: Statement, original: Statement | undefined): boolean {
  if (!statement.id || !original) {
    return true;
  }
  return !isDeepStrictEqual(statement, original);
}

/**
 * Build the edit list for a finished patch pass
 *
 * @param blocklist - Entity ids that must never be edited
 */
export function detectChanges(context: ProcessContext, blocklist: ReadonlySet<string> = new Set()): EntityEdit[] {
  const originals = statementsById(context.originalEntities);
  const working = statementsById(context.entities);
  const edits: EntityEdit[] = [];

  for (const [entityId, statementIds] of candidateStatementIds(context)) {
    const changed: Statement[] = [];
    for (const statementId of statementIds) {
      const statement = working.get(statementId);
      if (statement && isChanged(statement, originals.get(statementId))) {
        changed.push(statement);
      }
    }
    if (changed.length === 0) {
      continue;
    }

    if (blocklist.has(entityId)) {
      context.logger.warn({ entityId }, `Skipping edit, ${entityId} is blocked`);
      continue;
    }

    const original = context.originalEntities.get(entityId);
    if (!original || isMissingEntity(original)) {
      continue;
    }

    edits.push({
      entityId,
      baseRevisionId: original.lastrevid,
      statements: changed,
      summary: editSummary(context, entityId),
    });
  }

  context.logger.debug({ edits: edits.length }, 'Detected changed entities');
  return edits;
}
