/**
 * Prefetch Layer
 *
 * Collects every item and property id the document mentions and fetches
 * them in batches before the patch pass starts.
 */

import type { Logger } from '../../utils/logger.js';
import { ConsistencyError } from '../../types/errors.js';
import type { Entity, MissingEntity } from '../../types/wikibase.js';
import { isMissingEntity } from '../../types/wikibase.js';
import { MAX_IDS_PER_LOOKUP, type EntityLookup } from './EntityLookup.js';
import type { RdfGraph } from './RdfGraph.js';
import { compactIri } from './namespaces.js';
import { isItemId, isPropertyId, parseStatementLocalName } from './predicateClassifier.js';

export interface ReferencedIds {
  itemIds: Set<string>;
  propertyIds: Set<string>;
}

export interface PrefetchResult {
  entities: Map<string, Entity | MissingEntity>;
  propertyDatatypes: Map<string, string>;
}

/**
 * Item and property ids of every IRI in a known namespace.
 * Statement local names (`Q42-…`, `q42-…`) contribute their item id.
 */
export function collectReferencedIds(graph: RdfGraph): ReferencedIds {
  const itemIds = new Set<string>();
  const propertyIds = new Set<string>();

  for (const iri of graph.iris()) {
    const { prefix, localName } = compactIri(iri);
    if (prefix === '') {
      continue;
    }
    if (isItemId(localName)) {
      itemIds.add(localName);
    } else if (isPropertyId(localName)) {
      propertyIds.add(localName);
    } else {
      const statement = parseStatementLocalName(localName);
      if (statement) {
        itemIds.add(statement.entityId);
      }
    }
  }

  return { itemIds, propertyIds };
}

export function batchIds(ids: Iterable<string>, size: number = MAX_IDS_PER_LOOKUP): string[][] {
  const sorted = [...ids].sort();
  const batches: string[][] = [];
  for (let i = 0; i < sorted.length; i += size) {
    batches.push(sorted.slice(i, i + size));
  }
  return batches;
}

async function fetchAll(lookup: EntityLookup, ids: Set<string>): Promise<Map<string, Entity | MissingEntity>> {
  const entities = new Map<string, Entity | MissingEntity>();
  for (const batch of batchIds(ids)) {
    const fetched = await lookup.getEntities(batch);
    for (const [id, entity] of fetched) {
      entities.set(id, entity);
    }
  }
  return entities;
}

export async function prefetch(graph: RdfGraph, lookup: EntityLookup, logger: Logger): Promise<PrefetchResult> {
  const { itemIds, propertyIds } = collectReferencedIds(graph);

  const entities = new Map<string, Entity | MissingEntity>();
  if (itemIds.size === 0) {
    logger.debug('No items prefetched');
  } else {
    for (const [id, entity] of await fetchAll(lookup, itemIds)) {
      if (!isMissingEntity(entity) && entity.type !== 'item') {
        throw new ConsistencyError(`Expected ${id} to be an item, got ${entity.type}`, { id });
      }
      entities.set(id, entity);
    }
    logger.debug({ count: entities.size }, `Prefetched ${entities.size} items`);
  }

  const propertyDatatypes = new Map<string, string>();
  if (propertyIds.size === 0) {
    logger.debug('No properties prefetched');
  } else {
    for (const [id, entity] of await fetchAll(lookup, propertyIds)) {
      if (isMissingEntity(entity)) {
        logger.warn({ propertyId: id }, `Property ${id} is missing or deleted`);
        continue;
      }
      if (entity.type !== 'property') {
        throw new ConsistencyError(`Expected ${id} to be a property, got ${entity.type}`, { id });
      }
      propertyDatatypes.set(id, entity.datatype);
    }
    logger.debug({ count: propertyDatatypes.size }, `Prefetched ${propertyDatatypes.size} property datatypes`);
  }

  return { entities, propertyDatatypes };
}
