/**
 * Mock Entity Lookup
 *
 * In-memory EntityLookup for tests. Entities come from wbgetentities-shaped
 * JSON fixtures and go through the same zod schemas as live responses.
 * Ids without a fixture are answered as missing.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { EntityLookup } from '../rdf-patch/EntityLookup.js';
import { MAX_IDS_PER_LOOKUP } from '../rdf-patch/EntityLookup.js';
import type { Entity, MissingEntity } from '../../types/wikibase.js';
import { EntityOrMissingSchema } from '../../validation/wikibaseSchemas.js';

const FixtureSchema = z.array(EntityOrMissingSchema);

export class MockEntityLookup implements EntityLookup {
  private readonly entities = new Map<string, Entity | MissingEntity>();
  /** Every batch requested, in call order */
  readonly requests: string[][] = [];

  constructor(entities: Iterable<Entity | MissingEntity> = []) {
    for (const entity of entities) {
      this.entities.set(entity.id, entity);
    }
  }

  static fromFixtureFiles(...paths: string[]): MockEntityLookup {
    const entities = paths.flatMap((path) => FixtureSchema.parse(JSON.parse(readFileSync(path, 'utf8'))));
    return new MockEntityLookup(entities);
  }

  /**
   * Replace or add an entity after construction
   */
  set(entity: Entity | MissingEntity): this {
    this.entities.set(entity.id, entity);
    return this;
  }

  get(id: string): Entity | MissingEntity | undefined {
    const entity = this.entities.get(id);
    return entity && structuredClone(entity);
  }

  async getEntities(ids: string[]): Promise<Map<string, Entity | MissingEntity>> {
    if (ids.length === 0 || ids.length > MAX_IDS_PER_LOOKUP) {
      throw new RangeError(`Expected 1 to ${MAX_IDS_PER_LOOKUP} ids, got ${ids.length}`);
    }
    this.requests.push([...ids]);

    const result = new Map<string, Entity | MissingEntity>();
    for (const id of ids) {
      const entity = this.entities.get(id);
      result.set(id, entity ? structuredClone(entity) : { id, missing: true });
    }
    return result;
  }
}
