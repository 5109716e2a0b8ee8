import type { Entity, MissingEntity } from '../../types/wikibase.js';

/** Largest id batch a single lookup request may carry */
export const MAX_IDS_PER_LOOKUP = 50;

/**
 * Source of current entity state (the MediaWiki API in production)
 */
export interface EntityLookup {
  /**
   * Fetch up to {@link MAX_IDS_PER_LOOKUP} entities. Deleted or unknown ids
   * come back as MissingEntity.
   */
  getEntities(ids: string[]): Promise<Map<string, Entity | MissingEntity>>;
}
