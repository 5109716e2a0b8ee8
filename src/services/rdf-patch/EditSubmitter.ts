import { createChildLogger, type Logger } from '../../utils/logger.js';
import type { RateLimiter } from '../../utils/RateLimiter.js';
import type { EntityEdit } from './changeDetector.js';

/**
 * Anything that can write an edit (the MediaWiki API client in production)
 */
export interface EntityEditor {
  editEntity(edit: EntityEdit): Promise<void>;
}

export interface SubmitEditsOptions {
  editor: EntityEditor;
  dryRun?: boolean;
  rateLimiter?: RateLimiter;
  logger?: Logger;
}

/**
 * Submit edits one at a time
 *
 * @returns Number of edits submitted (0 in dry-run mode)
 */
export async function submitEdits(edits: Iterable<EntityEdit>, options: SubmitEditsOptions): Promise<number> {
  const { editor, dryRun = false, rateLimiter } = options;
  const logger = options.logger ?? createChildLogger({ component: 'edit-submitter' });

  let submitted = 0;
  for (const edit of edits) {
    const context = {
      entityId: edit.entityId,
      baseRevisionId: edit.baseRevisionId,
      statements: edit.statements.length,
      summary: edit.summary,
    };

    if (dryRun) {
      logger.info(context, `[dry-run] Would edit ${edit.entityId} (${edit.statements.length} statements)`);
      continue;
    }

    if (rateLimiter) {
      await rateLimiter.acquire();
    }
    await editor.editEntity(edit);
    submitted++;
    logger.info(context, `Edited ${edit.entityId}`);
  }

  return submitted;
}
