/**
 * RDF Patch Service
 *
 * Entry point of the diffing engine: Turtle in, minimal statement edits out.
 */

import { createChildLogger, type Logger } from '../../utils/logger.js';
import type { EntityLookup } from './EntityLookup.js';
import { RdfGraph } from './RdfGraph.js';
import { detectChanges, type EntityEdit } from './changeDetector.js';
import { applyPatch } from './PatchEngine.js';
import { prefetch } from './prefetch.js';
import { createProcessContext } from './ProcessContext.js';

export interface ProcessGraphOptions {
  lookup: EntityLookup;
  /** Entity ids never to edit */
  blocklist?: ReadonlySet<string>;
  logger?: Logger;
}

/**
 * Parse a patch document, apply it to freshly fetched entities and return
 * the edits that would change them. Rejects on the first fatal error; no
 * partial edit list is returned.
 */
export async function processGraph(input: string, options: ProcessGraphOptions): Promise<EntityEdit[]> {
  const logger = options.logger ?? createChildLogger({ component: 'rdf-patch' });

  const graph = RdfGraph.parse(input);
  logger.debug({ triples: graph.size }, 'Parsed patch document');

  const { entities, propertyDatatypes } = await prefetch(graph, options.lookup, logger);
  const context = createProcessContext(graph, entities, propertyDatatypes, logger);

  applyPatch(context);
  return detectChanges(context, options.blocklist);
}
