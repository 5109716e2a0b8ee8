export { processGraph, type ProcessGraphOptions } from './RdfPatchService.js';
export { submitEdits, type SubmitEditsOptions, type EntityEditor } from './EditSubmitter.js';
export type { EntityEdit } from './changeDetector.js';
export { MAX_IDS_PER_LOOKUP, type EntityLookup } from './EntityLookup.js';
export { RdfGraph } from './RdfGraph.js';
export { NAMESPACES, PREFIXES } from './namespaces.js';
export { resolveValue } from './termResolver.js';
export { dataValueEquals, snakEquals, referenceEquals } from './valueEquality.js';
