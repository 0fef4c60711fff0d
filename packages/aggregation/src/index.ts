export { dedupPostings } from './dedup.js';
export { aggregate } from './aggregate.js';
export { searchAll } from './search.js';
export {
  SOURCE_IDS,
  getSourceById,
  resolveSourceId,
  parseSourceList,
  createAdapters,
} from './sources.js';
export type { SourceId, SourceDefinition, CreateAdaptersOptions } from './sources.js';
export type { SourceStats, SearchAllResult, SearchAllOptions, AggregateOptions } from './types.js';
