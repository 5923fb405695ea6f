export { InMemoryEventRepository } from './in-memory-event-repository.js';
export type { InMemoryEventRepositoryOptions } from './in-memory-event-repository.js';
