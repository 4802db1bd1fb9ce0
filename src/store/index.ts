export { Store } from './store';
export type { TrackResult } from './store';
export { PersistentStore } from './persistent';
export { MemorySink, parseFlatState } from './sinks';
export type {
  BatchingPolicy,
  ChangeRecord,
  FlatState,
  PersistenceSink,
  PersistentStoreOptions,
  PropagationPolicy,
  StoreOptions,
  Subscriber,
  SubscriptionHandle,
} from './types';
