/**
 * Trellis: virtual DOM engine with a reactive store.
 *
 * Public API surface. Node-only pieces (the file persistence sink) live in
 * the `trellis-vdom/node` entry.
 */

// Virtual nodes
export {
  createNode,
  createText,
  h,
  isVNode,
  isTextNode,
  getKey,
  equals,
  assertTree,
} from './vdom';
export type {
  Key,
  VNode,
  VElement,
  VText,
  Prop,
  PropMap,
  StyleMap,
  EventHandler,
  PropsInput,
  ChildInput,
} from './vdom';

// Diffing
export { diff, isEmptyDiff, countPatches, diffProps } from './diff';
export type { Patch, PatchPath, PatchType } from './diff';

// Rendering
export {
  renderToString,
  renderToStream,
  renderToSink,
  StringSink,
  StreamSink,
} from './ssr';
export type { RenderSink } from './ssr';
export {
  createRenderer,
  createDomHost,
  getDomRenderer,
  instantiate,
  mount,
  applyPatches,
  unmount,
  LiveHandle,
} from './renderer';
export type { HostOps, Renderer, RendererOptions } from './renderer';

// State
export { Store, PersistentStore, MemorySink } from './store';
export type {
  ChangeRecord,
  Subscriber,
  SubscriptionHandle,
  StoreOptions,
  PersistentStoreOptions,
  PersistenceSink,
  FlatState,
  PropagationPolicy,
  BatchingPolicy,
  TrackResult,
} from './store';

// Apps
export { createApp, mountApp, renderApp } from './app/createApp';
export type {
  App,
  AppConfig,
  MountOptions,
  Component,
  ComponentObject,
  Fallback,
  RenderPhase,
  AppErrorInfo,
} from './app/createApp';

// Scheduling, events, errors
export { Scheduler, globalScheduler } from './runtime/scheduler';
export type { SchedulerState, Task } from './runtime/scheduler';
export { ErrorReporter } from './runtime/error-reporter';
export type {
  ErrorReport,
  ErrorSeverity,
  ErrorSummary,
  ErrorListener,
  ErrorReporterOptions,
} from './runtime/error-reporter';
export { EventBridge } from './events/bridge';
export type {
  BridgeEventRecord,
  BridgeHandler,
  BridgeTarget,
  EventBridgeOptions,
} from './events/bridge';
export {
  InvalidNodeError,
  MalformedTreeError,
  PatchApplicationError,
  SerializationWarning,
  isTrellisError,
} from './common/errors';
export type { TrellisError, TrellisErrorCode } from './common/errors';

// Utilities
export { debounce, throttle } from './stdlib';
export type { DebounceOptions, ThrottleOptions, RateLimited } from './stdlib';
export { createLogger } from './dev/logger';
export type { Logger } from './dev/logger';
