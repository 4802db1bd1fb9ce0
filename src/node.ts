/**
 * Node-only entry: file-backed persistence.
 */

export { FileSink } from './store/file-sink';
export * from './index';
