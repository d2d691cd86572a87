/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { Broadcaster, type BroadcasterDeps } from './broadcaster.js';

export { IngestPipeline, type IngestPipelineDeps } from './ingest-pipeline.js';

export {
  ConnectionLifecycle,
  type ConnectionLifecycleDeps,
  type ConnectionLifecycleParams,
  type CloseOutcome,
} from './connection-lifecycle.js';
