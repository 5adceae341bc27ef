/**
 * Runtime interface: the wired set of services a process works with.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createRuntime()` from runtime-impl.ts.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from './event-bus.js'
import type { Clock } from './types.js'
import type { ConveyorConfig } from '../modules/config/config-schema.js'
import type { JobStore } from '../modules/job-store/job-store.js'
import type { DurableQueue } from '../modules/queue/durable-queue.js'
import type { WorkerPool } from '../modules/worker-pool/worker-pool.js'
import type { CompletionProbe } from '../modules/completion-probe/completion-probe.js'
import type { JobExecutor } from '../modules/executor/job-executor.js'
import type { DefinitionStore } from '../modules/executor/definition-store.js'
import type { JobHierarchy } from '../modules/hierarchy/job-hierarchy.js'
import type { JobLifecycle } from '../modules/hierarchy/job-lifecycle.js'
import type { DocumentStore } from '../modules/documents/document-store.js'
import type { SearchIndex } from '../modules/documents/search-index.js'
import type { PageFetcher } from '../modules/actions/page-fetcher.js'
import type { LlmProvider } from '../modules/orchestrator/llm-provider.js'
import type { ToolRegistry } from '../modules/orchestrator/tool-registry.js'

// ---------------------------------------------------------------------------
// RuntimeOptions
// ---------------------------------------------------------------------------

export interface RuntimeOptions {
  config: ConveyorConfig
  /** Replaces the HTTP fetcher built from `config.crawler` */
  fetcher?: PageFetcher
  /** Replaces the provider built from `config.llm` */
  llm?: LlmProvider
  clock?: Clock
  /** Jitter source for retry backoff */
  random?: () => number
  /** Environment the LLM API key is read from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export interface Runtime {
  readonly config: ConveyorConfig
  readonly eventBus: TypedEventBus
  readonly db: BetterSqlite3Database
  readonly store: JobStore
  readonly queue: DurableQueue
  readonly pool: WorkerPool
  readonly probe: CompletionProbe
  readonly definitions: DefinitionStore
  readonly executor: JobExecutor
  readonly hierarchy: JobHierarchy
  readonly lifecycle: JobLifecycle
  readonly documents: DocumentStore
  readonly searchIndex: SearchIndex
  readonly tools: ToolRegistry

  /** Stop the pool and close the database. Idempotent */
  shutdown(): Promise<void>
}
