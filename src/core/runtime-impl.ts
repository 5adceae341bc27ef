/**
 * RuntimeImpl: concrete implementation of the Runtime interface.
 *
 * The createRuntime() factory:
 *  1. Opens the database service and applies migrations
 *  2. Instantiates the TypedEventBus
 *  3. Creates all module instances via constructor injection
 *  4. Registers step actions and queue handlers
 *  5. Registers the worker pool for shutdown via ServiceRegistry
 *
 * Modules never import each other's implementations; all wiring is here.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import { systemClock } from './types.js'
import type { Runtime, RuntimeOptions } from './runtime.js'
import type { ConveyorConfig } from '../modules/config/config-schema.js'
import { createDatabaseService } from '../persistence/database.js'
import { createJobStore } from '../modules/job-store/job-store-impl.js'
import type { JobStore } from '../modules/job-store/job-store.js'
import { createDurableQueue } from '../modules/queue/durable-queue-impl.js'
import type { DurableQueue } from '../modules/queue/durable-queue.js'
import { HandlerRegistry } from '../modules/worker-pool/handler-registry.js'
import { createWorkerPool } from '../modules/worker-pool/worker-pool-impl.js'
import type { WorkerPool } from '../modules/worker-pool/worker-pool.js'
import { createCompletionProbe } from '../modules/completion-probe/completion-probe-impl.js'
import type { CompletionProbe } from '../modules/completion-probe/completion-probe.js'
import { ActionRegistry } from '../modules/executor/action-registry.js'
import { createDefinitionStore } from '../modules/executor/definition-store.js'
import type { DefinitionStore } from '../modules/executor/definition-store.js'
import { createJobExecutor } from '../modules/executor/job-executor-impl.js'
import type { JobExecutor } from '../modules/executor/job-executor.js'
import { JobHierarchy } from '../modules/hierarchy/job-hierarchy.js'
import { createJobLifecycle } from '../modules/hierarchy/job-lifecycle.js'
import type { JobLifecycle } from '../modules/hierarchy/job-lifecycle.js'
import { createDocumentStore } from '../modules/documents/document-store.js'
import type { DocumentStore } from '../modules/documents/document-store.js'
import { createSearchIndex } from '../modules/documents/search-index.js'
import type { SearchIndex } from '../modules/documents/search-index.js'
import { HttpPageFetcher } from '../modules/actions/page-fetcher.js'
import { registerBuiltinActions } from '../modules/actions/builtin-actions.js'
import { createLlmProvider } from '../modules/orchestrator/openai-provider.js'
import { ToolRegistry } from '../modules/orchestrator/tool-registry.js'
import { registerBuiltinTools } from '../modules/orchestrator/builtin-tools.js'
import { createOrchestrator } from '../modules/orchestrator/orchestrator-impl.js'

const logger = createLogger('runtime')

interface RuntimeParts {
  config: ConveyorConfig
  eventBus: TypedEventBus
  db: BetterSqlite3Database
  store: JobStore
  queue: DurableQueue
  pool: WorkerPool
  probe: CompletionProbe
  definitions: DefinitionStore
  executor: JobExecutor
  hierarchy: JobHierarchy
  lifecycle: JobLifecycle
  documents: DocumentStore
  searchIndex: SearchIndex
  tools: ToolRegistry
}

// ---------------------------------------------------------------------------
// RuntimeImpl
// ---------------------------------------------------------------------------

class RuntimeImpl implements Runtime {
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

  private readonly _services: ServiceRegistry
  private _shutdown = false

  constructor(parts: RuntimeParts, services: ServiceRegistry) {
    this.config = parts.config
    this.eventBus = parts.eventBus
    this.db = parts.db
    this.store = parts.store
    this.queue = parts.queue
    this.pool = parts.pool
    this.probe = parts.probe
    this.definitions = parts.definitions
    this.executor = parts.executor
    this.hierarchy = parts.hierarchy
    this.lifecycle = parts.lifecycle
    this.documents = parts.documents
    this.searchIndex = parts.searchIndex
    this.tools = parts.tools
    this._services = services
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true

    await this._services.shutdownAll()
    logger.debug('Runtime shut down')
  }
}

// ---------------------------------------------------------------------------
// createRuntime factory
// ---------------------------------------------------------------------------

/**
 * Open the database and wire every module. The worker pool is created but
 * not started; call `runtime.pool.start()` to begin processing.
 */
export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const { config } = options
  const clock = options.clock ?? systemClock
  const random = options.random ?? Math.random

  const services = new ServiceRegistry()
  const database = createDatabaseService(config.database.path)
  services.register('database', database)
  await services.initializeAll()

  try {
    const db = database.db
    const eventBus = createEventBus()
    const store = createJobStore(db, { clock, eventBus })
    const queue = createDurableQueue(
      db,
      { leaseMs: config.queue.lease_ms, maxReceives: config.queue.max_receives },
      clock,
    )
    const definitions = createDefinitionStore(db, clock)
    const documents = createDocumentStore(db, clock)
    const searchIndex = createSearchIndex(db)

    const probe = createCompletionProbe({
      store,
      queue,
      eventBus,
      clock,
      options: {
        initialDelayMs: config.probe.initial_delay_ms,
        stalenessMs: config.probe.staleness_ms,
        rescheduleDelayMs: config.probe.reschedule_delay_ms,
        maxAgeMs: config.probe.max_age_ms,
        safetyRecheckMs: config.probe.safety_recheck_ms,
      },
    })

    const actions = new ActionRegistry()
    const executor = createJobExecutor({
      store,
      queue,
      definitions,
      actions,
      probe,
      eventBus,
      clock,
      random,
      options: { retryMaxMs: config.queue.retry_max_ms },
    })
    const lifecycle = createJobLifecycle({
      store,
      queue,
      executor,
      clock,
      onIdleAncestor: (jobId) => probe.schedule(jobId),
    })

    const fetcher =
      options.fetcher ??
      new HttpPageFetcher({
        userAgent: config.crawler.user_agent,
        requestTimeoutMs: config.crawler.request_timeout_ms,
        maxBodyBytes: config.crawler.max_body_bytes,
      })

    const tools = new ToolRegistry()
    registerBuiltinTools(tools, { documents, searchIndex })
    const orchestrator = createOrchestrator({
      store,
      queue,
      executor,
      llm: options.llm ?? createLlmProvider(config.llm, options.env),
      tools,
      eventBus,
      clock,
      options: {
        waitIntervalMs: config.orchestrator.wait_interval_ms,
        waitTimeoutMs: config.orchestrator.wait_timeout_ms,
        maxReplans: config.orchestrator.max_replans,
      },
    })

    const handlers = new HandlerRegistry()
    registerBuiltinActions(actions, handlers, { store, queue, documents, searchIndex, fetcher, lifecycle, eventBus })
    actions.register('orchestrate', 'plan_execute_review', orchestrator)
    orchestrator.register(handlers)
    probe.register(handlers)
    executor.register(handlers)

    const pool = createWorkerPool({
      queue,
      store,
      registry: handlers,
      clock,
      random,
      onIdleAncestor: (jobId) => probe.schedule(jobId),
      options: {
        concurrency: config.workers.concurrency,
        pollIntervalMs: config.queue.poll_interval_ms,
        heartbeatIntervalMs: config.workers.heartbeat_interval_ms,
        leaseMs: config.queue.lease_ms,
        shutdownTimeoutMs: config.workers.shutdown_timeout_ms,
        retryBaseMs: config.queue.retry_base_ms,
        retryMaxMs: config.queue.retry_max_ms,
      },
    })
    services.register('workers', pool)
    await services.initializeAll()

    logger.debug({ database: config.database.path, handlers: handlers.types }, 'Runtime ready')

    return new RuntimeImpl(
      {
        config,
        eventBus,
        db,
        store,
        queue,
        pool,
        probe,
        definitions,
        executor,
        hierarchy: new JobHierarchy(store),
        lifecycle,
        documents,
        searchIndex,
        tools,
      },
      services,
    )
  } catch (err) {
    logger.error({ err }, 'Runtime wiring failed, closing database')
    await services.shutdownAll()
    throw err
  }
}
