/**
 * Built-in default values for the Conveyor configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { ConveyorConfig } from './config-schema.js'

export const DEFAULT_CONFIG: ConveyorConfig = {
  config_format_version: '1',
  log_level: 'info',
  database: {
    path: '.conveyor/conveyor.db',
  },
  queue: {
    lease_ms: 30_000,
    max_receives: 5,
    poll_interval_ms: 250,
    retry_base_ms: 1_000,
    retry_max_ms: 60_000,
  },
  workers: {
    concurrency: 4,
    shutdown_timeout_ms: 10_000,
    heartbeat_interval_ms: 5_000,
  },
  probe: {
    initial_delay_ms: 500,
    staleness_ms: 2_000,
    reschedule_delay_ms: 1_000,
    // 6 hours
    max_age_ms: 21_600_000,
    safety_recheck_ms: 30_000,
  },
  orchestrator: {
    wait_interval_ms: 2_000,
    wait_timeout_ms: 600_000,
    max_replans: 2,
  },
  retention: {
    older_than_hours: 24 * 7,
    statuses: ['completed', 'failed', 'cancelled'],
  },
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    api_key_env: 'OPENAI_API_KEY',
    timeout_ms: 60_000,
  },
  crawler: {
    user_agent: 'conveyor-crawler/0.1',
    request_timeout_ms: 15_000,
    max_body_bytes: 2_000_000,
  },
}
