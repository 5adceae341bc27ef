/**
 * Completion probe module: public API exports.
 */

export type { CompletionProbe, CompletionProbeOptions, ProbeDelegate, ProbeVerdict } from './completion-probe.js'
export { DEFAULT_PROBE_OPTIONS, PROBE_MESSAGE_TYPE } from './completion-probe.js'
export { CompletionProbeImpl, createCompletionProbe, probeDedupKey } from './completion-probe-impl.js'
export type { CompletionProbeDeps } from './completion-probe-impl.js'
