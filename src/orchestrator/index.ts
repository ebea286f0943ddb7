export {
  Orchestrator,
  type DispatchResult,
  type DispatchOptions,
  type LivenessResult,
  type LivenessStatus,
  type OrchestratorOptions,
} from './orchestrator.js';
export { buildCatalog, resolveCandidates, toCandidate } from './catalog.js';
export { SessionBroker, type SessionPolicyResult } from './sessions.js';
export {
  UnknownModelError,
  InvalidDispatchRequestError,
  DispatchAbortedError,
  AllProvidersExhaustedError,
  type UnknownTarget,
} from './errors.js';
