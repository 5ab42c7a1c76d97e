export type {
  AttentionObserver,
  Classifier,
  ClassifierVerdict,
  CycleCloseReason,
  CycleReply,
  CycleStatus,
  CycleSummary,
  Decision,
  DecisionAction,
  DecisionSource,
  GenerationRequest,
  GenerationResult,
  Generator,
  InboundMessage,
  MaintenanceReport,
  PersistedSessionState,
  ReplySink,
  RouteOutcome,
  SessionSnapshot,
  SessionStateRepository,
} from './attention/types';
export { DECISION_ACTIONS, isDecisionAction } from './attention/types';
export type { AttentionConfig } from './attention/config';
export { DEFAULT_ATTENTION_CONFIG, clamp, formatLocalDate } from './attention/config';
export { SessionLock } from './attention/session-lock';
export {
  SessionEntry,
  SessionStateStore,
  createDefaultState,
  type CycleOutcome,
  type SessionStateStoreOptions,
} from './attention/session-state-store';
export {
  AdmissionPolicy,
  type AdmissionPolicyOptions,
  type AdmissionSubject,
} from './attention/admission-policy';
export {
  DebounceCycle,
  type CyclePhase,
  type DebounceCycleDependencies,
  type DebounceTimings,
} from './attention/debounce-aggregator';
export {
  DualPoolDispatcher,
  type DualPoolDispatcherDependencies,
  type DualPoolDispatcherOptions,
} from './attention/dual-pool-dispatcher';
export {
  StateDecayScheduler,
  applyMaintenance,
  type StateDecayOptions,
} from './attention/state-decay-scheduler';
export {
  createAguiGenerator,
  buildRunInput,
  DEFAULT_AGUI_TIMEOUT_MS,
  type AguiGeneratorOptions,
} from './agui/generator';
export {
  AttentionError,
  ClassifierUnavailableError,
  CorruptSessionStateError,
  GenerationFailedError,
  StoreUnavailableError,
  toError,
} from './errors';
export type { LoggerLike } from './logger';
