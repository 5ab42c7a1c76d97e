/**
 * Shared contracts for the attention core: inbound messages, admission
 * decisions, persisted session state and the collaborators the core calls out
 * to (classifier, generator, durable store, reply sink).
 */

/** What the admission step wants done with a message. */
export type DecisionAction = 'REPLY' | 'WAIT' | 'IGNORE';

export const DECISION_ACTIONS: readonly DecisionAction[] = ['REPLY', 'WAIT', 'IGNORE'];

export function isDecisionAction(value: unknown): value is DecisionAction {
  return typeof value === 'string' && (DECISION_ACTIONS as readonly string[]).includes(value);
}

/** Which admission rule produced a decision. */
export type DecisionSource =
  | 'energy-floor'
  | 'wake'
  | 'shortcut'
  | 'classifier'
  | 'classifier-fallback';

export interface Decision {
  action: DecisionAction;
  source: DecisionSource;
  /** 0-10 */
  relevance?: number;
  /** 0-10 */
  necessity?: number;
  reason?: string;
}

/** A sanitised chat message addressed to one session. Never mutated after intake. */
export interface InboundMessage {
  readonly messageId: string;
  readonly sessionId: string;
  readonly senderId: string;
  readonly senderName?: string;
  readonly text: string;
  readonly attachmentRefs: readonly string[];
  /** Epoch milliseconds at intake. */
  readonly arrivalTime: number;
  /** Direct mention or nickname match; bypasses classification and the energy floor. */
  readonly wake: boolean;
}

/** Session fields that survive restarts. */
export interface PersistedSessionState {
  sessionId: string;
  /** [0, 1] */
  energy: number;
  /** [-1, 1] */
  mood: number;
  lastReplyTime?: number;
  /** Local calendar date, `YYYY-MM-DD`. */
  lastDailyResetDate: string;
  lastMoodDecayTime: number;
  totalReplies: number;
}

/** Read-only view of a session handed to collaborators. */
export interface SessionSnapshot {
  sessionId: string;
  energy: number;
  mood: number;
  lastReplyTime?: number;
  totalReplies: number;
}

/** Raw classifier answer. `action` is validated by the admission policy. */
export interface ClassifierVerdict {
  action: string;
  relevance?: number;
  necessity?: number;
  reason?: string;
}

export interface Classifier {
  classify(sessionId: string, mood: number, text: string): Promise<ClassifierVerdict>;
}

export interface GenerationRequest {
  sessionId: string;
  cycleId: string;
  ownerSenderId: string;
  /** Aggregated batch in arrival order. */
  messages: readonly InboundMessage[];
  /** Recent messages that were admitted as IGNORE. */
  ambientContext: readonly InboundMessage[];
  state: SessionSnapshot;
}

export interface GenerationResult {
  replyText: string;
  /** Added to the session mood when the cycle completes. */
  sentimentDelta?: number;
}

export interface Generator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface SessionStateRepository {
  load(sessionId: string): Promise<PersistedSessionState | undefined>;
  save(sessionId: string, state: PersistedSessionState): Promise<void>;
}

export interface CycleReply {
  sessionId: string;
  cycleId: string;
  ownerSenderId: string;
  replyText: string;
  /** Ids of the messages the reply answers, in arrival order. */
  messageIds: string[];
}

export interface ReplySink {
  deliver(reply: CycleReply): Promise<void>;
}

export type RouteOutcome = 'ignored' | 'extended' | 'deferred' | 'started';

export type CycleCloseReason = 'quiet' | 'ceiling' | 'shutdown';

export type CycleStatus = 'replied' | 'silent' | 'failed';

export interface CycleSummary {
  cycleId: string;
  sessionId: string;
  ownerSenderId: string;
  batchSize: number;
  closeReason: CycleCloseReason;
  status: CycleStatus;
  durationMs: number;
}

export interface MaintenanceReport {
  cachedSessions: number;
  recovered: number;
  moodDecayed: number;
  dailyReset: number;
  flushed: number;
  flushFailures: number;
  evicted: number;
}

/**
 * Optional hooks for metrics and tracing. Every component that accepts an
 * observer reports through it.
 */
export interface AttentionObserver {
  onDecision?(message: InboundMessage, decision: Decision): void;
  onRouted?(message: InboundMessage, outcome: RouteOutcome): void;
  onCycleFinished?(summary: CycleSummary): void;
  onBackgroundOverflow?(sessionId: string, dropped: InboundMessage): void;
  onFlush?(sessionId: string, succeeded: boolean): void;
  onEvicted?(sessionId: string): void;
  onMaintenance?(report: MaintenanceReport): void;
}
