import { ClassifierUnavailableError, toError } from '../errors';
import type { LoggerLike } from '../logger';

import type { AttentionConfig } from './config';
import {
  isDecisionAction,
  type AttentionObserver,
  type Classifier,
  type ClassifierVerdict,
  type Decision,
  type InboundMessage,
} from './types';

export type AdmissionPolicyOptions = Pick<
  AttentionConfig,
  'energyFloor' | 'shortcutPhrases' | 'classifierFailureDefault' | 'classifierTimeoutMs'
>;

/** The session fields admission reads. Admission never writes to the session. */
export interface AdmissionSubject {
  readonly sessionId: string;
  readonly energy: number;
  readonly mood: number;
}

/**
 * Decides REPLY / WAIT / IGNORE for a message. Local rules run first so the
 * classifier is only consulted when nothing cheaper settles the question:
 *
 * 1. exhausted session without a wake signal → IGNORE
 * 2. wake signal → REPLY
 * 3. shortcut phrase prefix → REPLY
 * 4. classifier verdict, or the configured default when it fails
 */
export class AdmissionPolicy {
  private readonly shortcutPhrases: string[];

  constructor(
    private readonly classifier: Classifier,
    private readonly options: AdmissionPolicyOptions,
    private readonly logger: LoggerLike = {},
    private readonly observer: AttentionObserver = {},
  ) {
    this.shortcutPhrases = options.shortcutPhrases
      .map((phrase) => phrase.trim().toLowerCase())
      .filter((phrase) => phrase.length > 0);
  }

  async decide(session: AdmissionSubject, message: InboundMessage): Promise<Decision> {
    const decision = await this.evaluate(session, message);
    this.observer.onDecision?.(message, decision);
    this.logger.debug?.(
      {
        sessionId: message.sessionId,
        messageId: message.messageId,
        action: decision.action,
        source: decision.source,
      },
      'Admission decision',
    );
    return decision;
  }

  private async evaluate(session: AdmissionSubject, message: InboundMessage): Promise<Decision> {
    if (session.energy < this.options.energyFloor && !message.wake) {
      return {
        action: 'IGNORE',
        source: 'energy-floor',
        necessity: 0,
        reason: `energy ${session.energy.toFixed(2)} below floor`,
      };
    }

    if (message.wake) {
      return { action: 'REPLY', source: 'wake', necessity: 10, relevance: 10 };
    }

    const normalised = message.text.trim().toLowerCase();
    const shortcut = this.shortcutPhrases.find((phrase) => normalised.startsWith(phrase));
    if (shortcut) {
      return {
        action: 'REPLY',
        source: 'shortcut',
        necessity: 9,
        relevance: 10,
        reason: `matched shortcut "${shortcut}"`,
      };
    }

    try {
      const verdict = await withTimeout(
        this.classifier.classify(message.sessionId, session.mood, message.text),
        this.options.classifierTimeoutMs,
      );
      return toClassifierDecision(verdict);
    } catch (error) {
      const cause = toError(error);
      this.logger.warn?.(
        {
          sessionId: message.sessionId,
          error: cause,
          fallback: this.options.classifierFailureDefault,
        },
        'Classifier unavailable; applying failure default',
      );
      return {
        action: this.options.classifierFailureDefault,
        source: 'classifier-fallback',
        reason: cause.message,
      };
    }
  }
}

function toClassifierDecision(verdict: ClassifierVerdict): Decision {
  const action = verdict.action.trim().toUpperCase();
  if (!isDecisionAction(action)) {
    throw new ClassifierUnavailableError(`Classifier returned unknown action "${verdict.action}"`);
  }

  return {
    action,
    source: 'classifier',
    relevance: finiteOrUndefined(verdict.relevance),
    necessity: finiteOrUndefined(verdict.necessity),
    reason: verdict.reason,
  };
}

function finiteOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

function withTimeout<T>(operation: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return operation;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ClassifierUnavailableError(`Classifier timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
}
