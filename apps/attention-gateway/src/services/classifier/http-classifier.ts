import {
  ClassifierUnavailableError,
  type Classifier,
  type ClassifierVerdict,
  type LoggerLike,
} from '@attention-gw/core';
import { z } from 'zod';

export interface ClassifierOptions {
  url?: string;
  apiKey?: string;
  /** Cancels the request after this long. 0 leaves it unbounded. */
  timeoutMs?: number;
}

const verdictSchema = z.object({
  action: z.string().min(1),
  relevance: z.number().finite().optional(),
  necessity: z.number().finite().optional(),
  reason: z.string().optional(),
});

/** Stand-in used without a classifier endpoint; admission falls back to its default. */
class UnconfiguredClassifier implements Classifier {
  async classify(): Promise<ClassifierVerdict> {
    throw new ClassifierUnavailableError('Classifier not configured');
  }
}

/** Posts `{ sessionId, mood, text }` and reads back a JSON verdict. */
class HttpClassifier implements Classifier {
  constructor(
    private readonly logger: LoggerLike,
    private readonly options: ClassifierOptions & { url: string },
  ) {}

  async classify(sessionId: string, mood: number, text: string): Promise<ClassifierVerdict> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const timeoutMs = this.options.timeoutMs ?? 0;
    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ sessionId, mood, text }),
        signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
      });
    } catch (error) {
      throw new ClassifierUnavailableError('Classifier request failed', error);
    }

    if (!response.ok) {
      this.logger.warn?.({ sessionId, status: response.status }, 'Classifier rejected request');
      throw new ClassifierUnavailableError(`Classifier responded with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ClassifierUnavailableError('Classifier returned a non-JSON body', error);
    }

    const parsed = verdictSchema.safeParse(body);
    if (!parsed.success) {
      throw new ClassifierUnavailableError('Classifier returned a malformed verdict', parsed.error);
    }

    return parsed.data;
  }
}

export function createClassifier(logger: LoggerLike, options: ClassifierOptions = {}): Classifier {
  if (!options.url) {
    logger.warn?.({}, 'Classifier not configured - admission will use the failure default');
    return new UnconfiguredClassifier();
  }

  return new HttpClassifier(logger, { ...options, url: options.url });
}
