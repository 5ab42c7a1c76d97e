import { HttpAgent, type AgentSubscriber, type RunAgentParameters } from '@ag-ui/client';
import type { Context, RunAgentInput, UserMessage } from '@ag-ui/core';
import { z } from 'zod';

import type {
  GenerationRequest,
  GenerationResult,
  Generator,
  InboundMessage,
} from '../attention/types';
import { GenerationFailedError, toError } from '../errors';
import type { LoggerLike } from '../logger';

export interface AguiGeneratorOptions {
  baseUrl?: string;
  apiKey?: string;
  headers?: Record<string, string>;
  debug?: boolean;
  /** Upper bound on a single run. 0 disables it. */
  timeoutMs?: number;
}

export const DEFAULT_AGUI_TIMEOUT_MS = 120_000;

/** Agent state keys the generator reads back after a run. */
const agentStateSchema = z
  .object({
    sentimentDelta: z.number().finite().optional(),
    sentiment: z.number().finite().optional(),
  })
  .passthrough();

/**
 * Generator used when no AG-UI endpoint is configured. Every cycle fails, so
 * sessions still pay the energy cost and stay silent.
 */
class LoggingAguiGenerator implements Generator {
  constructor(private readonly logger: LoggerLike) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.logger.warn?.(
      {
        sessionId: request.sessionId,
        cycleId: request.cycleId,
        messageCount: request.messages.length,
      },
      'AG-UI generator not configured - skipping generation',
    );

    throw new GenerationFailedError('AG-UI generator not configured');
  }
}

/** Factory that chooses the appropriate generator for the provided options. */
export function createAguiGenerator(
  logger: LoggerLike,
  options: AguiGeneratorOptions = {},
): Generator {
  if (!options.baseUrl) {
    return new LoggingAguiGenerator(logger);
  }

  return new HttpAguiGenerator(logger, { ...options, baseUrl: options.baseUrl });
}

/** Runs an AG-UI HTTP agent over the aggregated batch and collects its text output. */
class HttpAguiGenerator implements Generator {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly debug: boolean;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: LoggerLike,
    options: AguiGeneratorOptions & { baseUrl: string },
  ) {
    this.baseUrl = options.baseUrl;
    this.debug = options.debug ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_AGUI_TIMEOUT_MS;
    this.headers = { ...(options.headers ?? {}) };
    if (options.apiKey) {
      this.headers.Authorization ??= `Bearer ${options.apiKey}`;
    }
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const payload = buildRunInput(request);

    const agent = new HttpAgent({
      url: this.baseUrl,
      headers: this.headers,
      threadId: payload.threadId,
      debug: this.debug,
    });

    agent.setMessages(payload.messages);
    agent.setState(payload.state);

    const runParameters: RunAgentParameters = {
      runId: payload.runId,
      tools: payload.tools,
      context: payload.context,
      forwardedProps: payload.forwardedProps,
    };

    const collected: string[] = [];
    let latestState: unknown;
    let runError: string | undefined;

    const subscriber: AgentSubscriber = {
      onRunErrorEvent: ({ event }) => {
        runError = event.message;
      },
      onStateSnapshotEvent: ({ event }) => {
        latestState = event.snapshot;
      },
      // The end event carries the full buffer, including text emitted around tool calls.
      onTextMessageEndEvent: ({ textMessageBuffer }) => {
        if (textMessageBuffer.trim()) {
          collected.push(textMessageBuffer.trim());
        }
      },
    };

    try {
      await this.withTimeout(agent, agent.runAgent(runParameters, subscriber));
    } catch (error) {
      const cause = toError(error);
      this.logger.error?.(
        { error: cause, sessionId: request.sessionId, runId: payload.runId },
        'AG-UI run failed',
      );
      throw new GenerationFailedError(cause.message || 'AG-UI run failed', cause);
    } finally {
      agent.abortRun();
    }

    if (runError !== undefined) {
      this.logger.error?.(
        { sessionId: request.sessionId, runId: payload.runId, message: runError },
        'AG-UI run reported an error',
      );
      throw new GenerationFailedError(runError);
    }

    return {
      replyText: collected.join('\n\n'),
      sentimentDelta: readSentiment(latestState),
    };
  }

  private withTimeout<T>(agent: HttpAgent, run: Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) {
      return run;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        agent.abortRun();
        reject(new GenerationFailedError(`AG-UI run timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    return Promise.race([run, timeout]).finally(() => clearTimeout(timer));
  }
}

/** Turn an aggregated batch into an AG-UI RunAgentInput payload. */
export function buildRunInput(request: GenerationRequest): RunAgentInput {
  const messages: UserMessage[] = request.messages.map((message) => ({
    id: message.messageId,
    role: 'user',
    content: formatMessage(message),
  }));

  const context: Context[] = [];
  if (request.ambientContext.length > 0) {
    context.push({
      description: 'Recent messages in this conversation that were not addressed',
      value: request.ambientContext.map(formatMessage).join('\n'),
    });
  }

  return {
    threadId: request.sessionId,
    runId: `attention-${request.sessionId}-${request.cycleId}`,
    messages,
    tools: [],
    context,
    forwardedProps: {
      source: 'attention-gateway',
      cycleId: request.cycleId,
      ownerSenderId: request.ownerSenderId,
    },
    state: {
      attention: {
        energy: request.state.energy,
        mood: request.state.mood,
        totalReplies: request.state.totalReplies,
      },
    },
  };
}

function formatMessage(message: InboundMessage): string {
  const speaker = message.senderName ?? message.senderId;
  const sections = [`${speaker}: ${message.text}`.trimEnd()];

  if (message.attachmentRefs.length > 0) {
    sections.push('Attachments:', ...message.attachmentRefs);
  }

  return sections.join('\n');
}

function readSentiment(state: unknown): number | undefined {
  const parsed = agentStateSchema.safeParse(state);
  if (!parsed.success) {
    return undefined;
  }

  return parsed.data.sentimentDelta ?? parsed.data.sentiment;
}
