import type { AIAdapter } from './adapters/ai.adapter';
import type { DatasetStore } from './adapters/data.adapter';
import type { DatasetProfile, QueryConfig } from './config';
import { ModelUnavailableError, errorMessage, serializeError } from './errors';
import { IntentResolver } from './intent/intent-resolver';
import type { Logger } from './logger';
import { QueryExecutor } from './query/query-executor';
import { describeChart } from './response/chart-spec';
import { type ChatResponse, ResponseSynthesizer } from './response/response-synthesizer';
import { SchemaContextProvider } from './schema-context';
import { SessionStore } from './session/session-store';
import { type ToolRegistry, type ToolSpec, createToolRegistry } from './tools/registry';
import type { IntentResolution } from './tools/tool-call';
import type { ConversationTurn, SchemaContext } from './types';

export const MODEL_UNAVAILABLE_REPLY =
  "Sorry, I'm having trouble reaching the language model right now. Please try again in a moment.";
export const UNEXPECTED_ERROR_REPLY = 'Sorry, something went wrong while answering that. Please try again.';

export interface ChatServiceOptions {
  store: DatasetStore;
  ai: AIAdapter;
  profile: DatasetProfile;
  query: QueryConfig;
  /** Turns of history passed to the model; 0 sends none. */
  historyWindow: number;
  logger: Logger;
  sessions?: SessionStore;
}

export interface ChatTurnRequest {
  message: string;
  threadId: string;
}

export interface ChatTurnResponse {
  response: ChatResponse;
}

interface Pipeline {
  context: SchemaContext;
  registry: ToolRegistry;
  resolver: IntentResolver;
  executor: QueryExecutor;
}

/**
 * One chat turn end to end: resolve intent, run the tool, synthesize the
 * reply and record both turns. Turns on one thread run one at a time.
 */
export class ChatService {
  private readonly options: ChatServiceOptions;
  private readonly sessions: SessionStore;
  private readonly schema: SchemaContextProvider;
  private readonly synthesizer: ResponseSynthesizer;
  private readonly logger: Logger;
  private pipeline?: Promise<Pipeline>;

  constructor(options: ChatServiceOptions) {
    this.options = options;
    this.logger = options.logger;
    this.sessions = options.sessions ?? new SessionStore();
    this.schema = new SchemaContextProvider(options.store, options.profile, options.query, options.logger);
    this.synthesizer = new ResponseSynthesizer(options.ai, options.profile, options.logger);
  }

  private prepare(): Promise<Pipeline> {
    if (!this.pipeline) {
      this.pipeline = this.schema
        .describe()
        .then((context) => {
          const { ai, profile, query, store } = this.options;
          const registry = createToolRegistry(context, {
            defaultLimit: query.defaultLimit,
            maxLimit: query.maxLimit,
            categoricalValueLimit: query.categoricalValueLimit,
            toolAliases: profile.toolAliases,
            parameterAliases: profile.parameterAliases,
          });
          return {
            context,
            registry,
            resolver: new IntentResolver(ai, registry, profile, this.logger),
            executor: new QueryExecutor(store, context, query, this.logger),
          };
        })
        .catch((error: unknown) => {
          this.pipeline = undefined;
          throw error;
        });
    }
    return this.pipeline;
  }

  async handleTurn(request: ChatTurnRequest): Promise<ChatTurnResponse> {
    const { message, threadId } = request;
    const requestId = `chat-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;

    return this.sessions.runExclusive(threadId, async () => {
      const window = this.options.historyWindow;
      const history = window > 0 ? this.sessions.history(threadId).slice(-window) : [];

      await this.logger.chatQuery(requestId, 'Turn received', { threadId, message, historyTurns: history.length });

      const response = await this.answer(message, history, requestId);

      this.sessions.append(threadId, { role: 'user', content: message });
      this.sessions.append(threadId, {
        role: 'assistant',
        content: typeof response === 'string' ? response : describeChart(response),
      });

      await this.logger.chatQuery(requestId, 'Turn complete', {
        threadId,
        responseType: typeof response === 'string' ? 'text' : 'chart',
      });

      return { response };
    });
  }

  private async answer(message: string, history: ConversationTurn[], requestId: string): Promise<ChatResponse> {
    try {
      let pipeline: Pipeline;
      try {
        pipeline = await this.prepare();
      } catch (error) {
        await this.logger.error('Dataset unavailable', { requestId, error: serializeError(error) });
        return await this.synthesizer.synthesize(
          {
            utterance: message,
            history,
            resolution: { kind: 'no_tool', reason: 'data_unavailable', detail: errorMessage(error) },
          },
          undefined,
          requestId,
        );
      }

      let resolution: IntentResolution;
      try {
        resolution = await pipeline.resolver.resolve(message, history, pipeline.context, requestId);
      } catch (error) {
        if (error instanceof ModelUnavailableError) {
          await this.logger.error('Model unavailable', { requestId, error: serializeError(error) });
          return MODEL_UNAVAILABLE_REPLY;
        }
        throw error;
      }

      await this.logger.chatQuery(requestId, 'Intent resolved', resolution);

      if (resolution.kind === 'no_tool') {
        return await this.synthesizer.synthesize({ utterance: message, history, resolution }, pipeline.context, requestId);
      }

      const result = await pipeline.executor.run(resolution.call, requestId);
      await this.logger.chatQuery(
        requestId,
        'Query finished',
        result.ok ? { tool: result.tool, count: result.count, parameters: result.parameters } : result,
      );

      return await this.synthesizer.synthesize(
        { utterance: message, history, call: resolution.call, result },
        pipeline.context,
        requestId,
      );
    } catch (error) {
      await this.logger.error('Chat turn failed', { requestId, error: serializeError(error) });
      return UNEXPECTED_ERROR_REPLY;
    }
  }

  history(threadId: string): ConversationTurn[] {
    return this.sessions.history(threadId);
  }

  /** Waits for any turn in flight on the thread before clearing it. */
  clear(threadId: string): Promise<void> {
    return this.sessions.runExclusive(threadId, async () => {
      this.sessions.clear(threadId);
    });
  }

  async describe(): Promise<{ context: SchemaContext; tools: ToolSpec[] }> {
    const pipeline = await this.prepare();
    return { context: pipeline.context, tools: pipeline.registry.listTools() };
  }
}
