import type { AIAdapter } from '../adapters/ai.adapter';
import type { Logger } from '../logger';
import type { ToolRegistry } from '../tools/registry';
import type { IntentResolution } from '../tools/tool-call';
import type { ConversationTurn, SchemaContext } from '../types';
import { parseModelOutput, readEnvelope } from './parse-stages';
import { type PromptProfile, buildIntentMessages } from './prompt';

/**
 * Maps one utterance to a validated {@link ToolCall} or a `no_tool` outcome.
 * Model output never makes this throw; a failing model call does
 * (`ModelUnavailableError`).
 */
export class IntentResolver {
  private ai: AIAdapter;
  private registry: ToolRegistry;
  private profile: PromptProfile;
  private logger?: Logger;

  constructor(ai: AIAdapter, registry: ToolRegistry, profile: PromptProfile, logger?: Logger) {
    this.ai = ai;
    this.registry = registry;
    this.profile = profile;
    this.logger = logger;
  }

  async resolve(
    utterance: string,
    history: ConversationTurn[],
    context: SchemaContext,
    requestId?: string,
  ): Promise<IntentResolution> {
    const messages = buildIntentMessages(this.profile, context, this.registry.listTools(), history, utterance);
    const { content } = await this.ai.invoke(messages, { temperature: 0, maxTokens: 500, requestId });

    if (requestId) {
      await this.logger?.chatQuery(requestId, 'Model routing output', { content });
    }

    return this.interpret(content);
  }

  interpret(output: string): IntentResolution {
    const parsed = parseModelOutput(output);

    if (parsed.kind === 'prose') {
      return { kind: 'no_tool', reason: 'conversational', reply: parsed.text || undefined };
    }
    if (parsed.kind === 'malformed') {
      return { kind: 'no_tool', reason: 'malformed_output', detail: parsed.text.slice(0, 200) };
    }

    const envelope = readEnvelope(parsed.value, (name) => this.registry.getTool(name) !== undefined);
    switch (envelope.kind) {
      case 'invocation':
        return this.registry.toToolCall(envelope.name, envelope.parameters);
      case 'reply':
        return { kind: 'no_tool', reason: 'conversational', reply: envelope.text };
      case 'unrecognized':
        return { kind: 'no_tool', reason: 'malformed_output', detail: 'No tool name in model output' };
    }
  }
}
