import type { AIAdapter } from '../adapters/ai.adapter';
import { errorMessage } from '../errors';
import type { PromptProfile } from '../intent/prompt';
import type { Logger } from '../logger';
import type { QueryResult, QuerySuccess } from '../query/query-executor';
import type { NoToolResolution, ToolCall } from '../tools/tool-call';
import type { CellValue, ChatMessage, ConversationTurn, SchemaContext } from '../types';
import { type ChartSpec, buildChartSpec, wantsChart } from './chart-spec';

export type ChatResponse = string | ChartSpec;

export type SynthesisInput =
  | {
      utterance: string;
      history: ConversationTurn[];
      resolution: NoToolResolution;
    }
  | {
      utterance: string;
      history: ConversationTurn[];
      call: ToolCall;
      result: QueryResult;
    };

export const NO_ROWS_REPLY = "I couldn't find any rows matching that request.";
export const CANNOT_ANSWER_REPLY = "I can't answer that with the available data.";
export const DATABASE_ERROR_REPLY = "Sorry, I couldn't retrieve the data for that question. Please try again later.";

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 2,
});

/** Strip markdown emphasis and bullets, collapse whitespace. */
export function cleanReply(text: string): string {
  return text
    .replace(/\*\*|__/g, '')
    .replace(/^\s*[*-] /gm, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function formatCell(column: string, value: CellValue, monetaryColumns: readonly string[]): string {
  if (typeof value === 'number') {
    if (monetaryColumns.includes(column)) {
      return currencyFormatter.format(value);
    }
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  return value === null ? 'n/a' : String(value);
}

/**
 * Plain-text rendering of a result, used when the model cannot be reached.
 */
export function formatResult(result: QuerySuccess, context: SchemaContext | undefined): string {
  const monetary = context?.monetaryColumns ?? [];

  switch (result.tool) {
    case 'aggregate_stats': {
      const groupBy = String(result.parameters.group_by);
      const targetCol = String(result.parameters.target_col);
      const aggType = String(result.parameters.agg_type);
      // COUNT of a monetary column is not money
      const valueMonetary = aggType !== 'COUNT' && monetary.includes(targetCol) ? ['value'] : [];
      const lines = result.rows.map(
        (row) => `- ${formatCell(groupBy, row[groupBy] ?? null, [])}: ${formatCell('value', row.value ?? null, valueMonetary)}`,
      );
      return `${aggType} of ${targetCol} by ${groupBy}:\n${lines.join('\n')}`;
    }
    case 'lookup_definition':
      return result.rows
        .map((row) => (row.kind === 'group' ? `${row.term}: ${row.columns}` : `${row.term}: ${row.description}`))
        .join('\n');
    case 'search_rows': {
      const lines = result.rows.map(
        (row, index) =>
          `${index + 1}. ${Object.entries(row)
            .map(([column, value]) => `${column}: ${formatCell(column, value, monetary)}`)
            .join(', ')}`,
      );
      return `Found ${result.count} ${result.count === 1 ? 'row' : 'rows'}:\n${lines.join('\n')}`;
    }
  }
}

/**
 * Produces the user-facing reply: a deterministic chart for aggregate results
 * that ask for one, otherwise text from a second model pass with fixed or
 * formatted fallbacks.
 */
export class ResponseSynthesizer {
  private ai: AIAdapter;
  private profile: PromptProfile;
  private logger?: Logger;

  constructor(ai: AIAdapter, profile: PromptProfile, logger?: Logger) {
    this.ai = ai;
    this.profile = profile;
    this.logger = logger;
  }

  async synthesize(input: SynthesisInput, context?: SchemaContext, requestId?: string): Promise<ChatResponse> {
    if ('resolution' in input) {
      return this.respondWithoutTool(input.utterance, input.history, input.resolution, requestId);
    }

    const { call, result } = input;
    if (!result.ok) {
      return result.error === 'invalid_parameters' ? CANNOT_ANSWER_REPLY : DATABASE_ERROR_REPLY;
    }

    if (result.count === 0) {
      if (call.tool === 'lookup_definition' && call.params.term !== undefined) {
        return `I don't have a definition for "${call.params.term}".`;
      }
      return NO_ROWS_REPLY;
    }

    if (call.tool === 'aggregate_stats' && context && wantsChart(input.utterance)) {
      return buildChartSpec(
        {
          utterance: input.utterance,
          rows: result.rows,
          groupBy: call.params.groupBy,
          targetCol: call.params.targetCol,
          aggType: call.params.aggType,
        },
        context,
      );
    }

    return this.summarize(input.utterance, result, context, requestId);
  }

  private async summarize(
    utterance: string,
    result: QuerySuccess,
    context: SchemaContext | undefined,
    requestId?: string,
  ): Promise<string> {
    const monetary = context?.monetaryColumns ?? [];
    const currencyNote = monetary.length > 0
      ? `\nFormat ${[...monetary, 'aggregated value of those columns'].join(', ')} as US dollars (e.g. $452,600).`
      : '';

    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: `${this.profile.aiContext.systemRole.trim()}

Answer the user's question using ONLY the query results below. Be concise: one short paragraph or a compact list. Do not invent rows or values.${currencyNote}

Tool: ${result.tool}
Parameters: ${JSON.stringify(result.parameters)}
Results (${result.count} rows):
${JSON.stringify(result.rows)}`,
      },
      { role: 'user', content: utterance },
    ];

    try {
      const { content } = await this.ai.invoke(messages, { temperature: 0.2, requestId });
      const reply = cleanReply(content);
      if (reply) {
        return reply;
      }
    } catch (error) {
      await this.logger?.warn('Answer synthesis failed, using formatted results', {
        requestId,
        error: errorMessage(error),
      });
    }

    return formatResult(result, context);
  }

  private redirectFallback(): string {
    return `I can only help with questions about ${this.profile.project.name} data. ` +
      'Try asking about specific values, rankings or averages in the dataset.';
  }

  private async respondWithoutTool(
    utterance: string,
    history: ConversationTurn[],
    resolution: NoToolResolution,
    requestId?: string,
  ): Promise<string> {
    if (resolution.reply) {
      const reply = cleanReply(resolution.reply);
      if (reply) {
        return reply;
      }
    }

    const unavailable = resolution.reason === 'data_unavailable'
      ? '\nThe dataset cannot be reached right now; say so if the user asks for data.'
      : '';
    const suggestions = this.profile.exampleQuestions.length > 0
      ? this.profile.exampleQuestions
      : this.profile.queryExamples.map((example) => example.question);
    const examples = suggestions.slice(0, 3).map((question) => `- ${question}`).join('\n');

    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: `${this.profile.aiContext.systemRole.trim()}

You help users explore ${this.profile.project.name} data. Reply conversationally in one or two sentences.
If the message is unrelated to ${this.profile.project.name}, politely say so and suggest a question you can answer.${unavailable}${examples ? `\n\nQuestions you can answer:\n${examples}` : ''}`,
      },
      ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: utterance },
    ];

    try {
      const { content } = await this.ai.invoke(messages, { temperature: 0.3, requestId });
      const reply = cleanReply(content);
      return reply || this.redirectFallback();
    } catch (error) {
      await this.logger?.warn('Conversational reply failed, using fixed redirect', {
        requestId,
        reason: resolution.reason,
        error: errorMessage(error),
      });
      return this.redirectFallback();
    }
  }
}
