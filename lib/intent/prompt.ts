import type { DatasetProfile, QueryExample } from '../config';
import type { ToolSpec } from '../tools/registry';
import type { ChatMessage, ConversationTurn, SchemaContext } from '../types';

export type PromptProfile = Pick<DatasetProfile, 'project' | 'aiContext' | 'queryExamples' | 'exampleQuestions'>;

function describeColumns(context: SchemaContext): string {
  return context.columns
    .map((column) => {
      let line = `- ${column.name} (${column.type})`;
      if (column.description) {
        line += `: ${column.description}`;
      }
      if (column.stats?.kind === 'numeric' && column.stats.min !== null && column.stats.max !== null) {
        line += ` [range ${column.stats.min} to ${column.stats.max}]`;
      }
      if (column.stats?.kind === 'categorical') {
        line += ` [values: ${column.stats.sampleValues.join(', ')}]`;
      }
      return line;
    })
    .join('\n');
}

/**
 * Worked utterance -> JSON examples. Configured ones win; otherwise a few
 * are derived from the whitelist so they are always valid for this table.
 */
export function workedExamples(profile: PromptProfile, context: SchemaContext): QueryExample[] {
  if (profile.queryExamples.length > 0) {
    return profile.queryExamples;
  }

  const examples: QueryExample[] = [];
  const value = context.valueColumn;
  const group = context.whitelist.filterable[0] ?? context.whitelist.groupable[0];

  if (value && context.whitelist.sortable.includes(value)) {
    examples.push({
      question: `Show the 5 rows with the highest ${value.replace(/_/g, ' ')}`,
      tool: 'search_rows',
      parameters: { sort_by: value, sort_order: 'DESC', limit: 5 },
    });
  }
  if (value && group) {
    examples.push({
      question: `What is the average ${value.replace(/_/g, ' ')} by ${group.replace(/_/g, ' ')}?`,
      tool: 'aggregate_stats',
      parameters: { group_by: group, target_col: value, agg_type: 'AVG' },
    });
  }
  const firstColumn = context.columns[0];
  if (firstColumn) {
    examples.push({
      question: `What does ${firstColumn.name} mean?`,
      tool: 'lookup_definition',
      parameters: { term: firstColumn.name },
    });
  }

  return examples;
}

function synonymRules(context: SchemaContext): string {
  const value = context.valueColumn ?? 'the main numeric column';
  return [
    `- "most expensive", "costliest", "highest", "top" -> search_rows with sort_by ${value}, sort_order "DESC"`,
    `- "cheapest", "least expensive", "lowest" -> search_rows with sort_by ${value}, sort_order "ASC"`,
    '- "average", "mean" -> aggregate_stats with agg_type "AVG"',
    '- "total", "sum" -> agg_type "SUM"; "how many", "number of" -> agg_type "COUNT"',
    '- "minimum" -> agg_type "MIN"; "maximum" -> agg_type "MAX"',
    '- "plot", "chart", "graph", "by <column>" -> aggregate_stats grouped by that column',
    '- Prices like "$500k" or "under 300,000" -> min_value / max_value on the range column',
  ].join('\n');
}

export function buildSystemPrompt(
  profile: PromptProfile,
  context: SchemaContext,
  tools: ToolSpec[],
  currentDate: string = new Date().toISOString().split('T')[0],
): string {
  const domainContext = profile.aiContext.domainContext ? `\n\n${profile.aiContext.domainContext.trim()}` : '';
  const toolList = tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  }));
  const examples = workedExamples(profile, context)
    .map((example) => `User: ${example.question}\n${JSON.stringify({ tool: example.tool, parameters: example.parameters })}`)
    .join('\n\n');

  return `${profile.aiContext.systemRole.trim()}

Current date: ${currentDate}${domainContext}

You answer questions about the table "${context.tableName}" (${context.rowCount} rows).

Columns:
${describeColumns(context)}

Column groups: ${Object.keys(context.groupings).join(', ')}

Sample rows:
${JSON.stringify(context.sampleRows)}

Tools (use ONLY these names and parameters):
${JSON.stringify(toolList, null, 2)}

Synonym rules:
${synonymRules(context)}

Examples:
${examples}

How to respond:
- If the question needs data from this table, respond with ONLY a JSON object: {"tool": "<tool name>", "parameters": {...}}
- Use column names exactly as listed. Leave out parameters the question does not mention.
- If the message is a greeting or small talk, reply briefly in plain text without JSON.
- If the question is unrelated to ${profile.project.name}, reply in plain text: say you can only help with ${profile.project.name} data and suggest a question you can answer.`;
}

export function buildIntentMessages(
  profile: PromptProfile,
  context: SchemaContext,
  tools: ToolSpec[],
  history: ConversationTurn[],
  utterance: string,
): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(profile, context, tools) },
    ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: utterance },
  ];
}
