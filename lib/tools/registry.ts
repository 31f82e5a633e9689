import { type ParameterSpec, type ParameterValue, coerceParameters } from './parameters';
import {
  AGGREGATE_FUNCTIONS,
  SORT_ORDERS,
  TOOL_NAMES,
  type IntentResolution,
  type ToolCall,
  type ToolName,
  isAggregateFunction,
  isSortOrder,
} from './tool-call';
import type { SchemaContext } from '../types';

export interface ToolSpec {
  name: ToolName;
  description: string;
  aliases: readonly string[];
  parameters: Readonly<Record<string, ParameterSpec>>;
}

export interface ToolRegistryOptions {
  defaultLimit: number;
  maxLimit: number;
  categoricalValueLimit: number;
  toolAliases?: Partial<Record<ToolName, string[]>>;
  parameterAliases?: Record<string, string>;
}

const SORT_ORDER_SYNONYMS: Record<string, string> = {
  descending: 'DESC',
  highest: 'DESC',
  most: 'DESC',
  top: 'DESC',
  largest: 'DESC',
  biggest: 'DESC',
  expensive: 'DESC',
  most_expensive: 'DESC',
  costliest: 'DESC',
  ascending: 'ASC',
  lowest: 'ASC',
  least: 'ASC',
  smallest: 'ASC',
  bottom: 'ASC',
  cheapest: 'ASC',
};

const AGGREGATE_SYNONYMS: Record<string, string> = {
  average: 'AVG',
  mean: 'AVG',
  total: 'SUM',
  sum_of: 'SUM',
  number: 'COUNT',
  how_many: 'COUNT',
  frequency: 'COUNT',
  minimum: 'MIN',
  lowest: 'MIN',
  smallest: 'MIN',
  maximum: 'MAX',
  highest: 'MAX',
  largest: 'MAX',
};

const SEARCH_CONTROL_PARAMETERS = new Set(['range_column', 'sort_by', 'sort_order']);

function asString(value: ParameterValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asNumber(value: ParameterValue | undefined): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function describeColumn(context: SchemaContext, column: string): string {
  const definition = context.definitions[column];
  return definition ? ` (${definition})` : '';
}

function searchRowsSpec(context: SchemaContext, options: ToolRegistryOptions): ToolSpec {
  const parameters: Record<string, ParameterSpec> = {};

  for (const column of context.whitelist.filterable) {
    const stats = context.columns.find((candidate) => candidate.name === column)?.stats;
    const spec: ParameterSpec = {
      type: 'string',
      description: `Only rows whose ${column} equals this value${describeColumn(context, column)}`,
    };
    // Only a complete value list can close the set
    if (stats?.kind === 'categorical' && stats.cardinality <= options.categoricalValueLimit) {
      spec.allowed = stats.sampleValues;
    }
    parameters[column] = spec;
  }

  const rangeDefault = context.valueColumn !== undefined && context.whitelist.range.includes(context.valueColumn)
    ? context.valueColumn
    : undefined;

  parameters.range_column = {
    type: 'string',
    description: 'Numeric column that min_value / max_value apply to',
    allowed: context.whitelist.range,
    ...(rangeDefault !== undefined && { default: rangeDefault }),
  };
  parameters.min_value = {
    type: 'number',
    description: 'Lower bound (inclusive) on range_column',
  };
  parameters.max_value = {
    type: 'number',
    description: 'Upper bound (inclusive) on range_column',
  };
  parameters.sort_by = {
    type: 'string',
    description: 'Column to sort by',
    allowed: context.whitelist.sortable,
  };
  parameters.sort_order = {
    type: 'string',
    description: 'DESC for highest/most expensive first, ASC for lowest/cheapest first',
    allowed: SORT_ORDERS,
    synonyms: SORT_ORDER_SYNONYMS,
  };
  parameters.limit = {
    type: 'integer',
    description: `Number of rows to return (1-${options.maxLimit})`,
    default: options.defaultLimit,
    min: 1,
    max: options.maxLimit,
  };

  return {
    name: 'search_rows',
    description: `Find individual rows of ${context.tableName}: filter by exact category values or a numeric range, sort by a column and return a few rows.`,
    aliases: options.toolAliases?.search_rows ?? [],
    parameters,
  };
}

function aggregateStatsSpec(context: SchemaContext, options: ToolRegistryOptions): ToolSpec {
  return {
    name: 'aggregate_stats',
    description: 'Group rows by one column and aggregate a numeric column per group (average, total, count, minimum, maximum).',
    aliases: options.toolAliases?.aggregate_stats ?? [],
    parameters: {
      group_by: {
        type: 'string',
        description: 'Column to group by',
        required: true,
        allowed: context.whitelist.groupable,
      },
      target_col: {
        type: 'string',
        description: 'Numeric column to aggregate',
        allowed: context.whitelist.aggregatable,
        ...(context.valueColumn !== undefined ? { default: context.valueColumn } : { required: true }),
      },
      agg_type: {
        type: 'string',
        description: 'Aggregate function',
        default: 'AVG',
        allowed: AGGREGATE_FUNCTIONS,
        synonyms: AGGREGATE_SYNONYMS,
      },
    },
  };
}

function lookupDefinitionSpec(context: SchemaContext, options: ToolRegistryOptions): ToolSpec {
  return {
    name: 'lookup_definition',
    description: 'Explain what a column or a group of columns means, from the data dictionary. Reads no rows.',
    aliases: options.toolAliases?.lookup_definition ?? [],
    parameters: {
      term: {
        type: 'string',
        description: `A column name or one of the groups: ${Object.keys(context.groupings).join(', ')}. Omit to list every group.`,
      },
    },
  };
}

/**
 * The closed set of tools the model may choose from, with the parameter
 * schemas derived from the dataset whitelist.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<ToolName, ToolSpec>;
  private readonly byName = new Map<string, ToolName>();
  private readonly parameterAliases: Record<string, string>;

  constructor(specs: ToolSpec[], parameterAliases: Record<string, string> = {}) {
    this.tools = new Map(specs.map((spec) => [spec.name, spec]));
    for (const spec of specs) {
      this.byName.set(spec.name.toLowerCase(), spec.name);
      for (const alias of spec.aliases) {
        this.byName.set(alias.toLowerCase(), spec.name);
      }
    }
    this.parameterAliases = parameterAliases;
  }

  listTools(): ToolSpec[] {
    return [...this.tools.values()];
  }

  /** Look a tool up by canonical name or alias, case-insensitively. */
  getTool(nameOrAlias: string): ToolSpec | undefined {
    const name = this.byName.get(nameOrAlias.trim().toLowerCase());
    return name ? this.tools.get(name) : undefined;
  }

  /**
   * Validate a model-chosen tool name and raw parameters into a {@link ToolCall}.
   * Unknown tools and missing required parameters resolve to `no_tool`.
   */
  toToolCall(toolName: string, rawParams: Readonly<Record<string, unknown>>): IntentResolution {
    const spec = this.getTool(toolName);
    if (!spec) {
      return { kind: 'no_tool', reason: 'unknown_tool', detail: `Unknown tool "${toolName}"` };
    }

    const { values, dropped, missing } = coerceParameters(spec.parameters, rawParams, this.parameterAliases);
    if (missing.length > 0) {
      return {
        kind: 'no_tool',
        reason: 'missing_parameter',
        detail: `${spec.name} needs ${missing.join(', ')}`,
      };
    }

    return { kind: 'tool', call: this.buildCall(spec, values), dropped };
  }

  private buildCall(spec: ToolSpec, values: Record<string, ParameterValue>): ToolCall {
    switch (spec.name) {
      case 'search_rows': {
        const filters: Record<string, string> = {};
        for (const [name, parameter] of Object.entries(spec.parameters)) {
          const value = asString(values[name]);
          if (parameter.type === 'string' && value !== undefined && !SEARCH_CONTROL_PARAMETERS.has(name)) {
            filters[name] = value;
          }
        }
        const sortOrder = asString(values.sort_order);
        return {
          tool: 'search_rows',
          params: {
            filters,
            rangeColumn: asString(values.range_column),
            minValue: asNumber(values.min_value),
            maxValue: asNumber(values.max_value),
            sortBy: asString(values.sort_by),
            sortOrder: sortOrder !== undefined && isSortOrder(sortOrder) ? sortOrder : undefined,
            limit: asNumber(values.limit) ?? Number(spec.parameters.limit.default),
          },
        };
      }
      case 'aggregate_stats': {
        const aggType = asString(values.agg_type) ?? 'AVG';
        return {
          tool: 'aggregate_stats',
          params: {
            groupBy: String(values.group_by),
            targetCol: String(values.target_col),
            aggType: isAggregateFunction(aggType) ? aggType : 'AVG',
          },
        };
      }
      case 'lookup_definition':
        return { tool: 'lookup_definition', params: { term: asString(values.term) } };
    }
  }
}

export function createToolRegistry(context: SchemaContext, options: ToolRegistryOptions): ToolRegistry {
  const specs: Record<ToolName, ToolSpec> = {
    search_rows: searchRowsSpec(context, options),
    aggregate_stats: aggregateStatsSpec(context, options),
    lookup_definition: lookupDefinitionSpec(context, options),
  };
  return new ToolRegistry(TOOL_NAMES.map((name) => specs[name]), options.parameterAliases);
}
