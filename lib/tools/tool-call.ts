export const TOOL_NAMES = ['search_rows', 'aggregate_stats', 'lookup_definition'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const SORT_ORDERS = ['ASC', 'DESC'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export const AGGREGATE_FUNCTIONS = ['AVG', 'SUM', 'COUNT', 'MIN', 'MAX'] as const;
export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

export interface SearchRowsParams {
  /** Equality predicates, keyed by filterable column. */
  filters: Record<string, string>;
  rangeColumn?: string;
  minValue?: number;
  maxValue?: number;
  sortBy?: string;
  sortOrder?: SortOrder;
  limit: number;
}

export interface AggregateStatsParams {
  groupBy: string;
  targetCol: string;
  aggType: AggregateFunction;
}

export interface LookupDefinitionParams {
  term?: string;
}

/** A validated invocation of one registered tool. */
export type ToolCall =
  | { tool: 'search_rows'; params: SearchRowsParams }
  | { tool: 'aggregate_stats'; params: AggregateStatsParams }
  | { tool: 'lookup_definition'; params: LookupDefinitionParams };

export type NoToolReason =
  | 'conversational'
  | 'malformed_output'
  | 'unknown_tool'
  | 'missing_parameter'
  | 'data_unavailable';

export interface NoToolResolution {
  kind: 'no_tool';
  reason: NoToolReason;
  /** The model's own prose answer, when it gave one. */
  reply?: string;
  detail?: string;
}

export interface ToolResolution {
  kind: 'tool';
  call: ToolCall;
  /** Parameters that failed coercion and fell back to their defaults. */
  dropped: string[];
}

export type IntentResolution = NoToolResolution | ToolResolution;

export function isAggregateFunction(value: string): value is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some((fn) => fn === value);
}

export function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}
