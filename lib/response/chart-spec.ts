import type { DataRecord, SchemaContext } from '../types';

export type ChartMark = 'bar' | 'line' | 'arc' | 'circle';
export type FieldType = 'nominal' | 'quantitative';

export interface FieldEncoding {
  field: string;
  type: FieldType;
  title?: string;
}

export interface ChartSpec {
  $schema: string;
  description: string;
  data: { values: DataRecord[] };
  mark: ChartMark;
  encoding: {
    x?: FieldEncoding;
    y?: FieldEncoding;
    theta?: FieldEncoding;
    color?: FieldEncoding;
  };
}

export const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

const CHART_CUE = /\b(plot|chart|graph|visuali[sz]e|visuali[sz]ation|diagram|pie|histogram)\b/i;

const MARK_CUES: ReadonlyArray<[ChartMark, RegExp]> = [
  ['arc', /\b(pie|donut|doughnut|share|proportion|percentage breakdown)\b/i],
  ['line', /\b(line|trend|over time|timeline)\b/i],
  ['circle', /\b(scatter|correlation|relationship)\b/i],
];

export function wantsChart(utterance: string): boolean {
  return CHART_CUE.test(utterance);
}

export function selectMark(utterance: string): ChartMark {
  for (const [mark, cue] of MARK_CUES) {
    if (cue.test(utterance)) {
      return mark;
    }
  }
  return 'bar';
}

function humanize(column: string): string {
  return column.replace(/_/g, ' ');
}

export interface AggregateChartInput {
  utterance: string;
  rows: DataRecord[];
  groupBy: string;
  targetCol: string;
  aggType: string;
}

/**
 * Vega-Lite spec for an aggregate result, built without the model so the
 * structure is always valid.
 */
export function buildChartSpec(input: AggregateChartInput, context: SchemaContext): ChartSpec {
  const mark = selectMark(input.utterance);
  const groupColumn = context.columns.find((column) => column.name === input.groupBy);
  const groupType: FieldType = groupColumn?.type === 'numeric' ? 'quantitative' : 'nominal';
  const valueTitle = `${input.aggType} of ${humanize(input.targetCol)}`;
  const description = `${valueTitle} by ${humanize(input.groupBy)}`;

  const group: FieldEncoding = { field: input.groupBy, type: groupType, title: humanize(input.groupBy) };
  const value: FieldEncoding = { field: 'value', type: 'quantitative', title: valueTitle };

  const encoding: ChartSpec['encoding'] = mark === 'arc'
    ? { theta: value, color: { ...group, type: 'nominal' } }
    : { x: group, y: value };

  return {
    $schema: VEGA_LITE_SCHEMA,
    description,
    data: { values: input.rows },
    mark,
    encoding,
  };
}

/** One-line stand-in for a chart in the conversation history. */
export function describeChart(spec: ChartSpec): string {
  return `[${spec.mark} chart: ${spec.description}, ${spec.data.values.length} groups]`;
}
