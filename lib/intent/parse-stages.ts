import { isRecord } from '../types';

/**
 * What the model's raw text turned out to be, after every parse stage had a go.
 */
export type ParseOutcome =
  | { kind: 'object'; value: Record<string, unknown>; stage: ObjectStage }
  | { kind: 'prose'; text: string }
  | { kind: 'malformed'; text: string };

export type ObjectStage = 'strict' | 'lenient';

interface ObjectParser {
  stage: ObjectStage;
  parse(span: string): Record<string, unknown> | undefined;
}

export function stripCodeFences(text: string): string {
  return text.replace(/```[\w-]*/g, '').trim();
}

/**
 * The first `{ ... }` span whose braces balance, ignoring braces inside
 * single- or double-quoted strings.
 */
export function findBalancedObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let quote: string | null = null;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (quote) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

export function parseStrict(span: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(span);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

const LITERALS = new Map([
  ['True', 'true'],
  ['False', 'false'],
  ['None', 'null'],
  ['true', 'true'],
  ['false', 'false'],
  ['null', 'null'],
]);

const ESCAPES = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
]);

function readQuoted(text: string, start: number): { value: string; end: number } {
  const quote = text[start];
  let value = '';
  let i = start + 1;

  while (i < text.length) {
    const char = text[i];
    if (char === '\\' && i + 1 < text.length) {
      const next = text[i + 1];
      value += ESCAPES.get(next) ?? next;
      i += 2;
      continue;
    }
    if (char === quote) {
      return { value, end: i + 1 };
    }
    value += char;
    i++;
  }

  return { value, end: i };
}

/**
 * Rewrite literal-style object text as JSON: single-quoted strings, True/False/None,
 * bare keys or words and trailing commas.
 */
export function toJsonText(span: string): string {
  let out = '';
  let i = 0;

  while (i < span.length) {
    const char = span[i];

    if (char === '"' || char === "'") {
      const { value, end } = readQuoted(span, i);
      out += JSON.stringify(value);
      i = end;
      continue;
    }

    if (/[-\d.]/.test(char)) {
      let j = i + 1;
      while (j < span.length && /[\d.eE+-]/.test(span[j])) j++;
      out += span.slice(i, j);
      i = j;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      let j = i + 1;
      while (j < span.length && /\w/.test(span[j])) j++;
      const word = span.slice(i, j);
      out += LITERALS.get(word) ?? JSON.stringify(word);
      i = j;
      continue;
    }

    if (char === ',') {
      let j = i + 1;
      while (j < span.length && /\s/.test(span[j])) j++;
      if (span[j] === '}' || span[j] === ']') {
        i = j;
        continue;
      }
    }

    out += char;
    i++;
  }

  return out;
}

export function parseLenient(span: string): Record<string, unknown> | undefined {
  return parseStrict(toJsonText(span));
}

const OBJECT_PARSERS: readonly ObjectParser[] = [
  { stage: 'strict', parse: parseStrict },
  { stage: 'lenient', parse: parseLenient },
];

/**
 * Fence strip, brace hunt, then each object parser in order. Text with no
 * brace at all is prose; a brace that no parser accepts is malformed.
 */
export function parseModelOutput(raw: string): ParseOutcome {
  const text = stripCodeFences(raw);
  const span = findBalancedObject(text);

  if (span === undefined) {
    return text.includes('{') ? { kind: 'malformed', text } : { kind: 'prose', text };
  }

  for (const parser of OBJECT_PARSERS) {
    const value = parser.parse(span);
    if (value) {
      return { kind: 'object', value, stage: parser.stage };
    }
  }

  return { kind: 'malformed', text };
}

/** The tool-level reading of a parsed object. */
export type Envelope =
  | { kind: 'invocation'; name: string; parameters: Record<string, unknown> }
  | { kind: 'reply'; text?: string }
  | { kind: 'unrecognized' };

const NAME_KEYS = ['tool', 'tool_name', 'name', 'function'];
const PARAMETER_KEYS = ['parameters', 'params', 'args', 'arguments', 'input'];
const REPLY_KEYS = ['response', 'reply', 'answer', 'message'];
const NO_TOOL_NAMES = new Set(['', 'none', 'null', 'no_tool', 'conversation', 'chat']);

function readParameters(value: unknown): Record<string, unknown> | undefined {
  if (isRecord(value)) {
    return value;
  }
  // {"arguments": "{\"group_by\": ...}"}
  if (typeof value === 'string') {
    const span = findBalancedObject(value);
    return span === undefined ? undefined : parseStrict(span) ?? parseLenient(span);
  }
  return undefined;
}

function readReply(value: Record<string, unknown>): string | undefined {
  for (const key of REPLY_KEYS) {
    const reply = value[key];
    if (typeof reply === 'string' && reply.trim() !== '') {
      return reply.trim();
    }
  }
  return undefined;
}

/**
 * Accepts `{tool, parameters}` and its spelling variants, parameters inlined
 * beside the tool name, `{function: {name, arguments}}` and the flat
 * `{<tool_name>: {...}}` shape.
 */
export function readEnvelope(value: Record<string, unknown>, isKnownTool: (name: string) => boolean): Envelope {
  for (const nameKey of NAME_KEYS) {
    const candidate = value[nameKey];

    if (isRecord(candidate)) {
      const nested = readEnvelope(candidate, isKnownTool);
      if (nested.kind === 'invocation') {
        return nested;
      }
      continue;
    }

    if (candidate === null || typeof candidate === 'string') {
      const name = (candidate ?? '').trim();
      if (NO_TOOL_NAMES.has(name.toLowerCase())) {
        return { kind: 'reply', text: readReply(value) };
      }

      for (const parameterKey of PARAMETER_KEYS) {
        const parameters = readParameters(value[parameterKey]);
        if (parameters) {
          return { kind: 'invocation', name, parameters };
        }
      }

      const inline = Object.fromEntries(
        Object.entries(value).filter(([key]) => !NAME_KEYS.includes(key) && !PARAMETER_KEYS.includes(key)),
      );
      return { kind: 'invocation', name, parameters: inline };
    }
  }

  const entries = Object.entries(value);
  const flat = entries.find(([key, parameters]) => isKnownTool(key) && (isRecord(parameters) || parameters === null));
  if (flat) {
    const [name, parameters] = flat;
    return { kind: 'invocation', name, parameters: isRecord(parameters) ? parameters : {} };
  }

  if (entries.length === 1) {
    const [name, parameters] = entries[0];
    if (isRecord(parameters)) {
      return { kind: 'invocation', name, parameters };
    }
  }

  const reply = readReply(value);
  if (reply !== undefined) {
    return { kind: 'reply', text: reply };
  }

  return { kind: 'unrecognized' };
}
