import { z } from 'zod';

export type ParameterType = 'string' | 'number' | 'integer';

export type ParameterValue = string | number;

/**
 * Declared shape of one tool parameter. Echoed to the model as-is and used to
 * coerce whatever the model sends back.
 */
export interface ParameterSpec {
  type: ParameterType;
  description: string;
  required?: boolean;
  default?: ParameterValue;
  /** Closed value set; matched case-insensitively and returned in canonical form. */
  allowed?: readonly string[];
  /** Extra spellings mapped onto members of `allowed`. */
  synonyms?: Readonly<Record<string, string>>;
  /** Numeric values outside [min, max] are clamped. */
  min?: number;
  max?: number;
}

export type CoercionResult =
  | { ok: true; value: ParameterValue }
  | { ok: false; reason: string };

export interface CoercedParameters {
  values: Record<string, ParameterValue>;
  /** Supplied but failed coercion; defaults applied where declared. */
  dropped: string[];
  /** Required and neither supplied nor defaulted. */
  missing: string[];
}

const MAGNITUDES: Record<string, number> = {
  k: 1e3,
  thousand: 1e3,
  m: 1e6,
  mm: 1e6,
  million: 1e6,
  b: 1e9,
  bn: 1e9,
  billion: 1e9,
};

const NUMERIC_TEXT = /^(-)?\$?\s*(-)?([\d,]*\.?\d+)\s*(k|thousand|mm|m|million|bn|b|billion)?$/i;
const SCIENTIFIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)e[+-]?\d+$/i;

/**
 * "$500k" -> 500000, "1,250" -> 1250, " 42 " -> 42, "1e5" -> 100000. Anything else is returned
 * unchanged so the schema reports it.
 */
export function parseNumeric(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const text = value.trim();
  const match = text.match(NUMERIC_TEXT);
  if (!match) {
    return SCIENTIFIC_TEXT.test(text) ? Number(text) : value;
  }
  const [, leadingMinus, innerMinus, digits, suffix] = match;
  const magnitude = suffix ? MAGNITUDES[suffix.toLowerCase()] : 1;
  const sign = leadingMinus || innerMinus ? -1 : 1;
  return sign * Number(digits.replace(/,/g, '')) * magnitude;
}

/** Case and separator insensitive key: "Near Bay" and "near_bay" compare equal. */
export function normalizeToken(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function matchAllowed(spec: ParameterSpec, value: string): string | undefined {
  const allowed = spec.allowed ?? [];
  const token = normalizeToken(value);

  const direct = allowed.find((candidate) => normalizeToken(candidate) === token);
  if (direct !== undefined) {
    return direct;
  }

  for (const [synonym, target] of Object.entries(spec.synonyms ?? {})) {
    if (normalizeToken(synonym) === token && allowed.includes(target)) {
      return target;
    }
  }
  return undefined;
}

function clamp(value: number, spec: ParameterSpec): number {
  let result = value;
  if (spec.min !== undefined) result = Math.max(result, spec.min);
  if (spec.max !== undefined) result = Math.min(result, spec.max);
  return result;
}

function schemaFor(spec: ParameterSpec): z.ZodType<ParameterValue, z.ZodTypeDef, unknown> {
  switch (spec.type) {
    case 'number':
      return z.preprocess(parseNumeric, z.number().finite()).transform((value) => clamp(value, spec));
    case 'integer':
      return z.preprocess(parseNumeric, z.number().int()).transform((value) => clamp(value, spec));
    case 'string':
      return z
        .preprocess((value) => (typeof value === 'number' ? String(value) : value), z.string().trim().min(1))
        .transform((value, ctx) => {
          if (!spec.allowed) {
            return value;
          }
          const matched = matchAllowed(spec, value);
          if (matched === undefined) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `expected one of ${spec.allowed.join(', ')}`,
            });
            return z.NEVER;
          }
          return matched;
        });
  }
}

export function coerceParameter(spec: ParameterSpec, value: unknown): CoercionResult {
  const parsed = schemaFor(spec).safeParse(value);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, reason: parsed.error.issues.map((issue) => issue.message).join('; ') };
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * Coerce raw model-supplied parameters against `specs`. Unknown names are
 * ignored; `aliases` maps alternative parameter names onto declared ones.
 */
export function coerceParameters(
  specs: Readonly<Record<string, ParameterSpec>>,
  raw: Readonly<Record<string, unknown>>,
  aliases: Readonly<Record<string, string>> = {},
): CoercedParameters {
  const declared = new Map(Object.keys(specs).map((name) => [normalizeToken(name), name]));
  const aliasMap = new Map(Object.entries(aliases).map(([from, to]) => [normalizeToken(from), normalizeToken(to)]));
  const supplied = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    const token = normalizeToken(key);
    const name = declared.get(aliasMap.get(token) ?? token);
    if (name !== undefined && !supplied.has(name)) {
      supplied.set(name, value);
    }
  }

  const result: CoercedParameters = { values: {}, dropped: [], missing: [] };

  for (const [name, spec] of Object.entries(specs)) {
    const value = supplied.get(name);
    if (!isAbsent(value)) {
      const coerced = coerceParameter(spec, value);
      if (coerced.ok) {
        result.values[name] = coerced.value;
        continue;
      }
      result.dropped.push(name);
    }

    if (spec.default !== undefined) {
      result.values[name] = spec.default;
    } else if (spec.required) {
      result.missing.push(name);
    }
  }

  return result;
}
