import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { ApiError, decodeError } from './errors';
import { Logger } from './logger';

/**
 * zod building blocks for the backend's snake_case JSON. Schemas transform
 * straight into the camelCase client shapes; a failed parse becomes a
 * `decode` ApiError naming the offending fields.
 */

// ─── Timestamps ─────────────────────────────────────────────────────────────

interface TimestampFormat {
  name: string;
  shape: RegExp;
}

const ZONE = '(Z|[+-]\\d{2}:\\d{2})$';
const DATE_TIME = '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}';

/** Tried in order; the first shape that matches decides the format. */
export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  { name: "yyyy-MM-dd'T'HH:mm:ss.SSSSSSXXX", shape: new RegExp(`${DATE_TIME}\\.\\d{6}${ZONE}`) },
  { name: "yyyy-MM-dd'T'HH:mm:ss.SSSXXX", shape: new RegExp(`${DATE_TIME}\\.\\d{3}${ZONE}`) },
  { name: "yyyy-MM-dd'T'HH:mm:ssXXX", shape: new RegExp(`${DATE_TIME}${ZONE}`) },
  { name: "yyyy-MM-dd'T'HH:mm:ss'Z'", shape: new RegExp(`${DATE_TIME}Z$`) },
];

function toInstant(value: string): Date | null {
  const input = value.trim();
  if (!TIMESTAMP_FORMATS.some((format) => format.shape.test(input))) return null;
  // every accepted shape carries a zone, so parseISO resolves it in UTC
  const parsed = parseISO(input);
  return isValid(parsed) ? parsed : null;
}

/**
 * Parse a backend timestamp. Fails with a decode error when no known
 * format matches; never substitutes the current time.
 */
export function parseTimestamp(value: string): Date {
  const parsed = toInstant(value);
  if (!parsed) throw decodeError(`Invalid date format: ${value}`, value);
  return parsed;
}

// ─── Field schemas ──────────────────────────────────────────────────────────

/** ids are UUID strings, but some endpoints send integer primary keys. */
export const wireId = z.union([z.string(), z.number().finite().transform(String)]);

export const wireTimestamp = z.string().transform((value, ctx) => {
  const parsed = toInstant(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date format: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

export const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const stringList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

export function numberOr(fallback: number) {
  return z
    .number()
    .finite()
    .nullish()
    .transform((value) => value ?? fallback);
}

export function booleanOr(fallback: boolean) {
  return z
    .boolean()
    .nullish()
    .transform((value) => value ?? fallback);
}

// ─── Parsing ────────────────────────────────────────────────────────────────

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function toDecodeError(error: z.ZodError, what: string): ApiError {
  return decodeError(`Invalid ${what}: ${formatIssues(error)}`);
}

/** Parse or throw a `decode` ApiError. */
export function parseWire<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) throw toDecodeError(result.error, what);
  return result.data;
}

/** Parse, or log and return null so the caller can drop the record. */
export function parseOrDrop<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  what: string,
  logger: Logger,
): z.output<S> | null {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  logger.warn(`Dropped ${what}: ${formatIssues(result.error)}`);
  return null;
}

/**
 * Copy a nested parse failure onto the enclosing schema's context under
 * `key`. Returns null when the nested value did not parse.
 */
export function parseNested<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  key: string,
  ctx: z.RefinementCtx,
): z.output<S> | null {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  for (const issue of result.error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, ...issue.path], message: issue.message });
  }
  return null;
}

// ─── Lists ──────────────────────────────────────────────────────────────────

const wireList = z.array(z.unknown());

/**
 * Decode every element of a wire list. A record that fails its schema is
 * dropped and logged; the rest of the list survives. A payload that is not
 * a list at all is a decode error.
 */
export function decodeEach<S extends z.ZodTypeAny>(
  value: unknown,
  what: string,
  schema: S,
  logger: Logger,
): Array<z.output<S>> {
  const decoded: Array<z.output<S>> = [];
  parseWire(wireList, value, what).forEach((raw, index) => {
    const item = parseOrDrop(schema, raw, `${what}[${index}]`, logger);
    if (item !== null) decoded.push(item);
  });
  return decoded;
}
