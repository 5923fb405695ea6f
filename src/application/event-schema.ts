import { z } from 'zod';
import { EVENT_TYPE_PATTERN, ValidationError } from '../domain/index.js';
import type { ListEventsQuery } from '../domain/index.js';

export const TYPE_REQUIRED_MESSAGE = "Field 'type' is required and must not be empty";
export const TYPE_FORMAT_MESSAGE = 'Event type must contain only lowercase letters and digits';
export const OFFSET_MESSAGE = "Parameter 'offset' must be a non-negative integer";
export const LIMIT_MESSAGE = "Parameter 'limit' must be an integer between 0 and 100";

export const MAX_LIMIT = 100;

/**
 * Zod schema for an event type.
 *
 * An empty string reports the "required" message first, so callers
 * can surface the first issue as-is.
 */
export const eventTypeSchema = z
  .string({ required_error: TYPE_REQUIRED_MESSAGE, invalid_type_error: TYPE_REQUIRED_MESSAGE })
  .min(1, TYPE_REQUIRED_MESSAGE)
  .regex(EVENT_TYPE_PATTERN, TYPE_FORMAT_MESSAGE);

/** Body accepted by both start and finish. */
export const typeBodySchema = z.object(
  { type: eventTypeSchema },
  { required_error: TYPE_REQUIRED_MESSAGE, invalid_type_error: TYPE_REQUIRED_MESSAGE },
);

export type TypeBody = z.infer<typeof typeBodySchema>;

/** Query values arrive as strings; an empty value counts as absent. */
function emptyAsAbsent(value: unknown): unknown {
  return value === '' ? undefined : value;
}

function intParam(message: string, max: number) {
  return z.preprocess(
    emptyAsAbsent,
    z
      .string({ invalid_type_error: message })
      .regex(/^\d+$/, message)
      .default('0')
      .transform(Number)
      .pipe(z.number().int(message).max(max, message)),
  );
}

export const paginationSchema = z.object({
  offset: intParam(OFFSET_MESSAGE, Number.MAX_SAFE_INTEGER),
  limit: intParam(LIMIT_MESSAGE, MAX_LIMIT),
});

export type Pagination = z.infer<typeof paginationSchema>;

export const listQuerySchema = paginationSchema.extend({
  type: z.string({ invalid_type_error: "Parameter 'type' must be a single string" }).optional(),
});

function toValidationError(error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
  return new ValidationError(issues[0]?.message ?? 'Validation failed', issues);
}

/** True iff `value` is a well-formed event type. */
export function validateType(value: string): boolean {
  return EVENT_TYPE_PATTERN.test(value);
}

/**
 * Validates a start/finish request body and returns its type.
 * @throws ValidationError
 */
export function parseTypeBody(body: unknown): string {
  const parsed = typeBodySchema.safeParse(body);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data.type;
}

/**
 * Parses raw offset/limit values. Absent values default to 0;
 * out-of-range values are rejected, never clamped.
 * @throws ValidationError
 */
export function validatePagination(offsetRaw: unknown, limitRaw: unknown): Pagination {
  const parsed = paginationSchema.safeParse({ offset: offsetRaw, limit: limitRaw });
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

/**
 * Parses the list querystring: pagination plus an optional exact type filter.
 * @throws ValidationError
 */
export function parseListQuery(query: unknown): ListEventsQuery {
  const parsed = listQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  const { offset, limit, type } = parsed.data;
  return { offset, limit, type };
}
