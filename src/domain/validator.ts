import { z } from 'zod';
import { DomainError } from './errors.js';
import {
  DATE_RANGES,
  MAX_OPTIONS_COUNT,
  MAX_OPTION_KEY_LENGTH,
  MAX_OPTION_VALUE_LENGTH,
  MAX_QUERY_LENGTH,
  MAX_SOURCES_COUNT,
  MAX_TOKENS_LIMIT,
  SEARCH_MODES,
  SONAR_MODELS,
  isOneOf,
  type SearchRequest
} from './search.js';

export type ValidationOutcome =
  | { ok: true; request: SearchRequest }
  | { ok: false; error: DomainError };

// Empty string is accepted and means "not set".
function optionalEnum<T extends string>(field: string, values: readonly T[]) {
  return z
    .string({ invalid_type_error: `${field} must be a string` })
    .optional()
    .superRefine((value, ctx) => {
      if (value && !isOneOf(values, value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid ${field} '${value}', must be one of: ${values.join(', ')}`
        });
      }
    })
    .transform((value) => (value && isOneOf(values, value) ? value : undefined));
}

const searchArgumentsSchema = z
  .object(
    {
      query: z
        .string({ required_error: 'query is required', invalid_type_error: 'query must be a string' })
        .refine((value) => value.trim().length > 0, 'query must not be blank')
        .refine(
          (value) => value.length <= MAX_QUERY_LENGTH,
          (value) => ({ message: `query length ${value.length} exceeds maximum ${MAX_QUERY_LENGTH}` })
        ),
      model: optionalEnum('model', SONAR_MODELS),
      search_mode: optionalEnum('search_mode', SEARCH_MODES),
      date_range: optionalEnum('date_range', DATE_RANGES),
      max_tokens: z
        .number({ invalid_type_error: 'max_tokens must be a number' })
        .int('max_tokens must be an integer')
        .min(0, 'max_tokens cannot be negative')
        .max(MAX_TOKENS_LIMIT, `max_tokens exceeds maximum ${MAX_TOKENS_LIMIT}`)
        .optional(),
      sources: z
        .array(z.string({ invalid_type_error: 'sources must contain only strings' }), {
          invalid_type_error: 'sources must be an array'
        })
        .max(MAX_SOURCES_COUNT, `sources count exceeds maximum ${MAX_SOURCES_COUNT}`)
        .optional(),
      options: z
        .record(z.string({ invalid_type_error: 'option values must be strings' }), {
          invalid_type_error: 'options must be an object'
        })
        .optional()
        .superRefine((options, ctx) => {
          if (!options) return;
          const entries = Object.entries(options);
          if (entries.length > MAX_OPTIONS_COUNT) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `options count ${entries.length} exceeds maximum ${MAX_OPTIONS_COUNT}`
            });
            return;
          }
          for (const [key, value] of entries) {
            if (key.length > MAX_OPTION_KEY_LENGTH) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `option key length ${key.length} exceeds maximum ${MAX_OPTION_KEY_LENGTH}`
              });
              return;
            }
            if (value.length > MAX_OPTION_VALUE_LENGTH) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `option value length for '${key}' exceeds maximum ${MAX_OPTION_VALUE_LENGTH}`
              });
              return;
            }
          }
        })
    },
    { invalid_type_error: 'arguments must be an object', required_error: 'arguments must be an object' }
  );

export function validateSearchRequest(raw: unknown): ValidationOutcome {
  const parsed = searchArgumentsSchema.safeParse(raw);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    return { ok: false, error: new DomainError('InvalidRequest', first?.message ?? 'invalid search request') };
  }

  const args = parsed.data;
  const request: SearchRequest = {
    query: args.query,
    model: args.model,
    searchMode: args.search_mode,
    dateRange: args.date_range,
    maxTokens: args.max_tokens ? args.max_tokens : undefined,
    sources: Object.freeze([...(args.sources ?? [])]),
    options: Object.freeze({ ...(args.options ?? {}) })
  };

  return { ok: true, request: Object.freeze(request) };
}
