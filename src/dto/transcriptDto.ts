import { z } from 'zod';
import { DEFAULT_LANGUAGES, TRANSCRIPT_FORMATS, type TranscriptRequest } from '../types/transcript';
import { AppError } from '../utils/appError';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const formatSchema = z.enum(TRANSCRIPT_FORMATS);

const queryBooleanSchema = z.string().transform((value, ctx) => {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;

  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Input should be a valid boolean' });
  return z.NEVER;
});

// null in the body means "use the default", same as leaving the field out
export const transcriptBodySchema = z.object({
  url_or_id: z.string().min(1),
  languages: z.array(z.string()).nullish().transform(languages => languages ?? [...DEFAULT_LANGUAGES]),
  format: formatSchema.nullish().transform(format => format ?? 'json'),
  preserve_formatting: z.boolean().nullish().transform(preserve => preserve ?? false)
});

export const transcriptQuerySchema = z.object({
  languages: z
    .string()
    .default(DEFAULT_LANGUAGES.join(','))
    .transform(languages => languages.split(',').map(language => language.trim())),
  format: formatSchema.default('json'),
  preserve_formatting: queryBooleanSchema.default('false')
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'request'}: ${issue.message}`)
    .join('; ');
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw AppError.validation(describeIssues(result.error));
  }
  return result.data;
}

/** Validates a POST /transcript body. */
export function parseTranscriptBody(body: unknown): TranscriptRequest {
  const parsed = parseOrThrow(transcriptBodySchema, body);
  return {
    urlOrId: parsed.url_or_id,
    languages: parsed.languages,
    format: parsed.format,
    preserveFormatting: parsed.preserve_formatting
  };
}

/** Validates the query string of GET /transcript/:video_id. */
export function parseTranscriptQuery(videoId: string, query: unknown): TranscriptRequest {
  const parsed = parseOrThrow(transcriptQuerySchema, query);
  return {
    urlOrId: videoId,
    languages: parsed.languages,
    format: parsed.format,
    preserveFormatting: parsed.preserve_formatting
  };
}
