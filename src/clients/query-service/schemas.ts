/**
 * Query Service Wire Schemas
 *
 * zod schemas for the JSON bodies the service returns. Optional fields may
 * arrive as null as well as missing, so both are accepted.
 */

import { z } from 'zod';

const optionalText = z.string().nullish();

export const interactionSchema = z.object({
  agent: optionalText.transform(value => value ?? 'Unknown Agent'),
  input: optionalText.transform(value => value ?? ''),
  output: optionalText.transform(value => value ?? ''),
});

export const finalResultSchema = z
  .object({
    error_message: optionalText,
  })
  .passthrough();

export const sessionResponseSchema = z.object({
  agent_interactions: z.array(interactionSchema).nullish(),
  final_result: finalResultSchema.nullish(),
});

export const latestSessionResponseSchema = z.object({
  session_id: optionalText,
});

export const queryResponseSchema = z.object({
  success: z.boolean(),
  result: optionalText,
  sql: optionalText,
  data: z.array(z.record(z.unknown())).nullish(),
  debug_info: z.record(z.unknown()).nullish(),
  error_type: optionalText,
  error_details: optionalText,
});

export const databaseCheckResponseSchema = z.object({
  success: z.boolean(),
  message: optionalText,
  connection_time: z.number().nullish(),
  database_info: z
    .object({
      database: z.string(),
      host: z.string(),
      port: z.union([z.number(), z.string()]),
    })
    .nullish(),
});

export const healthResponseSchema = z.object({
  status: z.string(),
  timestamp: optionalText,
});

export type SessionResponse = z.infer<typeof sessionResponseSchema>;
export type QueryResponse = z.infer<typeof queryResponseSchema>;
export type DatabaseCheckResponse = z.infer<typeof databaseCheckResponseSchema>;
