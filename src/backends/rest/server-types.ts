/**
 * Server response schemas
 *
 * zod schemas matching the JSON returned by the queries endpoint. Parsed
 * values are mapped onto the public types in `query.ts`; the schemas are not
 * exported from the package.
 */

import { z } from 'zod';
import type { JsonValue } from '../../types';

export const ColumnTypeSchema = z.enum(['NUMBER', 'PERCENTAGE', 'STRING', 'TIMESTAMP']);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

/** The server names the column type `cellType`; older responses use `type` */
export const ServerColumnSchema = z
  .object({
    name: z.string(),
    cellType: ColumnTypeSchema.optional(),
    type: ColumnTypeSchema.optional(),
    decimalPlaces: z.number().int().nullish(),
  })
  .refine((column) => column.cellType !== undefined || column.type !== undefined, {
    message: 'column type is required',
  });

export const ServerTableResultSchema = z.object({
  matchCount: z.number().default(0),
  values: z.array(z.array(JsonValueSchema)),
  columns: z.array(ServerColumnSchema),
  keyColumns: z.number().int().nullish(),
  omittedEvents: z.number().nullish(),
  partialResultsDueToTimeLimit: z.boolean().nullish(),
  discardedArrayItems: z.number().int().nullish(),
  warnings: z.array(z.string()).nullish(),
});

export const ServerQueryResultSchema = z.object({
  id: z.string().nullish(),
  stepsCompleted: z.number().int().nonnegative(),
  totalSteps: z.number().int().nonnegative(),
  resolvedTimeRange: z.object({ start: z.number(), end: z.number() }).nullish(),
  error: z
    .object({
      message: z.string(),
      details: z.record(z.string(), JsonValueSchema).nullish(),
    })
    .nullish(),
  cpuUsage: z.number().default(0),
  data: ServerTableResultSchema.nullish(),
});

export const ServerSubmitQueryResponseSchema = ServerQueryResultSchema;
export const ServerPingResponseSchema = ServerQueryResultSchema;

export type ServerColumn = z.infer<typeof ServerColumnSchema>;
export type ServerTableResult = z.infer<typeof ServerTableResultSchema>;
export type ServerQueryResult = z.infer<typeof ServerQueryResultSchema>;
