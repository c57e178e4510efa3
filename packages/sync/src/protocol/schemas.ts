/**
 * Wire shapes of the sync endpoints (snake_case, as the backend sends them).
 * Missing optional members get the same defaults the backend documents.
 */
import { ValidationError, valueMapSchema, type Value } from '@ledgerlink/core';
import { z } from 'zod';

const entityIdSchema = z.union([z.number(), z.string()]);

const keyedFailureSchema = z.union([
  z.string().transform((key) => ({ key, reason: 'Rejected by server' })),
  z
    .object({
      idempotency_key: z.string().optional(),
      conflict_id: entityIdSchema.optional(),
      reason: z.string().optional(),
      error: z.string().optional(),
      message: z.string().optional(),
    })
    .transform((entry) => ({
      key: entry.idempotency_key ?? (entry.conflict_id === undefined ? '' : String(entry.conflict_id)),
      reason: entry.reason ?? entry.error ?? entry.message ?? 'Rejected by server',
    })),
]);

export const wireConflictSchema = z.object({
  conflict_id: entityIdSchema.optional(),
  idempotency_key: z.string(),
  kind: z.string().optional(),
  type: z.string().optional(),
  remote_payload: valueMapSchema.nullable().optional(),
});

export const pushResponseSchema = z.object({
  successful: z.array(z.string()).default([]),
  failed: z.array(keyedFailureSchema).default([]),
  conflicts: z.array(wireConflictSchema).default([]),
});

export const pullResponseSchema = z.object({
  data: z.record(z.array(valueMapSchema)).default({}),
  total_records: z.number().int().nonnegative().default(0),
  synced_at: z.string().nullable().default(null),
});

export const wireEventSchema = z.object({
  id: z.number().int(),
  event_type: z.string().default('update'),
  entity_type: z.string().optional(),
  model: z.string().optional(),
  record_id: entityIdSchema.nullable().optional(),
  data: valueMapSchema.optional(),
  created_at: z.string().nullable().optional(),
});

export const smartPullResponseSchema = z.object({
  has_updates: z.boolean().default(false),
  new_events_count: z.number().int().nonnegative().default(0),
  events: z.array(wireEventSchema).default([]),
  next_sync_token: z.string().nullable().default(null),
  last_sync_time: z.string().nullable().default(null),
});

export const checkUpdatesResponseSchema = z.object({
  has_updates: z.boolean().default(false),
  pending_events: z.number().int().nonnegative().default(0),
  last_event_id: z.number().int().nullable().default(null),
});

export const resolveConflictsResponseSchema = z.object({
  resolved: z.array(entityIdSchema.transform(String)).default([]),
  failed: z.array(keyedFailureSchema).default([]),
});

export const syncStateResponseSchema = z.object({
  device_id: z.string().default('unknown'),
  last_sync_at: z.string().nullable().default(null),
  pending_changes: z.number().int().nonnegative().default(0),
  metadata: valueMapSchema.nullable().default(null),
});

export const eventStateResponseSchema = z.object({
  user_id: entityIdSchema.default(''),
  device_id: z.string().default('unknown'),
  last_event_id: z.number().int().nullable().default(null),
  last_sync_at: z.string().nullable().default(null),
  sync_count: z.number().int().nonnegative().default(0),
  status: z.string().default('unknown'),
});

export const healthResponseSchema = z.object({
  status: z.string().default('unknown'),
  healthy: z.boolean().optional(),
  version: z.string().nullable().default(null),
});

export const successResponseSchema = z.object({
  success: z.boolean().default(true),
});

export const ackResponseSchema = z.object({
  success: z.boolean().default(true),
  last_event_id: z.number().int().nullable().default(null),
});

export type WireConflict = z.infer<typeof wireConflictSchema>;
export type WireEvent = z.infer<typeof wireEventSchema>;

/**
 * Validate a response body, raising `LL_V301` when it does not fit
 */
export function parseWire<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: Value, path: string): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError('LL_V301', `Malformed response from ${path}`, {
      path,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
