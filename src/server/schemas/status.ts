/**
 * TypeBox schemas for the status server
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  requestId: Type.Optional(Type.String()),
});

export type ApiError = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Schemas
// ============================================================================

export const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

export const CategoryResultSchema = Type.Object({
  inserted: Type.Integer(),
  updated: Type.Integer(),
  archived: Type.Integer(),
  skipped: Type.Integer(),
  failed: Type.Integer(),
  errors: Type.Array(Type.String()),
});

export const CycleSummarySchema = Type.Object({
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.String({ format: "date-time" }),
  duration: Type.Number(),
  correspondents: CategoryResultSchema,
  tags: CategoryResultSchema,
  archive: CategoryResultSchema,
  documents: CategoryResultSchema,
});

export type CycleSummary = Static<typeof CycleSummarySchema>;

export const StatusResponseSchema = Type.Object({
  running: Type.Boolean(),
  lastSyncAt: Nullable(Type.String({ format: "date-time" })),
  nextRunAt: Nullable(Type.String({ format: "date-time" })),
  lastError: Nullable(Type.String()),
  lastCycle: Type.Union([CycleSummarySchema, Type.Null()]),
});

export type StatusResponse = Static<typeof StatusResponseSchema>;
