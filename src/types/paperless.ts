// Paperless-ngx REST API payloads
// Only the fields the sync reads are declared; extra properties are allowed.

import { Type, type Static } from "@sinclair/typebox";

const NullableString = Type.Union([Type.String(), Type.Null()]);

/**
 * Paginated list envelope returned by every /api/<resource>/ endpoint
 */
export const PaperlessPageSchema = Type.Object({
  count: Type.Integer(),
  next: NullableString,
  previous: Type.Optional(NullableString),
  results: Type.Array(Type.Unknown()),
});

export type PaperlessPage = Static<typeof PaperlessPageSchema>;

/**
 * Document as returned by /api/documents/ and /api/documents/{id}/
 *
 * `correspondent` and `tags` are primary keys; dates are ISO 8601 strings
 * (`created` is date-only on recent Paperless releases).
 */
export const PaperlessDocumentSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
  title: Type.String(),
  created: Type.Optional(NullableString),
  added: Type.Optional(NullableString),
  modified: Type.Optional(NullableString),
  correspondent: Type.Optional(
    Type.Union([Type.Integer({ minimum: 1 }), Type.Null()])
  ),
  tags: Type.Optional(Type.Array(Type.Integer({ minimum: 1 }))),
  original_file_name: Type.Optional(NullableString),
});

export type PaperlessDocument = Static<typeof PaperlessDocumentSchema>;

/**
 * Projection used by the identifier scan (`?fields=id`)
 */
export const PaperlessIdSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
});

export const PaperlessTagSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
  name: Type.String(),
  color: Type.Optional(NullableString),
});

export type PaperlessTag = Static<typeof PaperlessTagSchema>;

export const PaperlessCorrespondentSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
  name: Type.String(),
});

export type PaperlessCorrespondent = Static<
  typeof PaperlessCorrespondentSchema
>;
