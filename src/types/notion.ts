// Notion REST API payloads (Notion-Version 2022-06-28)

import { Type, type Static } from "@sinclair/typebox";

// =====================
// Responses
// =====================

/**
 * Database query response: one page of results plus the cursor
 */
export const NotionListSchema = Type.Object({
  results: Type.Array(Type.Unknown()),
  has_more: Type.Boolean(),
  next_cursor: Type.Union([Type.String(), Type.Null()]),
});

export type NotionList = Static<typeof NotionListSchema>;

export const NotionPageSchema = Type.Object({
  object: Type.Literal("page"),
  id: Type.String(),
  archived: Type.Optional(Type.Boolean()),
  properties: Type.Record(Type.String(), Type.Unknown()),
});

export type NotionPage = Static<typeof NotionPageSchema>;

/**
 * Shape of a number property value as read back from a page
 */
export const NotionNumberValueSchema = Type.Object({
  number: Type.Union([Type.Number(), Type.Null()]),
});

export const NotionErrorSchema = Type.Object({
  object: Type.Literal("error"),
  code: Type.String(),
  message: Type.String(),
});

// =====================
// Requests
// =====================

export interface NotionRichText {
  type: "text";
  text: { content: string };
}

export interface NotionExternalFile {
  name: string;
  type: "external";
  external: { url: string };
}

export type NotionPropertyValue =
  | { title: NotionRichText[] }
  | { rich_text: NotionRichText[] }
  | { number: number | null }
  | { date: { start: string } | null }
  | { relation: { id: string }[] }
  | { files: NotionExternalFile[] };

export type NotionProperties = Record<string, NotionPropertyValue>;

export interface NotionNumberFilter {
  property: string;
  number: { equals: number };
}

export interface NotionQueryBody {
  filter?: NotionNumberFilter;
  start_cursor?: string;
  page_size?: number;
}
