/**
 * Notion property builders for the three mirrored databases.
 *
 * Property names must match the columns of the Notion databases.
 */

import { extname } from "node:path";

import { Value } from "@sinclair/typebox/value";

import { NotionNumberValueSchema } from "../types/notion.js";

import type { Correspondent, Document, Tag } from "../types/index.js";
import type {
  NotionPage,
  NotionProperties,
  NotionRichText,
} from "../types/notion.js";

// ============================================================================
// Constants
// ============================================================================

/** Number property holding the Paperless id; the join key for every lookup */
export const SOURCE_ID_PROPERTY = "paperless_id";

export const NAME_PROPERTY = "Name";
export const COLOR_PROPERTY = "Color";

export const DOCUMENT_PROPERTY = {
  title: "Title",
  created: "Created Date",
  added: "Added Date",
  correspondent: "Correspondent",
  tags: "Tags",
  file: "File",
} as const;

/** Notion rejects file names longer than this */
export const NOTION_FILE_NAME_LIMIT = 100;

/** Maximum length of a single rich text content string */
export const NOTION_TEXT_LIMIT = 2000;

const ELLIPSIS = "...";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// ============================================================================
// Value helpers
// ============================================================================

/**
 * Shorten a file name to the limit, keeping its extension and marking the
 * cut with an ellipsis
 *
 * @example truncateFileName("a".repeat(126) + ".pdf") // 93 × "a" + "....pdf"
 */
export function truncateFileName(
  name: string,
  limit = NOTION_FILE_NAME_LIMIT
): string {
  if (name.length <= limit) {
    return name;
  }

  const extension = extname(name);
  const keep = limit - ELLIPSIS.length - extension.length;

  if (extension === "" || keep < 1) {
    return name.slice(0, limit - ELLIPSIS.length) + ELLIPSIS;
  }

  return name.slice(0, keep) + ELLIPSIS + extension;
}

/**
 * Normalize a Paperless date for a Notion date property.
 *
 * Returns null for missing or unparsable values so the property is left out.
 * Date-only values stay date-only; everything else becomes an ISO timestamp.
 */
export function toNotionDate(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === "") {
    return null;
  }

  const time = Date.parse(trimmed);
  if (Number.isNaN(time)) {
    return null;
  }

  const iso = new Date(time).toISOString();
  if (!DATE_ONLY.test(trimmed)) {
    return iso;
  }

  // Date.parse rolls impossible days such as 2023-02-29 over instead of failing
  return iso.slice(0, 10) === trimmed ? trimmed : null;
}

function richText(content: string): NotionRichText[] {
  if (content === "") {
    return [];
  }
  return [
    { type: "text", text: { content: content.slice(0, NOTION_TEXT_LIMIT) } },
  ];
}

/**
 * Read the mirrored Paperless id back from a Notion page
 */
export function readSourceId(page: NotionPage): number | null {
  const value = page.properties[SOURCE_ID_PROPERTY];
  if (!Value.Check(NotionNumberValueSchema, value)) {
    return null;
  }
  return value.number;
}

// ============================================================================
// Property builders
// ============================================================================

export function buildCorrespondentProperties(
  correspondent: Correspondent
): NotionProperties {
  return {
    [NAME_PROPERTY]: { title: richText(correspondent.name) },
    [SOURCE_ID_PROPERTY]: { number: correspondent.id },
  };
}

export function buildTagProperties(tag: Tag): NotionProperties {
  return {
    [NAME_PROPERTY]: { title: richText(tag.name) },
    [SOURCE_ID_PROPERTY]: { number: tag.id },
    [COLOR_PROPERTY]: { rich_text: richText(tag.color ?? "") },
  };
}

export interface DocumentReferences {
  correspondentPageId: string | null;
  tagPageIds: string[];
}

export interface FileReference {
  name: string;
  url: string;
}

/**
 * Build document properties. Relations are always written, empty when the
 * document has no correspondent or tags, so updates clear removed links.
 */
export function buildDocumentProperties(
  document: Document,
  references: DocumentReferences,
  file?: FileReference
): NotionProperties {
  const properties: NotionProperties = {
    [DOCUMENT_PROPERTY.title]: { title: richText(document.title) },
    [SOURCE_ID_PROPERTY]: { number: document.id },
    [DOCUMENT_PROPERTY.correspondent]: {
      relation:
        references.correspondentPageId !== null
          ? [{ id: references.correspondentPageId }]
          : [],
    },
    [DOCUMENT_PROPERTY.tags]: {
      relation: references.tagPageIds.map((id) => ({ id })),
    },
  };

  const created = toNotionDate(document.created);
  if (created !== null) {
    properties[DOCUMENT_PROPERTY.created] = { date: { start: created } };
  }

  const added = toNotionDate(document.added);
  if (added !== null) {
    properties[DOCUMENT_PROPERTY.added] = { date: { start: added } };
  }

  if (file !== undefined) {
    properties[DOCUMENT_PROPERTY.file] = {
      files: [
        {
          name: truncateFileName(file.name),
          type: "external",
          external: { url: file.url },
        },
      ],
    };
  }

  return properties;
}
