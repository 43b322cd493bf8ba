import { Value } from "@sinclair/typebox/value";

import {
  ReferenceNotFoundError,
  TransportError,
  ValidationError,
} from "../errors.js";
import { notionLogger } from "../logger.js";
import {
  NotionErrorSchema,
  NotionListSchema,
  NotionPageSchema,
  type NotionList,
  type NotionPage,
  type NotionProperties,
  type NotionQueryBody,
} from "../types/notion.js";
import {
  readErrorBody,
  sendRequest,
  sleep,
  type FetchFn,
  type SleepFn,
} from "../utils/http.js";
import { forEachPage, RepeatedCursorError } from "../utils/pagination.js";
import {
  buildCorrespondentProperties,
  buildDocumentProperties,
  buildTagProperties,
  readSourceId,
  SOURCE_ID_PROPERTY,
  type DocumentReferences,
} from "./properties.js";

import type {
  Collection,
  Document,
  DocumentFile,
  ReferenceLookup,
  SinkRecord,
  SinkWriter,
  SourceEntity,
  UpsertResult,
} from "../types/index.js";
import type { Logger } from "pino";

const NOTION_API_URL = "https://api.notion.com/v1";
export const NOTION_VERSION = "2022-06-28";

// Notion allows an average of three requests per second per integration
const DEFAULT_REQUEST_INTERVAL_MS = 350;
const MAX_RATE_LIMIT_RETRIES = 3;
const QUERY_PAGE_SIZE = 100;

export interface NotionClientOptions {
  token: string;
  databases: Record<Collection, string>;
  baseUrl?: string;
  fetch?: FetchFn;
  requestIntervalMs?: number;
  sleep?: SleepFn;
  logger?: Logger;
}

type HttpMethod = "GET" | "POST" | "PATCH";

/**
 * Writes Paperless entities into three Notion databases, keyed by the numeric
 * `paperless_id` property.
 *
 * Upserts look up the page first and then update or create it. That is safe
 * only for a single sequential writer: two concurrent upserts of the same
 * entity can both miss the lookup and create duplicates.
 */
export class NotionClient implements SinkWriter {
  private readonly token: string;
  private readonly databases: Record<Collection, string>;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly requestIntervalMs: number;
  private readonly pause: SleepFn;
  private readonly log: Logger;
  private lastRequestTime = 0;

  constructor(options: NotionClientOptions) {
    this.token = options.token;
    this.databases = options.databases;
    this.baseUrl = (options.baseUrl ?? NOTION_API_URL).replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? fetch;
    this.requestIntervalMs =
      options.requestIntervalMs ?? DEFAULT_REQUEST_INTERVAL_MS;
    this.pause = options.sleep ?? sleep;
    this.log = options.logger ?? notionLogger;
  }

  /**
   * Create or update the page mirroring a source entity.
   *
   * Documents need their correspondent and tags synced first; a missing
   * reference fails with ReferenceNotFoundError.
   */
  async upsert(
    entity: SourceEntity,
    file?: DocumentFile
  ): Promise<UpsertResult> {
    if (!Number.isInteger(entity.id) || entity.id < 1) {
      throw new ValidationError(`Invalid Paperless id for ${entity.kind}`, {
        id: entity.id,
      });
    }

    switch (entity.kind) {
      case "correspondent":
        return this.upsertRecord(
          "correspondents",
          entity.id,
          buildCorrespondentProperties(entity)
        );
      case "tag":
        return this.upsertRecord("tags", entity.id, buildTagProperties(entity));
      case "document": {
        const references = await this.resolveReferences(entity);
        const properties = buildDocumentProperties(
          entity,
          references,
          file !== undefined ? { name: file.filename, url: file.url } : undefined
        );
        return this.upsertRecord("documents", entity.id, properties);
      }
    }
  }

  /**
   * Find the live page mirroring a Paperless id
   */
  async findRecord(
    collection: Collection,
    sourceId: number
  ): Promise<SinkRecord | null> {
    const list = await this.queryDatabase(collection, {
      filter: { property: SOURCE_ID_PROPERTY, number: { equals: sourceId } },
      page_size: 2,
    });

    const [first, ...rest] = list.results;
    if (first === undefined) {
      return null;
    }

    if (rest.length > 0) {
      this.log.warn(
        { collection, sourceId },
        "Multiple Notion pages share a Paperless id; using the first"
      );
    }

    return toSinkRecord(parsePage(first), collection, sourceId);
  }

  /**
   * Resolve a tag or correspondent to its page id
   */
  async lookupReference(
    collection: Collection,
    sourceId: number
  ): Promise<ReferenceLookup> {
    const record = await this.findRecord(collection, sourceId);
    return record !== null
      ? { status: "found", pageId: record.id }
      : { status: "missing" };
  }

  /**
   * Map every live document page's Paperless id to its page id
   */
  async listAllDocumentIds(): Promise<Map<number, string>> {
    const ids = new Map<number, string>();

    try {
      await forEachPage(
        async (cursor) => {
          const body: NotionQueryBody = { page_size: QUERY_PAGE_SIZE };
          if (cursor !== null) {
            body.start_cursor = cursor;
          }
          const list = await this.queryDatabase("documents", body);
          return {
            items: list.results,
            next: list.has_more ? list.next_cursor : null,
          };
        },
        (items) => {
          for (const item of items) {
            const page = parsePage(item);
            const sourceId = readSourceId(page);
            if (sourceId === null) {
              this.log.debug(
                { pageId: page.id },
                "Skipping document page without a Paperless id"
              );
              continue;
            }

            const existing = ids.get(sourceId);
            if (existing !== undefined) {
              this.log.warn(
                { sourceId, kept: existing, duplicate: page.id },
                "Duplicate document page for Paperless id"
              );
              continue;
            }
            ids.set(sourceId, page.id);
          }
        }
      );
    } catch (error) {
      if (error instanceof RepeatedCursorError) {
        throw new TransportError(
          "Notion returned a repeated cursor while scanning documents",
          "notion",
          undefined,
          { cause: error }
        );
      }
      throw error;
    }

    this.log.debug({ count: ids.size }, "Scanned Notion document pages");
    return ids;
  }

  /**
   * Mark a document page archived. Pages are never deleted.
   */
  async archiveDocument(sinkRecordId: string): Promise<void> {
    await this.request("PATCH", `/pages/${sinkRecordId}`, { archived: true });
    this.log.debug({ pageId: sinkRecordId }, "Archived document page");
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async upsertRecord(
    collection: Collection,
    sourceId: number,
    properties: NotionProperties
  ): Promise<UpsertResult> {
    const existing = await this.findRecord(collection, sourceId);

    if (existing !== null) {
      const page = parsePage(
        await this.request("PATCH", `/pages/${existing.id}`, { properties })
      );
      this.log.debug(
        { collection, sourceId, pageId: page.id },
        "Updated Notion page"
      );
      return {
        record: toSinkRecord(page, collection, sourceId),
        inserted: false,
        updated: true,
      };
    }

    const page = parsePage(
      await this.request("POST", "/pages", {
        parent: { database_id: this.databases[collection] },
        properties,
      })
    );
    this.log.debug(
      { collection, sourceId, pageId: page.id },
      "Created Notion page"
    );
    return {
      record: toSinkRecord(page, collection, sourceId),
      inserted: true,
      updated: false,
    };
  }

  private async resolveReferences(
    document: Document
  ): Promise<DocumentReferences> {
    let correspondentPageId: string | null = null;
    if (document.correspondentId !== null) {
      const lookup = await this.lookupReference(
        "correspondents",
        document.correspondentId
      );
      if (lookup.status === "missing") {
        throw new ReferenceNotFoundError(
          "correspondents",
          document.correspondentId
        );
      }
      correspondentPageId = lookup.pageId;
    }

    const tagPageIds: string[] = [];
    for (const tagId of document.tagIds) {
      const lookup = await this.lookupReference("tags", tagId);
      if (lookup.status === "missing") {
        throw new ReferenceNotFoundError("tags", tagId);
      }
      tagPageIds.push(lookup.pageId);
    }

    return { correspondentPageId, tagPageIds };
  }

  private async queryDatabase(
    collection: Collection,
    body: NotionQueryBody
  ): Promise<NotionList> {
    const data = await this.request(
      "POST",
      `/databases/${this.databases[collection]}/query`,
      body
    );
    if (!Value.Check(NotionListSchema, data)) {
      throw new ValidationError(
        `Unexpected query response for ${collection} database`
      );
    }
    return data;
  }

  private async request(
    method: HttpMethod,
    path: string,
    body?: object
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;

    for (let attempt = 0; ; attempt++) {
      await this.throttle();

      const response = await sendRequest(
        this.fetchFn,
        url,
        {
          method,
          headers: {
            Authorization: `Bearer ${this.token}`,
            "Notion-Version": NOTION_VERSION,
            "Content-Type": "application/json",
          },
          body: body !== undefined ? JSON.stringify(body) : undefined,
        },
        { service: "notion", logger: this.log }
      );

      if (response.status === 429 && attempt < MAX_RATE_LIMIT_RETRIES) {
        const waitMs = retryAfterMs(response.headers.get("retry-after"));
        this.log.warn(
          { method, path, waitMs, attempt: attempt + 1 },
          "Rate limited by Notion, retrying"
        );
        await this.pause(waitMs);
        continue;
      }

      if (!response.ok) {
        const detail = describeNotionError(await readErrorBody(response));
        this.log.error(
          { method, path, status: response.status, detail },
          "Notion request failed"
        );
        throw new TransportError(
          `Notion ${method} ${path} failed: ${String(response.status)} ${detail}`,
          "notion",
          response.status
        );
      }

      try {
        const data: unknown = await response.json();
        return data;
      } catch (error) {
        throw new TransportError(
          `Notion returned invalid JSON for ${method} ${path}`,
          "notion",
          response.status,
          { cause: error }
        );
      }
    }
  }

  /**
   * Space requests at least `requestIntervalMs` apart
   */
  private async throttle(): Promise<void> {
    if (this.requestIntervalMs > 0) {
      const elapsed = Date.now() - this.lastRequestTime;
      if (elapsed < this.requestIntervalMs) {
        await this.pause(this.requestIntervalMs - elapsed);
      }
    }
    this.lastRequestTime = Date.now();
  }
}

// ============================================================================
// Pure helpers
// ============================================================================

function parsePage(data: unknown): NotionPage {
  if (!Value.Check(NotionPageSchema, data)) {
    throw new ValidationError("Unexpected Notion page payload");
  }
  return data;
}

function toSinkRecord(
  page: NotionPage,
  collection: Collection,
  sourceId: number
): SinkRecord {
  return {
    id: page.id,
    collection,
    sourceId: readSourceId(page) ?? sourceId,
    archived: page.archived ?? false,
  };
}

/**
 * Convert a Retry-After header (seconds) to milliseconds, at least one second
 */
export function retryAfterMs(header: string | null): number {
  const seconds = header !== null ? Number.parseFloat(header) : Number.NaN;
  if (Number.isNaN(seconds)) {
    return 1000;
  }
  return Math.max(1, seconds) * 1000;
}

function describeNotionError(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  return Value.Check(NotionErrorSchema, parsed)
    ? `${parsed.code}: ${parsed.message}`
    : body;
}
