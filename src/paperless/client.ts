import { Value } from "@sinclair/typebox/value";

import {
  NotFoundError,
  TransportError,
  ValidationError,
} from "../errors.js";
import { paperlessLogger } from "../logger.js";
import {
  PaperlessCorrespondentSchema,
  PaperlessDocumentSchema,
  PaperlessIdSchema,
  PaperlessPageSchema,
  PaperlessTagSchema,
  type PaperlessDocument,
  type PaperlessPage,
} from "../types/paperless.js";
import { readErrorBody, sendRequest, type FetchFn } from "../utils/http.js";
import { collectPages, RepeatedCursorError } from "../utils/pagination.js";

import type {
  Correspondent,
  Document,
  DocumentFile,
  SourceReader,
  Tag,
} from "../types/index.js";
import type { Static, TSchema } from "@sinclair/typebox";
import type { Logger } from "pino";

const DEFAULT_PAGE_SIZE = 100;

export interface PaperlessClientOptions {
  baseUrl: string;
  token: string;
  pageSize?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Read-only access to the Paperless-ngx REST API
 */
export class PaperlessClient implements SourceReader {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly pageSize: number;
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;

  constructor(options: PaperlessClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.fetchFn = options.fetch ?? fetch;
    this.log = options.logger ?? paperlessLogger;
  }

  /**
   * Fetch documents, optionally only those modified at or after a point in time
   */
  async listDocuments(modifiedAfter?: Date | null): Promise<Document[]> {
    const params: Record<string, string> = { ordering: "id" };
    if (modifiedAfter !== undefined && modifiedAfter !== null) {
      params.modified__gte = modifiedAfter.toISOString();
    }

    this.log.info(
      { modifiedAfter: params.modified__gte ?? null },
      "Fetching documents"
    );

    const items = await this.listAll("documents", params);
    const documents = this.parseItems(
      items,
      PaperlessDocumentSchema,
      "document"
    ).map(toDocument);

    this.log.debug({ count: documents.length }, "Fetched documents");
    return documents;
  }

  /**
   * Full identifier scan, independent of any modification filter
   */
  async listAllDocumentIds(): Promise<Set<number>> {
    const items = await this.listAll("documents", {
      fields: "id",
      ordering: "id",
    });

    const ids = new Set<number>();
    for (const item of items) {
      // An unreadable id must abort the scan: skipping it would archive the
      // matching Notion page
      if (!Value.Check(PaperlessIdSchema, item)) {
        throw new ValidationError(
          "Document id scan returned an item without a valid id",
          { item }
        );
      }
      ids.add(item.id);
    }

    this.log.debug({ count: ids.size }, "Fetched all document ids");
    return ids;
  }

  async listTags(): Promise<Tag[]> {
    this.log.info("Fetching tags");
    const items = await this.listAll("tags", { ordering: "id" });
    return this.parseItems(items, PaperlessTagSchema, "tag").map(
      (raw): Tag => ({
        kind: "tag",
        id: raw.id,
        name: raw.name,
        color: raw.color ?? null,
      })
    );
  }

  async listCorrespondents(): Promise<Correspondent[]> {
    this.log.info("Fetching correspondents");
    const items = await this.listAll("correspondents", { ordering: "id" });
    return this.parseItems(
      items,
      PaperlessCorrespondentSchema,
      "correspondent"
    ).map(
      (raw): Correspondent => ({
        kind: "correspondent",
        id: raw.id,
        name: raw.name,
      })
    );
  }

  /**
   * Fetch a single document by id
   */
  async getDocument(id: number): Promise<Document> {
    const data = await this.getJson(
      `${this.baseUrl}/api/documents/${String(id)}/`,
      { resource: "document", id }
    );

    if (!Value.Check(PaperlessDocumentSchema, data)) {
      throw new ValidationError(
        `Document ${String(id)} has an unexpected shape`,
        { errors: firstErrors(PaperlessDocumentSchema, data) }
      );
    }

    return toDocument(data);
  }

  /**
   * Download the document file. The filename comes from Content-Disposition
   * when present.
   */
  async getDocumentFile(id: number): Promise<DocumentFile> {
    const url = this.downloadUrl(id);
    const response = await this.fetchBinary(url, id);

    const content = new Uint8Array(await response.arrayBuffer());
    const filename =
      parseContentDisposition(response.headers.get("content-disposition")) ??
      `document-${String(id)}.pdf`;

    this.log.debug(
      { documentId: id, filename, bytes: content.byteLength },
      "Downloaded document file"
    );

    return { content, filename, url };
  }

  /**
   * Fetch the rendered preview of a document
   */
  async getDocumentPreview(id: number): Promise<Uint8Array> {
    const response = await this.fetchBinary(
      `${this.baseUrl}/api/documents/${String(id)}/preview/`,
      id
    );
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Stable download link for a document
   */
  downloadUrl(id: number): string {
    return `${this.baseUrl}/api/documents/${String(id)}/download/`;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get headers(): Record<string, string> {
    return {
      Authorization: `Token ${this.token}`,
      Accept: "application/json",
    };
  }

  private async listAll(
    resource: string,
    params: Record<string, string>
  ): Promise<unknown[]> {
    const query = new URLSearchParams({
      page_size: String(this.pageSize),
      ...params,
    });
    const firstUrl = `${this.baseUrl}/api/${resource}/?${query.toString()}`;

    try {
      return await collectPages(async (cursor) => {
        const page = await this.getPage(cursor ?? firstUrl);
        return {
          items: page.results,
          next: page.next !== null ? this.rebase(page.next) : null,
        };
      });
    } catch (error) {
      if (error instanceof RepeatedCursorError) {
        throw new TransportError(
          `Paperless returned a repeated page link while listing ${resource}`,
          "paperless",
          undefined,
          { cause: error }
        );
      }
      throw error;
    }
  }

  private async getPage(url: string): Promise<PaperlessPage> {
    const data = await this.getJson(url);
    if (!Value.Check(PaperlessPageSchema, data)) {
      throw new ValidationError(`Unexpected list response from ${url}`, {
        errors: firstErrors(PaperlessPageSchema, data),
      });
    }
    return data;
  }

  private async getJson(
    url: string,
    notFound?: { resource: string; id: number }
  ): Promise<unknown> {
    const response = await sendRequest(
      this.fetchFn,
      url,
      { headers: this.headers },
      { service: "paperless", logger: this.log }
    );

    if (response.status === 404 && notFound !== undefined) {
      throw new NotFoundError(notFound.resource, notFound.id);
    }

    if (!response.ok) {
      const body = await readErrorBody(response);
      this.log.error(
        { url, status: response.status, statusText: response.statusText, body },
        "Paperless request failed"
      );
      throw new TransportError(
        `Paperless request to ${url} failed: ${String(response.status)} ${response.statusText}`,
        "paperless",
        response.status
      );
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throw new TransportError(
        `Paperless returned invalid JSON from ${url}`,
        "paperless",
        response.status,
        { cause: error }
      );
    }
  }

  private async fetchBinary(url: string, id: number): Promise<Response> {
    const response = await sendRequest(
      this.fetchFn,
      url,
      { headers: { Authorization: `Token ${this.token}` } },
      { service: "paperless", logger: this.log }
    );

    if (response.status === 404) {
      throw new NotFoundError("document", id);
    }

    if (!response.ok) {
      throw new TransportError(
        `Paperless request to ${url} failed: ${String(response.status)} ${response.statusText}`,
        "paperless",
        response.status
      );
    }

    return response;
  }

  /**
   * Point a `next` link at the configured origin. Paperless behind a reverse
   * proxy often reports its internal scheme or host, and the token must not
   * leave the configured server.
   */
  private rebase(next: string): string {
    const base = new URL(this.baseUrl);
    const url = new URL(next, `${this.baseUrl}/`);
    url.protocol = base.protocol;
    url.hostname = base.hostname;
    url.port = base.port;
    return url.toString();
  }

  private parseItems<T extends TSchema>(
    items: unknown[],
    schema: T,
    resource: string
  ): Static<T>[] {
    const valid: Static<T>[] = [];
    for (const item of items) {
      if (Value.Check(schema, item)) {
        valid.push(item);
      } else {
        this.log.warn(
          { resource, errors: firstErrors(schema, item) },
          "Skipping malformed item"
        );
      }
    }
    return valid;
  }
}

// ============================================================================
// Pure helpers
// ============================================================================

function toDocument(raw: PaperlessDocument): Document {
  return {
    kind: "document",
    id: raw.id,
    title: raw.title,
    created: raw.created ?? null,
    added: raw.added ?? null,
    modified: raw.modified ?? null,
    correspondentId: raw.correspondent ?? null,
    tagIds: [...new Set(raw.tags ?? [])],
    originalFileName: raw.original_file_name ?? null,
  };
}

function firstErrors(schema: TSchema, value: unknown, limit = 3): string[] {
  const messages: string[] = [];
  for (const error of Value.Errors(schema, value)) {
    messages.push(`${error.path || "/"}: ${error.message}`);
    if (messages.length >= limit) {
      break;
    }
  }
  return messages;
}

/**
 * Extract the filename from a Content-Disposition header.
 *
 * Prefers the RFC 5987 `filename*` parameter over the plain `filename`.
 */
export function parseContentDisposition(header: string | null): string | null {
  if (header === null || header.trim() === "") {
    return null;
  }

  const extended = /filename\*\s*=\s*([^']*)'[^']*'([^;]+)/i.exec(header);
  if (extended?.[2] !== undefined) {
    const decoded = decodePercentEncoded(extended[2].trim());
    if (decoded !== null && decoded !== "") {
      return decoded;
    }
  }

  const quoted = /filename\s*=\s*"((?:[^"\\]|\\.)*)"/i.exec(header);
  if (quoted?.[1] !== undefined && quoted[1] !== "") {
    return quoted[1].replace(/\\(.)/g, "$1");
  }

  const bare = /filename\s*=\s*([^;\s"]+)/i.exec(header);
  if (bare?.[1] !== undefined) {
    return bare[1];
  }

  return null;
}

function decodePercentEncoded(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escape sequence; the plain filename parameter is tried next
    return null;
  }
}
