/**
 * In-process Notion API
 *
 * Keeps pages per database in memory and answers database queries (number
 * equality filter, cursor pagination), page creation and page updates.
 * Canned failures can be queued ahead of the real handling.
 */

import type { FetchFn } from "../../src/utils/http.js";

export interface FakePage {
  id: string;
  databaseId: string;
  archived: boolean;
  properties: Record<string, unknown>;
}

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
}

interface QueuedFailure {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

const DEFAULT_PAGE_SIZE = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function notionError(status: number, code: string, message: string): Response {
  return json({ object: "error", status, code, message }, status);
}

/**
 * Read the number out of a `{ number: n }` property value
 */
export function numberProperty(value: unknown): number | null {
  if (isRecord(value) && typeof value.number === "number") {
    return value.number;
  }
  return null;
}

export class FakeNotionApi {
  readonly token: string;
  readonly pages: FakePage[] = [];
  readonly requests: RecordedRequest[] = [];
  private readonly failures: QueuedFailure[] = [];
  private nextId = 1;

  constructor(options: { token?: string } = {}) {
    this.token = options.token ?? "test-token";
  }

  readonly fetch: FetchFn = (url, init) => {
    const method = init?.method ?? "GET";
    const path = new URL(url).pathname.replace(/^\/v1/, "");
    const body: unknown =
      typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    this.requests.push({ method, path, body });

    const failure = this.failures.shift();
    if (failure !== undefined) {
      return Promise.resolve(json(failure.body, failure.status, failure.headers));
    }

    return Promise.resolve(this.handle(method, path, body, init));
  };

  /**
   * Serve the given response for the next request, before any routing
   */
  failNext(status: number, options: { code?: string; headers?: Record<string, string> } = {}): void {
    this.failures.push({
      status,
      body: {
        object: "error",
        status,
        code: options.code ?? "internal_server_error",
        message: `Simulated ${String(status)}`,
      },
      headers: options.headers,
    });
  }

  /**
   * Insert a page directly, bypassing the API
   */
  seed(databaseId: string, properties: Record<string, unknown>, archived = false): FakePage {
    const page: FakePage = {
      id: `page-${String(this.nextId++)}`,
      databaseId,
      archived,
      properties,
    };
    this.pages.push(page);
    return page;
  }

  livePages(databaseId: string): FakePage[] {
    return this.pages.filter(
      (page) => page.databaseId === databaseId && !page.archived
    );
  }

  count(method: string, pathPrefix: string): number {
    return this.requests.filter(
      (request) => request.method === method && request.path.startsWith(pathPrefix)
    ).length;
  }

  // ==========================================================================
  // Routing
  // ==========================================================================

  private handle(method: string, path: string, body: unknown, init?: RequestInit): Response {
    const headers = new Headers(init?.headers);
    if (headers.get("authorization") !== `Bearer ${this.token}`) {
      return notionError(401, "unauthorized", "API token is invalid.");
    }
    if (headers.get("notion-version") === null) {
      return notionError(400, "missing_version", "Notion-Version header is missing.");
    }

    const query = /^\/databases\/([^/]+)\/query$/.exec(path);
    if (method === "POST" && query?.[1] !== undefined) {
      return this.query(query[1], body);
    }

    if (method === "POST" && path === "/pages") {
      return this.create(body);
    }

    const update = /^\/pages\/([^/]+)$/.exec(path);
    if (method === "PATCH" && update?.[1] !== undefined) {
      return this.update(update[1], body);
    }

    return notionError(400, "invalid_request_url", `Invalid request URL: ${method} ${path}`);
  }

  private query(databaseId: string, body: unknown): Response {
    const request = isRecord(body) ? body : {};
    let pages = this.livePages(databaseId);

    const filter = request.filter;
    if (isRecord(filter) && typeof filter.property === "string" && isRecord(filter.number)) {
      const property = filter.property;
      const equals = filter.number.equals;
      pages = pages.filter(
        (page) => numberProperty(page.properties[property]) === equals
      );
    }

    const pageSize =
      typeof request.page_size === "number" ? request.page_size : DEFAULT_PAGE_SIZE;
    const start =
      typeof request.start_cursor === "string"
        ? Number(request.start_cursor.replace("cursor-", ""))
        : 0;
    const results = pages.slice(start, start + pageSize);
    const hasMore = start + pageSize < pages.length;

    return json({
      object: "list",
      results: results.map(toResponse),
      has_more: hasMore,
      next_cursor: hasMore ? `cursor-${String(start + pageSize)}` : null,
    });
  }

  private create(body: unknown): Response {
    if (!isRecord(body) || !isRecord(body.parent) || !isRecord(body.properties)) {
      return notionError(400, "validation_error", "body failed validation");
    }
    const databaseId = body.parent.database_id;
    if (typeof databaseId !== "string") {
      return notionError(400, "validation_error", "parent.database_id is required");
    }
    return json(toResponse(this.seed(databaseId, { ...body.properties })));
  }

  private update(pageId: string, body: unknown): Response {
    const page = this.pages.find((candidate) => candidate.id === pageId);
    if (page === undefined) {
      return notionError(404, "object_not_found", `Could not find page with ID: ${pageId}.`);
    }
    if (isRecord(body)) {
      if (isRecord(body.properties)) {
        page.properties = { ...page.properties, ...body.properties };
      }
      if (typeof body.archived === "boolean") {
        page.archived = body.archived;
      }
    }
    return json(toResponse(page));
  }
}

function toResponse(page: FakePage): Record<string, unknown> {
  return {
    object: "page",
    id: page.id,
    archived: page.archived,
    parent: { type: "database_id", database_id: page.databaseId },
    properties: page.properties,
  };
}
