/**
 * Error taxonomy shared by the Paperless reader, the Notion writer and the
 * sync services.
 */

import type { Collection } from "./types/index.js";

export type ExternalService = "paperless" | "notion";

// ============================================================================
// Custom Error Classes
// ============================================================================

/**
 * Network failure or non-success status from either external service
 */
export class TransportError extends Error {
  code = "TRANSPORT_ERROR" as const;
  service: ExternalService;
  status?: number;

  constructor(
    message: string,
    service: ExternalService,
    status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
    this.service = service;
    this.status = status;
  }
}

/**
 * The source reported a resource as missing (HTTP 404)
 */
export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  resource: string;
  id: number;

  constructor(resource: string, id: number) {
    super(`${resource} ${String(id)} not found in Paperless`);
    this.name = "NotFoundError";
    this.resource = resource;
    this.id = id;
  }
}

/**
 * A document references a tag or correspondent that has no Notion page yet
 */
export class ReferenceNotFoundError extends Error {
  code = "REFERENCE_NOT_FOUND" as const;
  collection: Collection;
  sourceId: number;

  constructor(collection: Collection, sourceId: number) {
    super(
      `No Notion page in ${collection} for Paperless ID ${String(sourceId)}`
    );
    this.name = "ReferenceNotFoundError";
    this.collection = collection;
    this.sourceId = sourceId;
  }
}

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
