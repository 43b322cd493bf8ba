import { describeError, NotFoundError } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type {
  Correspondent,
  Document,
  SinkWriter,
  SourceReader,
  Tag,
  UpsertResult,
} from "../../types/index.js";
import type { Logger } from "pino";

// ============================================================================
// Types
// ============================================================================

export type SyncPhase = "correspondents" | "tags" | "archive" | "documents";

export interface SyncProgress {
  phase: SyncPhase;
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

export interface CategoryResult {
  inserted: number;
  updated: number;
  archived: number;
  /** Entities that vanished from Paperless while the cycle was running */
  skipped: number;
  failed: number;
  errors: string[];
}

export interface CycleResult {
  /** Becomes the next cycle's modified-since marker */
  startedAt: Date;
  finishedAt: Date;
  duration: number;
  correspondents: CategoryResult;
  tags: CategoryResult;
  archive: CategoryResult;
  documents: CategoryResult;
}

/**
 * Both sides' full document id scans, taken once per cycle
 */
export interface DocumentIdScan {
  sourceIds: Set<number>;
  sinkIds: Map<number, string>;
}

export interface ReconcilerOptions {
  logger?: Logger;
  clock?: () => Date;
}

function emptyResult(): CategoryResult {
  return {
    inserted: 0,
    updated: 0,
    archived: 0,
    skipped: 0,
    failed: 0,
    errors: [],
  };
}

function countUpsert(result: CategoryResult, upsert: UpsertResult): void {
  if (upsert.inserted) {
    result.inserted++;
  } else {
    result.updated++;
  }
}

// ============================================================================
// Reconciler
// ============================================================================

/**
 * Mirrors Paperless into Notion in dependency order: correspondents and tags
 * first, since documents link to them, then deletions, then documents.
 *
 * A single entity's failure is logged and counted without stopping the batch.
 * A failed listing call aborts the cycle.
 */
export class Reconciler {
  private onProgress?: ProgressCallback;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(
    private source: SourceReader,
    private sink: SinkWriter,
    options: ReconcilerOptions = {}
  ) {
    this.log = options.logger ?? syncLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run one full cycle.
   *
   * @param lastSync - start time of the last completed cycle, or null to sync
   *   every document
   */
  async runCycle(lastSync: Date | null): Promise<CycleResult> {
    const startedAt = this.clock();
    this.log.info(
      { lastSync: lastSync?.toISOString() ?? null },
      "Starting sync cycle"
    );

    const correspondents = await this.syncCorrespondents();
    const tags = await this.syncTags();

    // Archive before upserting so only ids absent from the current full scan
    // are ever archived
    const scan = await this.scanDocumentIds();
    const archive = await this.archiveDeletedDocuments(scan);

    const documents = await this.syncDocuments(lastSync, scan);

    const finishedAt = this.clock();
    const duration = finishedAt.getTime() - startedAt.getTime();

    this.log.info(
      {
        duration,
        correspondents: summarize(correspondents),
        tags: summarize(tags),
        archived: archive.archived,
        documents: summarize(documents),
      },
      "Sync cycle completed"
    );

    return {
      startedAt,
      finishedAt,
      duration,
      correspondents,
      tags,
      archive,
      documents,
    };
  }

  /**
   * Upsert every correspondent (always a full read)
   */
  async syncCorrespondents(): Promise<CategoryResult> {
    this.log.info("Syncing correspondents...");
    const correspondents = await this.source.listCorrespondents();
    return this.upsertAll("correspondents", correspondents);
  }

  /**
   * Upsert every tag (always a full read)
   */
  async syncTags(): Promise<CategoryResult> {
    this.log.info("Syncing tags...");
    const tags = await this.source.listTags();
    return this.upsertAll("tags", tags);
  }

  async scanDocumentIds(): Promise<DocumentIdScan> {
    const sourceIds = await this.source.listAllDocumentIds();
    const sinkIds = await this.sink.listAllDocumentIds();

    this.log.debug(
      { paperless: sourceIds.size, notion: sinkIds.size },
      "Scanned document ids"
    );

    return { sourceIds, sinkIds };
  }

  /**
   * Archive every Notion document whose Paperless id is absent from the scan
   */
  async archiveDeletedDocuments(scan: DocumentIdScan): Promise<CategoryResult> {
    const result = emptyResult();
    const deleted = [...scan.sinkIds].filter(
      ([sourceId]) => !scan.sourceIds.has(sourceId)
    );

    if (deleted.length > 0) {
      this.log.info({ count: deleted.length }, "Archiving deleted documents");
    }

    for (const [index, [sourceId, pageId]] of deleted.entries()) {
      this.onProgress?.({
        phase: "archive",
        current: index + 1,
        total: deleted.length,
        currentItem: String(sourceId),
      });

      try {
        await this.sink.archiveDocument(pageId);
        result.archived++;
        this.log.info(
          { documentId: sourceId, pageId },
          "Archived document in Notion"
        );
      } catch (error) {
        const message = describeError(error);
        result.failed++;
        result.errors.push(`Document ${String(sourceId)}: ${message}`);
        this.log.error(
          { documentId: sourceId, pageId, error: message },
          "Error archiving document"
        );
      }
    }

    return result;
  }

  /**
   * Upsert documents modified since `modifiedAfter` (all when null).
   *
   * With a scan, documents Paperless has but Notion lacks are fetched by id
   * and synced too, so a document whose earlier upsert failed is not left
   * behind until its next modification.
   */
  async syncDocuments(
    modifiedAfter: Date | null,
    scan?: DocumentIdScan
  ): Promise<CategoryResult> {
    this.log.info("Syncing documents...");
    const result = emptyResult();

    const documents = await this.source.listDocuments(modifiedAfter);
    const queued = new Set(documents.map((document) => document.id));

    const missing =
      scan !== undefined
        ? [...scan.sourceIds].filter(
            (id) => !scan.sinkIds.has(id) && !queued.has(id)
          )
        : [];

    if (missing.length > 0) {
      this.log.info(
        { count: missing.length },
        "Backfilling documents missing from Notion"
      );
    }

    const total = documents.length + missing.length;
    let current = 0;

    for (const document of documents) {
      current++;
      this.onProgress?.({
        phase: "documents",
        current,
        total,
        currentItem: document.title,
      });
      await this.syncDocument(document.id, result, () =>
        Promise.resolve(document)
      );
    }

    for (const id of missing) {
      current++;
      this.onProgress?.({
        phase: "documents",
        current,
        total,
        currentItem: String(id),
      });
      await this.syncDocument(id, result, () => this.source.getDocument(id));
    }

    return result;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async upsertAll(
    phase: "correspondents" | "tags",
    entities: (Correspondent | Tag)[]
  ): Promise<CategoryResult> {
    const result = emptyResult();

    for (const [index, entity] of entities.entries()) {
      this.onProgress?.({
        phase,
        current: index + 1,
        total: entities.length,
        currentItem: entity.name,
      });

      try {
        countUpsert(result, await this.sink.upsert(entity));
        this.log.debug(
          { kind: entity.kind, id: entity.id, name: entity.name },
          `Synced ${entity.kind}`
        );
      } catch (error) {
        const message = describeError(error);
        result.failed++;
        result.errors.push(`${entity.kind} ${entity.name}: ${message}`);
        this.log.error(
          { kind: entity.kind, id: entity.id, name: entity.name, error: message },
          `Error syncing ${entity.kind}`
        );
      }
    }

    return result;
  }

  private async syncDocument(
    id: number,
    result: CategoryResult,
    load: () => Promise<Document>
  ): Promise<void> {
    try {
      const document = await load();
      const file = await this.source.getDocumentFile(document.id);
      countUpsert(result, await this.sink.upsert(document, file));
      this.log.debug(
        { documentId: document.id, title: document.title },
        "Synced document"
      );
    } catch (error) {
      if (error instanceof NotFoundError) {
        result.skipped++;
        this.log.warn(
          { documentId: id },
          "Document disappeared from Paperless during sync"
        );
        return;
      }

      const message = describeError(error);
      result.failed++;
      result.errors.push(`Document ${String(id)}: ${message}`);
      this.log.error(
        { documentId: id, error: message },
        "Error syncing document"
      );
    }
  }
}

function summarize(result: CategoryResult): Record<string, number> {
  return {
    inserted: result.inserted,
    updated: result.updated,
    skipped: result.skipped,
    failed: result.failed,
  };
}
