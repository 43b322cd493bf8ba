/**
 * Unit tests for the sync reconciler
 */

import { describe, it, expect, vi } from "vitest";

import {
  NotFoundError,
  TransportError,
} from "../../../../src/errors.js";
import {
  Reconciler,
  type SyncPhase,
} from "../../../../src/services/sync/reconciler.js";
import {
  sampleCorrespondent,
  sampleDocument,
  sampleTag,
} from "../../../fixtures/entities.js";
import { InMemorySink, InMemorySource } from "../../../mocks/sync.js";

const MARKER = new Date("2024-04-01T00:00:00Z");

function sourceIds(sink: InMemorySink): number[] {
  return sink.live("documents").map((record) => record.sourceId);
}

describe("Reconciler", () => {
  describe("runCycle", () => {
    it("should archive deleted documents and create new ones", async () => {
      const source = new InMemorySource({
        documents: [
          sampleDocument({ id: 1 }),
          sampleDocument({ id: 2 }),
          sampleDocument({ id: 3, modified: "2024-04-10T08:00:00Z" }),
        ],
      });
      const sink = new InMemorySink();
      sink.seedDocument(1);
      sink.seedDocument(2);
      const stale = sink.seedDocument(4);

      const result = await new Reconciler(source, sink).runCycle(MARKER);

      expect(result.archive.archived).toBe(1);
      expect(result.documents).toEqual({
        inserted: 1,
        updated: 0,
        archived: 0,
        skipped: 0,
        failed: 0,
        errors: [],
      });
      expect(stale.archived).toBe(true);
      expect(sourceIds(sink)).toEqual([1, 2, 3]);
    });

    it("should update existing pages on a first cycle without a marker", async () => {
      const source = new InMemorySource({
        documents: [
          sampleDocument({ id: 1 }),
          sampleDocument({ id: 2 }),
          sampleDocument({ id: 3 }),
        ],
      });
      const sink = new InMemorySink();
      sink.seedDocument(1);
      sink.seedDocument(2);
      const stale = sink.seedDocument(4);

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(result.archive.archived).toBe(1);
      expect(result.documents).toEqual({
        inserted: 1,
        updated: 2,
        archived: 0,
        skipped: 0,
        failed: 0,
        errors: [],
      });
      expect(stale.archived).toBe(true);
      expect(sourceIds(sink)).toEqual([1, 2, 3]);
    });

    it("should sync correspondents and tags before documents", async () => {
      const source = new InMemorySource({
        correspondents: [sampleCorrespondent(1, "Utility Co")],
        tags: [sampleTag(2, "Tax")],
        documents: [sampleDocument({ id: 10, correspondentId: 1, tagIds: [2] })],
      });
      const sink = new InMemorySink();
      sink.seedDocument(99);

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(sink.calls).toEqual([
        "upsert:correspondent:1",
        "upsert:tag:2",
        "archive:page-1",
        "upsert:document:10",
      ]);
      expect(result.correspondents.inserted).toBe(1);
      expect(result.tags.inserted).toBe(1);
      expect(result.documents.inserted).toBe(1);
    });

    it("should only upsert documents modified since the marker", async () => {
      const source = new InMemorySource({
        documents: [
          sampleDocument({ id: 1 }),
          sampleDocument({ id: 2, modified: "2024-04-02T00:00:00Z" }),
        ],
      });
      const sink = new InMemorySink();
      sink.seedDocument(1);
      sink.seedDocument(2);

      const result = await new Reconciler(source, sink).runCycle(MARKER);

      expect(result.documents.updated).toBe(1);
      expect(sink.calls).toEqual(["upsert:document:2"]);
    });

    it("should sync every document with a null marker", async () => {
      const source = new InMemorySource({
        documents: [sampleDocument({ id: 1 }), sampleDocument({ id: 2 })],
      });
      const sink = new InMemorySink();
      sink.seedDocument(1);

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(result.documents.inserted).toBe(1);
      expect(result.documents.updated).toBe(1);
    });

    it("should abort when a listing call fails", async () => {
      const source = new InMemorySource({
        correspondents: [sampleCorrespondent(1, "Utility Co")],
        documents: [sampleDocument({ id: 1 })],
      });
      vi.spyOn(source, "listTags").mockRejectedValue(
        new TransportError("Paperless unavailable", "paperless", 503)
      );
      const sink = new InMemorySink();

      await expect(new Reconciler(source, sink).runCycle(null)).rejects.toThrow(
        "Paperless unavailable"
      );
      expect(sink.calls).toEqual(["upsert:correspondent:1"]);
    });

    it("should take start and finish times from the clock", async () => {
      const startedAt = new Date("2024-04-10T10:00:00.000Z");
      const finishedAt = new Date("2024-04-10T10:00:01.500Z");
      const clock = vi
        .fn<() => Date>()
        .mockReturnValueOnce(startedAt)
        .mockReturnValueOnce(finishedAt);

      const result = await new Reconciler(
        new InMemorySource(),
        new InMemorySink(),
        { clock }
      ).runCycle(null);

      expect(result.startedAt).toBe(startedAt);
      expect(result.finishedAt).toBe(finishedAt);
      expect(result.duration).toBe(1500);
    });

    it("should report progress for each phase", async () => {
      const source = new InMemorySource({
        correspondents: [sampleCorrespondent(1, "Utility Co")],
        tags: [sampleTag(2, "Tax")],
        documents: [sampleDocument({ id: 10 })],
      });
      const sink = new InMemorySink();
      sink.seedDocument(99);
      const reconciler = new Reconciler(source, sink);
      const phases: SyncPhase[] = [];
      reconciler.setProgressCallback((progress) => {
        phases.push(progress.phase);
      });

      await reconciler.runCycle(null);

      expect(phases).toEqual(["correspondents", "tags", "archive", "documents"]);
    });
  });

  describe("failure isolation", () => {
    it("should keep going after a document fails", async () => {
      const source = new InMemorySource({
        documents: [1, 2, 3].map((id) => sampleDocument({ id })),
      });
      const sink = new InMemorySink();
      sink.upsertErrors.set("document:2", new Error("Notion rejected the page"));

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(result.documents.inserted).toBe(2);
      expect(result.documents.failed).toBe(1);
      expect(result.documents.errors).toEqual([
        "Document 2: Notion rejected the page",
      ]);
      expect(sourceIds(sink)).toEqual([1, 3]);
    });

    it("should backfill a document that failed in an earlier cycle", async () => {
      const source = new InMemorySource({
        documents: [1, 2, 3].map((id) => sampleDocument({ id })),
      });
      const sink = new InMemorySink();
      sink.upsertErrors.set("document:2", new Error("Notion rejected the page"));
      const reconciler = new Reconciler(source, sink);
      await reconciler.runCycle(null);

      sink.upsertErrors.clear();
      const getDocument = vi.spyOn(source, "getDocument");
      const result = await reconciler.runCycle(MARKER);

      expect(getDocument).toHaveBeenCalledWith(2);
      expect(result.documents.inserted).toBe(1);
      expect(sourceIds(sink)).toEqual([1, 3, 2]);
    });

    it("should count documents that vanish mid-cycle as skipped", async () => {
      const source = new InMemorySource({
        documents: [sampleDocument({ id: 1 }), sampleDocument({ id: 2 })],
      });
      source.fileErrors.set(2, new NotFoundError("document", 2));
      const sink = new InMemorySink();

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(result.documents.skipped).toBe(1);
      expect(result.documents.failed).toBe(0);
      expect(result.documents.inserted).toBe(1);
    });

    it("should count a missing reference as a document failure", async () => {
      const source = new InMemorySource({
        tags: [sampleTag(9, "Broken")],
        documents: [sampleDocument({ id: 7, tagIds: [9] })],
      });
      const sink = new InMemorySink();
      sink.upsertErrors.set("tag:9", new Error("invalid color"));

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(result.tags.errors).toEqual(["tag Broken: invalid color"]);
      expect(result.documents.errors).toEqual([
        "Document 7: No Notion page in tags for Paperless ID 9",
      ]);
    });

    it("should record archive failures without stopping", async () => {
      const source = new InMemorySource({
        documents: [sampleDocument({ id: 1 })],
      });
      const sink = new InMemorySink();
      const stale = sink.seedDocument(4);
      sink.archiveErrors.set(
        stale.pageId,
        new TransportError("Notion unavailable", "notion", 502)
      );

      const result = await new Reconciler(source, sink).runCycle(null);

      expect(result.archive.failed).toBe(1);
      expect(result.archive.errors).toEqual(["Document 4: Notion unavailable"]);
      expect(result.documents.inserted).toBe(1);
    });

    it("should name the correspondent that failed", async () => {
      const source = new InMemorySource({
        correspondents: [
          sampleCorrespondent(1, "ACME"),
          sampleCorrespondent(2, "Utility Co"),
        ],
      });
      const sink = new InMemorySink();
      sink.upsertErrors.set("correspondent:1", new Error("rejected"));

      const result = await new Reconciler(source, sink).syncCorrespondents();

      expect(result.inserted).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.errors).toEqual(["correspondent ACME: rejected"]);
    });
  });

  describe("syncDocuments", () => {
    it("should not backfill without a scan", async () => {
      const source = new InMemorySource({
        documents: [sampleDocument({ id: 1 })],
      });
      const sink = new InMemorySink();

      const result = await new Reconciler(source, sink).syncDocuments(MARKER);

      expect(result.inserted).toBe(0);
      expect(sink.calls).toEqual([]);
    });
  });
});
