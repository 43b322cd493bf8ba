/**
 * Domain entity fixtures
 */

import type {
  Correspondent,
  Document,
  DocumentFile,
  Tag,
} from "../../src/types/index.js";

export function sampleDocument(
  overrides: Partial<Document> & { id: number }
): Document {
  return {
    kind: "document",
    title: `Document ${String(overrides.id)}`,
    created: "2024-03-01",
    added: "2024-03-02T09:30:00Z",
    modified: "2024-03-02T09:30:00Z",
    correspondentId: null,
    tagIds: [],
    originalFileName: null,
    ...overrides,
  };
}

export function sampleTag(id: number, name: string): Tag {
  return { kind: "tag", id, name, color: null };
}

export function sampleCorrespondent(id: number, name: string): Correspondent {
  return { kind: "correspondent", id, name };
}

export function sampleFile(id: number): DocumentFile {
  return {
    content: new TextEncoder().encode("%PDF-1.4 test"),
    filename: `document-${String(id)}.pdf`,
    url: `https://paperless.test/api/documents/${String(id)}/download/`,
  };
}
