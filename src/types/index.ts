// Domain entities shared by the reader, the writer and the reconciler

export type Collection = "documents" | "tags" | "correspondents";

// =====================
// Source entities
// =====================

/**
 * Paperless document, validated and normalized at the reader boundary
 */
export interface Document {
  kind: "document";
  id: number;
  title: string;
  /** Raw date strings; parsed only when written to Notion */
  created: string | null;
  added: string | null;
  modified: string | null;
  correspondentId: number | null;
  /** Ordered, without duplicates */
  tagIds: number[];
  originalFileName: string | null;
}

export interface Tag {
  kind: "tag";
  id: number;
  name: string;
  color: string | null;
}

export interface Correspondent {
  kind: "correspondent";
  id: number;
  name: string;
}

export type SourceEntity = Document | Tag | Correspondent;

/**
 * Downloaded document content. `url` is the stable download link the bytes
 * were read from; the sink stores it as an external file reference.
 */
export interface DocumentFile {
  content: Uint8Array;
  filename: string;
  url: string;
}

// =====================
// Sink records
// =====================

export interface SinkRecord {
  /** Notion page id */
  id: string;
  collection: Collection;
  /** Mirrored Paperless id, the join key back to the source */
  sourceId: number;
  archived: boolean;
}

export interface UpsertResult {
  record: SinkRecord;
  inserted: boolean;
  updated: boolean;
}

export type ReferenceLookup =
  | { status: "found"; pageId: string }
  | { status: "missing" };

// =====================
// Collaborator contracts
// =====================

export interface SourceReader {
  listDocuments(modifiedAfter?: Date | null): Promise<Document[]>;
  listAllDocumentIds(): Promise<Set<number>>;
  listTags(): Promise<Tag[]>;
  listCorrespondents(): Promise<Correspondent[]>;
  getDocument(id: number): Promise<Document>;
  getDocumentFile(id: number): Promise<DocumentFile>;
}

export interface SinkWriter {
  upsert(entity: SourceEntity, file?: DocumentFile): Promise<UpsertResult>;
  findRecord(
    collection: Collection,
    sourceId: number
  ): Promise<SinkRecord | null>;
  listAllDocumentIds(): Promise<Map<number, string>>;
  archiveDocument(sinkRecordId: string): Promise<void>;
}
