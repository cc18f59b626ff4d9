import type { CollectionName, StoredDocument } from "./schema";
import type { SequencePeek, SequenceRequest } from "./sequence";

export type BackendKind = "durable" | "memory";

/** Equality filters over document fields; `null` matches a missing or null field. */
export type DocumentFilter = Record<string, string | number | boolean | null>;

const FIELD_PATH = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export function isFieldPath(field: string) {
  return FIELD_PATH.test(field);
}

/** Storage seam shared by the libSQL store and the in-memory mirror. */
export interface DocumentBackend {
  readonly kind: BackendKind;
  probe(collection: CollectionName): Promise<void>;
  find(collection: CollectionName, filter: DocumentFilter): Promise<StoredDocument[]>;
  get(collection: CollectionName, id: string): Promise<StoredDocument | undefined>;
  upsert(collection: CollectionName, document: StoredDocument): Promise<void>;
  allocateSequence(collection: CollectionName, request: SequenceRequest): Promise<number>;
  /** Highest stored or reserved value of a sequence, without advancing it. */
  peekSequence(collection: CollectionName, request: SequencePeek): Promise<number | null>;
  /** Raises the reservation counter to at least `value`. */
  reserveSequence(collection: CollectionName, field: string, value: number): Promise<void>;
  close(): Promise<void>;
}
