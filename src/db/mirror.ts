import type { DocumentBackend, DocumentFilter } from "./backend";
import type { CollectionName, StoredDocument } from "./schema";
import {
  computeNextSequence,
  highWaterMark,
  highestNumericPortion,
  sequenceKey,
  type SequencePeek,
  type SequenceRequest
} from "./sequence";

function readField(document: StoredDocument, field: string): unknown {
  let current: unknown = document;
  for (const segment of field.split(".")) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function matches(document: StoredDocument, filter: DocumentFilter) {
  return Object.entries(filter).every(([field, expected]) => {
    const actual = readField(document, field);
    return expected === null ? actual === undefined || actual === null : actual === expected;
  });
}

/**
 * Process-local stand-in for the durable store. Documents are cloned on the way in and
 * out. Sequence allocation has no await between read and write, so it cannot interleave.
 */
export class MemoryMirror implements DocumentBackend {
  readonly kind = "memory" as const;
  private readonly collections = new Map<CollectionName, Map<string, StoredDocument>>();
  private readonly counters = new Map<string, number>();

  private collection(name: CollectionName) {
    let documents = this.collections.get(name);
    if (!documents) {
      documents = new Map();
      this.collections.set(name, documents);
    }
    return documents;
  }

  async probe() {}

  async find(collection: CollectionName, filter: DocumentFilter) {
    return [...this.collection(collection).values()]
      .filter((document) => matches(document, filter))
      .map((document) => structuredClone(document));
  }

  async get(collection: CollectionName, id: string) {
    const document = this.collection(collection).get(id);
    return document ? structuredClone(document) : undefined;
  }

  async upsert(collection: CollectionName, document: StoredDocument) {
    this.collection(collection).set(document.id, structuredClone(document));
  }

  /** Documents are removed only once they have been written back to the durable store. */
  async remove(collection: CollectionName, id: string) {
    this.collection(collection).delete(id);
  }

  async allocateSequence(collection: CollectionName, request: SequenceRequest) {
    const key = sequenceKey(collection, request.field);
    const reserved = this.counters.get(key) ?? null;
    const next = computeNextSequence(this.highestStored(collection, request), reserved, request.increment, request.defaultStart);
    this.counters.set(key, next);
    return next;
  }

  async peekSequence(collection: CollectionName, request: SequencePeek) {
    return highWaterMark(
      this.highestStored(collection, request),
      this.counters.get(sequenceKey(collection, request.field)) ?? null
    );
  }

  /** Records a number handed out elsewhere so the mirror never repeats it. */
  async reserveSequence(collection: CollectionName, field: string, value: number) {
    const key = sequenceKey(collection, field);
    this.counters.set(key, Math.max(this.counters.get(key) ?? value, value));
  }

  /** Number of documents held, across collections. */
  size() {
    let total = 0;
    for (const documents of this.collections.values()) total += documents.size;
    return total;
  }

  private highestStored(collection: CollectionName, request: SequencePeek) {
    return highestNumericPortion(
      [...this.collection(collection).values()].map((document) => readField(document, request.field)),
      request.prefixes
    );
  }

  async close() {
    this.collections.clear();
    this.counters.clear();
  }
}
