import type { DocumentBackend, DocumentFilter } from "../../src/db/backend";
import { MemoryMirror } from "../../src/db/mirror";
import type { CollectionName, StoredDocument } from "../../src/db/schema";
import type { SequencePeek, SequenceRequest } from "../../src/db/sequence";

/** Durable-looking backend that rejects every call. */
export class UnreachableBackend implements DocumentBackend {
  readonly kind = "durable" as const;
  closed = false;

  private refuse(): Promise<never> {
    return Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:8080"));
  }

  probe() {
    return this.refuse();
  }

  find() {
    return this.refuse();
  }

  get() {
    return this.refuse();
  }

  upsert() {
    return this.refuse();
  }

  allocateSequence() {
    return this.refuse();
  }

  peekSequence() {
    return this.refuse();
  }

  reserveSequence() {
    return this.refuse();
  }

  async close() {
    this.closed = true;
  }
}

/**
 * Durable-looking backend over its own in-memory store. Set `failing` to make every call
 * reject; `unavailable` lists collections whose probe rejects.
 */
export class FlakyBackend implements DocumentBackend {
  readonly kind = "durable" as const;
  readonly store = new MemoryMirror();
  failing = false;

  constructor(private readonly unavailable: readonly CollectionName[] = []) {}

  private guard() {
    if (this.failing) {
      throw new Error("database is locked");
    }
  }

  async probe(collection: CollectionName) {
    this.guard();
    if (this.unavailable.includes(collection)) {
      throw new Error(`no such table: ${collection}`);
    }
  }

  async find(collection: CollectionName, filter: DocumentFilter) {
    this.guard();
    return this.store.find(collection, filter);
  }

  async get(collection: CollectionName, id: string) {
    this.guard();
    return this.store.get(collection, id);
  }

  async upsert(collection: CollectionName, document: StoredDocument) {
    this.guard();
    await this.store.upsert(collection, document);
  }

  async allocateSequence(collection: CollectionName, request: SequenceRequest) {
    this.guard();
    return this.store.allocateSequence(collection, request);
  }

  async peekSequence(collection: CollectionName, request: SequencePeek) {
    this.guard();
    return this.store.peekSequence(collection, request);
  }

  async reserveSequence(collection: CollectionName, field: string, value: number) {
    this.guard();
    await this.store.reserveSequence(collection, field, value);
  }

  async close() {
    await this.store.close();
  }
}

/** Backend whose probe never settles. */
export class HangingBackend extends FlakyBackend {
  override probe(): Promise<void> {
    return new Promise<void>(() => {});
  }
}
