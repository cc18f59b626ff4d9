import baseLogger, { type Logger } from "../libs/logger";
import { BackendUnavailableError, describeError } from "../errors";
import { withTimeout } from "../utils/timeout";
import { isFieldPath, type BackendKind, type DocumentBackend, type DocumentFilter } from "./backend";
import { MemoryMirror } from "./mirror";
import { collectionNames, sequenceFields, type CollectionName, type SequenceField, type StoredDocument } from "./schema";
import {
  defaultUnderwritingQuestions,
  parseUnderwritingQuestions,
  type UnderwritingQuestion
} from "./underwriting-questions";

export type QueryResult =
  | { status: "ok"; data: StoredDocument[] }
  | { status: "error"; message: string };

export type PersistenceGatewayOptions = {
  /** Omit to run every collection on the mirror. */
  durable?: DocumentBackend;
  mirror?: MemoryMirror;
  timeoutMs: number;
  /** Identifier prefixes stripped when reading sequence fields. */
  sequencePrefixes: readonly string[];
  /** How long a collection stays on the mirror after a durable failure before the durable store is tried again. */
  retryAfterMs?: number;
  /** Sequences primed into the mirror from the durable store. */
  sequenceFields?: readonly SequenceField[];
  logger?: Logger;
  defaultQuestions?: () => UnderwritingQuestion[];
  clock?: () => number;
};

/**
 * Uniform query/upsert surface over the named collections. Each collection is assigned
 * to the durable store or to the in-memory mirror on its own. A durable call that fails
 * is served by the mirror; the durable store is tried again after `retryAfterMs` and, once
 * the store answers, what the mirror took in meanwhile is written back.
 */
export class PersistenceGateway {
  private readonly mirror: MemoryMirror;
  private readonly assignments = new Map<CollectionName, BackendKind>();
  private readonly retryAt = new Map<CollectionName, number>();
  private readonly recoveries = new Map<CollectionName, Promise<boolean>>();
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(private readonly options: PersistenceGatewayOptions) {
    this.mirror = options.mirror ?? new MemoryMirror();
    this.log = (options.logger ?? baseLogger).child({ component: "persistence" });
    this.clock = options.clock ?? Date.now;
  }

  async initialize() {
    await Promise.all(collectionNames.map((collection) => this.probe(collection)));
    return this.describeBackends();
  }

  describeBackends() {
    const backends: Record<CollectionName, BackendKind> = {
      policyDrafts: this.backendOf("policyDrafts"),
      policiesIssued: this.backendOf("policiesIssued"),
      underwritingQuestions: this.backendOf("underwritingQuestions")
    };
    return backends;
  }

  backendOf(collection: CollectionName): BackendKind {
    return this.assignments.get(collection) ?? "memory";
  }

  async query(collection: CollectionName, filter: DocumentFilter = {}): Promise<QueryResult> {
    const invalid = Object.keys(filter).find((field) => !isFieldPath(field));
    if (invalid !== undefined) {
      return { status: "error", message: `Invalid filter field "${invalid}"` };
    }

    try {
      const data = await this.dispatch(collection, "query", (backend) => backend.find(collection, filter));
      return { status: "ok", data };
    } catch (error) {
      this.log.error({ collection, err: describeError(error) }, "Query failed");
      return { status: "error", message: describeError(error) };
    }
  }

  get(collection: CollectionName, id: string) {
    return this.dispatch(collection, "get", (backend) => backend.get(collection, id));
  }

  async upsert(collection: CollectionName, document: StoredDocument) {
    if (!document.id) {
      throw new Error(`Cannot upsert into "${collection}" without an id`);
    }
    await this.dispatch(collection, "upsert", (backend) => backend.upsert(collection, document));
  }

  async nextSequence(field: string, collection: CollectionName, increment: number, defaultStart: number) {
    if (!isFieldPath(field)) {
      throw new Error(`Invalid sequence field "${field}"`);
    }
    const request = { field, increment, defaultStart, prefixes: this.options.sequencePrefixes };
    const next = await this.dispatch(collection, "nextSequence", (backend) =>
      backend.allocateSequence(collection, request)
    );
    await this.mirror.reserveSequence(collection, field, next);
    this.log.debug({ collection, field, next }, "Sequence allocated");
    return next;
  }

  /** The stored question set, or the built-in one when the store has none or errors. */
  async loadUnderwritingQuestions(): Promise<UnderwritingQuestion[]> {
    const result = await this.query("underwritingQuestions");
    if (result.status === "ok") {
      const questions = parseUnderwritingQuestions(result.data);
      if (questions.length > 0) {
        return questions;
      }
    } else {
      this.log.warn({ message: result.message }, "Underwriting questions unavailable; using defaults");
    }
    return (this.options.defaultQuestions ?? defaultUnderwritingQuestions)();
  }

  async close() {
    await this.options.durable?.close();
    await this.mirror.close();
  }

  private async probe(collection: CollectionName) {
    const { durable } = this.options;
    if (!durable) {
      this.assignments.set(collection, "memory");
      return;
    }

    try {
      await withTimeout(`probe ${collection}`, this.options.timeoutMs, () => durable.probe(collection));
      await this.primeSequences(collection, durable);
      this.assignments.set(collection, "durable");
    } catch (error) {
      this.degrade(collection, error, "Durable store unavailable; collection falls back to the in-memory mirror");
    }
  }

  private async primeSequences(collection: CollectionName, durable: DocumentBackend) {
    for (const field of this.sequenceFieldsOf(collection)) {
      const request = { field, prefixes: this.options.sequencePrefixes };
      const mark = await withTimeout(`peek ${collection}.${field}`, this.options.timeoutMs, () =>
        durable.peekSequence(collection, request)
      );
      if (mark !== null) {
        await this.mirror.reserveSequence(collection, field, mark);
      }
    }
  }

  private sequenceFieldsOf(collection: CollectionName) {
    return (this.options.sequenceFields ?? sequenceFields)
      .filter((entry) => entry.collection === collection)
      .map((entry) => entry.field);
  }

  private async dispatch<T>(
    collection: CollectionName,
    operation: string,
    run: (backend: DocumentBackend) => Promise<T>
  ): Promise<T> {
    const { durable } = this.options;
    if (durable && (await this.durableReady(collection, durable))) {
      try {
        return await withTimeout(`${operation} ${collection}`, this.options.timeoutMs, () => run(durable));
      } catch (error) {
        this.degrade(collection, error, "Durable store call failed; serving it from the in-memory mirror");
      }
    }
    return run(this.mirror);
  }

  private async durableReady(collection: CollectionName, durable: DocumentBackend) {
    if (this.backendOf(collection) === "durable") return true;
    const retryAt = this.retryAt.get(collection);
    if (retryAt === undefined || this.clock() < retryAt) return false;

    let recovery = this.recoveries.get(collection);
    if (!recovery) {
      recovery = this.recover(collection, durable).finally(() => this.recoveries.delete(collection));
      this.recoveries.set(collection, recovery);
    }
    return recovery;
  }

  /** Checks the durable store again and writes back what the mirror took in while the store was away. */
  private async recover(collection: CollectionName, durable: DocumentBackend) {
    const { timeoutMs, sequencePrefixes } = this.options;
    try {
      await withTimeout(`probe ${collection}`, timeoutMs, () => durable.probe(collection));
      const pending = await this.mirror.find(collection, {});
      for (const document of pending) {
        await withTimeout(`write back ${collection}`, timeoutMs, () => durable.upsert(collection, document));
        await this.mirror.remove(collection, document.id);
      }
      for (const field of this.sequenceFieldsOf(collection)) {
        const mark = await this.mirror.peekSequence(collection, { field, prefixes: sequencePrefixes });
        if (mark !== null) {
          await withTimeout(`reserve ${collection}.${field}`, timeoutMs, () =>
            durable.reserveSequence(collection, field, mark)
          );
        }
      }

      this.assignments.set(collection, "durable");
      this.retryAt.delete(collection);
      this.log.info({ collection, writtenBack: pending.length }, "Durable store answered again; collection restored");
      return true;
    } catch (error) {
      this.degrade(collection, error, "Durable store still unavailable");
      return false;
    }
  }

  private degrade(collection: CollectionName, cause: unknown, message: string) {
    const error = new BackendUnavailableError(collection, { cause });
    this.assignments.set(collection, "memory");
    this.retryAt.set(collection, this.clock() + (this.options.retryAfterMs ?? 0));
    this.log.warn({ collection, err: describeError(error.cause) }, message);
  }
}
