import { and, eq, sql } from "drizzle-orm";
import pLimit from "p-limit";
import type { DocumentBackend, DocumentFilter } from "./backend";
import type { StoreConnection, StoreDatabase } from "./client";
import {
  SEQUENCE_COUNTERS_DDL,
  documentTableDDL,
  documentTables,
  sequenceCounters,
  type CollectionName,
  type DocumentTable,
  type StoredDocument
} from "./schema";
import {
  computeNextSequence,
  highWaterMark,
  highestNumericPortion,
  sequenceKey,
  type SequencePeek,
  type SequenceRequest
} from "./sequence";

export type LibsqlDocumentStoreOptions = {
  /** Create missing tables while probing. When false a missing table fails the probe. */
  autoCreate: boolean;
};

function fieldExpression(body: DocumentTable["body"], field: string) {
  return sql`json_extract(${body}, ${`$.${field}`})`;
}

/** Document collections stored as JSON rows in libSQL, one table per collection. */
export class LibsqlDocumentStore implements DocumentBackend {
  readonly kind = "durable" as const;
  private readonly db: StoreDatabase;
  /** Local libSQL transactions take their own connection; one writer at a time per process. */
  private readonly writes = pLimit(1);

  constructor(
    private readonly connection: StoreConnection,
    private readonly options: LibsqlDocumentStoreOptions
  ) {
    this.db = connection.db;
  }

  async probe(collection: CollectionName) {
    if (this.options.autoCreate) {
      await this.db.run(sql.raw(documentTableDDL(collection)));
      await this.db.run(sql.raw(SEQUENCE_COUNTERS_DDL));
    }
    const table = documentTables[collection];
    await this.db.select({ id: table.id }).from(table).limit(1);
    await this.db.select({ name: sequenceCounters.name }).from(sequenceCounters).limit(1);
  }

  async find(collection: CollectionName, filter: DocumentFilter) {
    const table = documentTables[collection];
    const conditions = Object.entries(filter).map(([field, value]) => {
      const extracted = fieldExpression(table.body, field);
      return value === null ? sql`${extracted} IS NULL` : sql`${extracted} = ${value}`;
    });

    const rows = await this.db
      .select({ body: table.body })
      .from(table)
      .where(and(...conditions))
      .orderBy(table.id);
    return rows.map((row) => row.body);
  }

  async get(collection: CollectionName, id: string) {
    const table = documentTables[collection];
    const [row] = await this.db.select({ body: table.body }).from(table).where(eq(table.id, id)).limit(1);
    return row?.body;
  }

  async upsert(collection: CollectionName, document: StoredDocument) {
    const table = documentTables[collection];
    await this.writes(async () => {
      const updatedAt = Date.now();
      await this.db
        .insert(table)
        .values({ id: document.id, body: document, updatedAt })
        .onConflictDoUpdate({ target: table.id, set: { body: document, updatedAt } });
    });
  }

  /**
   * Reads the highest existing value and the reservation counter, then advances the
   * counter, inside one write transaction.
   */
  async allocateSequence(collection: CollectionName, request: SequenceRequest) {
    const table = documentTables[collection];
    const key = sequenceKey(collection, request.field);

    return this.writes(() =>
      this.db.transaction(
        async (tx) => {
          const values = await tx.select({ value: fieldExpression(table.body, request.field) }).from(table);
          const highest = highestNumericPortion(
            values.map((row) => row.value),
            request.prefixes
          );

          const [counter] = await tx
            .select({ value: sequenceCounters.value })
            .from(sequenceCounters)
            .where(eq(sequenceCounters.name, key))
            .limit(1);

          const next = computeNextSequence(highest, counter?.value ?? null, request.increment, request.defaultStart);
          const updatedAt = Date.now();
          await tx
            .insert(sequenceCounters)
            .values({ name: key, value: next, updatedAt })
            .onConflictDoUpdate({ target: sequenceCounters.name, set: { value: next, updatedAt } });
          return next;
        },
        { behavior: "immediate" }
      )
    );
  }

  async peekSequence(collection: CollectionName, request: SequencePeek) {
    const table = documentTables[collection];
    const values = await this.db.select({ value: fieldExpression(table.body, request.field) }).from(table);
    const [counter] = await this.db
      .select({ value: sequenceCounters.value })
      .from(sequenceCounters)
      .where(eq(sequenceCounters.name, sequenceKey(collection, request.field)))
      .limit(1);
    return highWaterMark(
      highestNumericPortion(
        values.map((row) => row.value),
        request.prefixes
      ),
      counter?.value ?? null
    );
  }

  async reserveSequence(collection: CollectionName, field: string, value: number) {
    const updatedAt = Date.now();
    await this.writes(async () => {
      await this.db
        .insert(sequenceCounters)
        .values({ name: sequenceKey(collection, field), value, updatedAt })
        .onConflictDoUpdate({
          target: sequenceCounters.name,
          set: { value: sql`max(${sequenceCounters.value}, ${value})`, updatedAt }
        });
    });
  }

  async close() {
    this.connection.close();
  }
}
