import { sql } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const collectionNames = ["policyDrafts", "policiesIssued", "underwritingQuestions"] as const;
export type CollectionName = (typeof collectionNames)[number];

export type SequenceField = { collection: CollectionName; field: string };

/** Sequences whose high-water mark the mirror learns from the durable store at start-up. */
export const sequenceFields: readonly SequenceField[] = [{ collection: "policyDrafts", field: "quoteNumber" }];

/** Every stored document carries its own identifier; the rest is free-form JSON. */
export type StoredDocument = { id: string; [key: string]: unknown };

function documentTable(name: string) {
  return sqliteTable(name, {
    id: text("id").primaryKey(),
    body: text("body", { mode: "json" }).$type<StoredDocument>().notNull(),
    updatedAt: integer("updated_at", { mode: "number" })
      .default(sql`(strftime('%s','now') * 1000)`)
      .notNull()
  });
}

export const policyDrafts = documentTable("policy_drafts");
export const policiesIssued = documentTable("policies_issued");
export const underwritingQuestions = documentTable("underwriting_questions");

export type DocumentTable = typeof policyDrafts;

export const documentTables: Record<CollectionName, DocumentTable> = {
  policyDrafts,
  policiesIssued,
  underwritingQuestions
};

export const tableNames: Record<CollectionName, string> = {
  policyDrafts: "policy_drafts",
  policiesIssued: "policies_issued",
  underwritingQuestions: "underwriting_questions"
};

export const sequenceCounters = sqliteTable("sequence_counters", {
  name: text("name").primaryKey(),
  value: integer("value", { mode: "number" }).notNull(),
  updatedAt: integer("updated_at", { mode: "number" })
    .default(sql`(strftime('%s','now') * 1000)`)
    .notNull()
});

export function documentTableDDL(collection: CollectionName) {
  return `CREATE TABLE IF NOT EXISTS ${tableNames[collection]} (
  id TEXT PRIMARY KEY NOT NULL,
  body TEXT NOT NULL,
  updated_at INTEGER DEFAULT (strftime('%s','now') * 1000) NOT NULL
)`;
}

export const SEQUENCE_COUNTERS_DDL = `CREATE TABLE IF NOT EXISTS sequence_counters (
  name TEXT PRIMARY KEY NOT NULL,
  value INTEGER NOT NULL,
  updated_at INTEGER DEFAULT (strftime('%s','now') * 1000) NOT NULL
)`;
