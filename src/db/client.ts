import fs from "node:fs";
import path from "node:path";
import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import * as schema from "./schema";

export type StoreDatabase = LibSQLDatabase<typeof schema>;

export type StoreConnection = {
  url: string;
  client: Client;
  db: StoreDatabase;
  close: () => void;
};

export type StoreConnectionOptions = {
  url: string;
  authToken?: string;
};

/** Creates the parent directory and an empty file for `file:` URLs; remote URLs are left alone. */
export function ensureLocalSQLiteFile(url: string) {
  if (!url.startsWith("file:")) {
    return;
  }

  const relativePath = url.replace(/^file:/, "");
  const resolvedPath = path.isAbsolute(relativePath)
    ? relativePath
    : path.resolve(process.cwd(), relativePath);

  const dir = path.dirname(resolvedPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (!fs.existsSync(resolvedPath)) {
    fs.closeSync(fs.openSync(resolvedPath, "a"));
  }
}

/**
 * Opens the process-wide store handle. Created once at start-up and injected into the
 * persistence gateway; callers own `close()`.
 */
export function createStoreConnection({ url, authToken }: StoreConnectionOptions): StoreConnection {
  ensureLocalSQLiteFile(url);

  const client = createClient({ url, authToken });
  const db = drizzle(client, { schema });

  return {
    url,
    client,
    db,
    close: () => client.close()
  };
}
