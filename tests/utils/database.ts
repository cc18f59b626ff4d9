import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { createStoreConnection, type StoreConnection } from "../../src/db/client";

export type TempDatabase = {
  url: string;
  open: () => StoreConnection;
  remove: () => void;
};

/** A fresh SQLite file under .tmp; `open` may be called again to simulate a restart. */
export function createTempDatabase(label = "store"): TempDatabase {
  const filePath = path.resolve(process.cwd(), `.tmp/${label}-${randomUUID()}.db`);
  const url = `file:${filePath}`;
  return {
    url,
    open: () => createStoreConnection({ url }),
    remove: () => {
      for (const suffix of ["", "-journal", "-wal", "-shm"]) {
        fs.rmSync(`${filePath}${suffix}`, { force: true });
      }
    }
  };
}
