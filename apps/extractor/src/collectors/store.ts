import { createHash } from "node:crypto";
import { insertDocument, withTransaction, type Db } from "database";
import type { CollectedDocument } from "./types.js";

export function contentHash(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/** Insert documents, skipping any whose content hash is already stored. */
export function storeDocuments(db: Db, docs: CollectedDocument[]): { inserted: number; duplicates: number } {
  return withTransaction(db, () => {
    let inserted = 0;
    for (const doc of docs) {
      const res = insertDocument(db, { ...doc, content_hash: contentHash(doc.content) });
      if (res.inserted) inserted++;
    }
    return { inserted, duplicates: docs.length - inserted };
  });
}
