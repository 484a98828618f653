import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { EMPTY_PERSISTED_QUOTA, FeatureKeySchema, PersistedQuotaSchema } from "@limitkit/schemas";
import type { FeatureKey, PersistedQuota } from "@limitkit/schemas";
import { PersistenceReadError, PersistenceWriteError } from "../errors.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import type { QuotaStore } from "./store.js";

const QuotaDocumentSchema = z.object({
  version: z.literal(1),
  features: z.record(FeatureKeySchema, PersistedQuotaSchema),
});
type QuotaDocument = z.infer<typeof QuotaDocumentSchema>;

function emptyDocument(): QuotaDocument {
  return { version: 1, features: {} };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Keeps every feature's counters in one JSON document. Writes go to a temp file
 * that is then renamed into place.
 */
export class FileQuotaStore implements QuotaStore {
  private readonly lock = new KeyedMutex<"document">();
  private writeSeq = 0;

  constructor(private readonly filePath: string) {}

  async load(featureKey: FeatureKey): Promise<PersistedQuota> {
    const document = await this.lock.run("document", () => this.readDocument(featureKey));
    const entry = document.features[featureKey];
    return entry ? { ...entry } : { ...EMPTY_PERSISTED_QUOTA };
  }

  async save(featureKey: FeatureKey, usageCount: number, cooldownStartEpochSeconds: number): Promise<void> {
    await this.lock.run("document", async () => {
      let document: QuotaDocument;
      try {
        document = await this.readDocument(featureKey);
      } catch {
        // An unreadable document is replaced by the next successful save.
        document = emptyDocument();
      }
      document.features[featureKey] = { usageCount, cooldownStartEpochSeconds };

      const tempPath = `${this.filePath}.${process.pid}.${++this.writeSeq}.tmp`;
      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(tempPath, JSON.stringify(document, null, 2), "utf8");
        await rename(tempPath, this.filePath);
      } catch (err) {
        throw new PersistenceWriteError(`Failed to write quota file ${this.filePath}`, featureKey, { cause: err });
      }
    });
  }

  private async readDocument(featureKey: FeatureKey): Promise<QuotaDocument> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return emptyDocument();
      throw new PersistenceReadError(`Failed to read quota file ${this.filePath}`, featureKey, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceReadError(`Quota file ${this.filePath} is not valid JSON`, featureKey, { cause: err });
    }

    const parsed = QuotaDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceReadError(`Quota file ${this.filePath} has an unexpected shape`, featureKey, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
