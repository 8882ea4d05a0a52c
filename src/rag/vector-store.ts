import { readFile, writeFile, mkdir, readdir, rm, access } from "node:fs/promises";
import path from "node:path";
import { LocalIndex } from "vectra";
import { toCollectionName } from "./collection-name.js";
import type { EmbeddingService } from "./embedding-service.js";
import type {
  Chunk,
  ChunkMetadata,
  CollectionInfo,
  DocumentInfo,
  Log,
  RetrievedChunk,
} from "./types.js";
import { silentLog } from "./types.js";

const DESCRIPTOR_FILE = "collection.json";

interface CollectionDescriptor {
  name: string;
  displayName: string;
  createdAt: string;
}

interface StoredChunk {
  id: string;
  text: string;
  vector: number[];
  metadata: ChunkMetadata;
}

export function chunkKey(documentId: string, chunkId: number): string {
  return `${documentId}_chunk_${chunkId}`;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return normA && normB ? dot / (Math.sqrt(normA) * Math.sqrt(normB)) : 0;
}

function readStoredChunk(item: {
  id: string;
  vector: number[];
  metadata: Record<string, unknown>;
}): StoredChunk | null {
  const { documentId, filename, chunkId, charCount, domain, text } = item.metadata;
  if (
    typeof documentId !== "string" ||
    typeof filename !== "string" ||
    typeof chunkId !== "number" ||
    typeof charCount !== "number" ||
    typeof domain !== "string" ||
    typeof text !== "string"
  ) {
    return null;
  }
  return {
    id: item.id,
    text,
    vector: item.vector,
    metadata: { documentId, filename, chunkId, charCount, domain },
  };
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

class CollectionHandle {
  private tail: Promise<void> = Promise.resolve();
  /** Set once the folder is gone; queued writes must reopen the collection. */
  removed = false;

  constructor(
    readonly name: string,
    readonly displayName: string,
    readonly index: LocalIndex,
  ) {}

  /** The index accepts a single update at a time; writes queue behind each other. */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async chunks(): Promise<StoredChunk[]> {
    const items = await this.index.listItems();
    const chunks: StoredChunk[] = [];
    for (const item of items) {
      const chunk = readStoredChunk(item);
      if (chunk) chunks.push(chunk);
    }
    return chunks;
  }
}

/**
 * Per-domain nearest-neighbour store. Every collection is a vectra index
 * folder under `rootDir` next to a descriptor holding its display name.
 */
export class SimilarityIndex {
  private readonly handles = new Map<string, Promise<CollectionHandle>>();
  private readonly deletions = new Map<string, Promise<boolean>>();

  constructor(
    private readonly rootDir: string,
    private readonly embedder: EmbeddingService,
    private readonly log: Log = silentLog,
  ) {}

  async createCollection(domain: string): Promise<CollectionInfo> {
    const handle = await this.handleFor(domain);
    const chunks = await handle.chunks();
    return { name: handle.name, displayName: handle.displayName, chunkCount: chunks.length };
  }

  async upsert(
    domain: string,
    documentId: string,
    chunks: Chunk[],
    filename: string,
  ): Promise<number> {
    const handle = await this.handleFor(domain);

    return handle.exclusive(async () => {
      // The collection was deleted while this write was queued
      if (handle.removed) return this.upsert(domain, documentId, chunks, filename);

      let inserted = 0;
      await handle.index.beginUpdate();
      try {
        for (const chunk of chunks) {
          const vector = await this.embedder.embed(chunk.text);
          await handle.index.upsertItem({
            id: chunkKey(documentId, chunk.id),
            vector,
            metadata: {
              documentId,
              filename,
              chunkId: chunk.id,
              charCount: chunk.charCount,
              domain,
              text: chunk.text,
            },
          });
          inserted++;
        }
      } finally {
        // Commit whatever was embedded so far; a failed embedding still surfaces.
        await this.commit(handle);
        this.log(`RAG: ${handle.name}: stored ${inserted}/${chunks.length} chunks of ${filename}`);
      }
      return inserted;
    });
  }

  async search(domain: string, query: string, topK: number): Promise<RetrievedChunk[]> {
    const handle = await this.existingHandle(domain);
    if (!handle || topK <= 0) return [];

    const chunks = await handle.chunks();
    if (chunks.length === 0) return [];

    const queryVector = await this.embedder.embed(query);
    const scored = chunks.map((chunk) => ({
      id: chunk.id,
      text: chunk.text,
      metadata: chunk.metadata,
      score: cosineSimilarity(queryVector, chunk.vector),
    }));

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.min(topK, scored.length));
  }

  async hasCollection(domain: string): Promise<boolean> {
    return (await this.existingHandle(domain)) !== null;
  }

  async count(domain: string): Promise<number> {
    const handle = await this.existingHandle(domain);
    if (!handle) return 0;
    return (await handle.chunks()).length;
  }

  async deleteDocument(domain: string, documentId: string): Promise<boolean> {
    const handle = await this.existingHandle(domain);
    if (!handle) return false;

    return handle.exclusive(async () => {
      if (handle.removed) return false;
      const ids = (await handle.chunks())
        .filter((chunk) => chunk.metadata.documentId === documentId)
        .map((chunk) => chunk.id);
      if (ids.length === 0) return false;

      await handle.index.beginUpdate();
      try {
        for (const id of ids) {
          await handle.index.deleteItem(id);
        }
      } catch (err) {
        handle.index.cancelUpdate();
        throw err;
      }
      await this.commit(handle);
      this.log(`RAG: ${handle.name}: removed ${ids.length} chunks of document ${documentId}`);
      return true;
    });
  }

  async documentsOf(domain: string): Promise<DocumentInfo[]> {
    const handle = await this.existingHandle(domain);
    if (!handle) return [];

    const documents = new Map<string, DocumentInfo>();
    for (const { metadata } of await handle.chunks()) {
      if (!documents.has(metadata.documentId)) {
        documents.set(metadata.documentId, {
          documentId: metadata.documentId,
          filename: metadata.filename,
          domain: metadata.domain,
        });
      }
    }
    return [...documents.values()];
  }

  async listCollections(): Promise<CollectionInfo[]> {
    let entries: string[];
    try {
      const dirents = await readdir(this.rootDir, { withFileTypes: true });
      entries = dirents.filter((d) => d.isDirectory()).map((d) => d.name).sort();
    } catch {
      // Nothing ingested yet
      return [];
    }

    const collections: CollectionInfo[] = [];
    for (const name of entries) {
      const descriptor = await this.readDescriptor(name);
      if (!descriptor) continue;
      const handle = await this.handleByName(name, descriptor.displayName);
      collections.push({
        name,
        displayName: descriptor.displayName,
        chunkCount: (await handle.chunks()).length,
      });
    }
    return collections;
  }

  /**
   * Deletions are serialized with handle creation for the same name: a write
   * that arrives mid-deletion opens a fresh collection once the folder is gone.
   */
  deleteCollection(domain: string): Promise<boolean> {
    const name = toCollectionName(domain);
    const pending = this.handles.get(name);
    this.handles.delete(name);

    const previous = this.deletions.get(name) ?? Promise.resolve(false);
    const deletion = previous
      .catch(() => false)
      .then(async () => {
        const handle = pending ? await pending.catch(() => null) : null;
        if (!handle) return this.removeFolder(name);
        return handle.exclusive(async () => {
          handle.removed = true;
          return this.removeFolder(name);
        });
      });

    this.deletions.set(name, deletion);
    const settle = () => {
      if (this.deletions.get(name) === deletion) this.deletions.delete(name);
    };
    void deletion.then(settle, settle);
    return deletion;
  }

  private async removeFolder(name: string): Promise<boolean> {
    const folder = path.join(this.rootDir, name);
    if (!(await pathExists(folder))) return false;
    await rm(folder, { recursive: true, force: true });
    this.log(`RAG: deleted collection ${name}`);
    return true;
  }

  private async commit(handle: CollectionHandle): Promise<void> {
    try {
      await handle.index.endUpdate();
    } catch (err) {
      // In-memory state no longer matches the folder; reopen on next access.
      handle.index.cancelUpdate();
      handle.removed = true;
      await this.evict(handle);
      throw err;
    }
  }

  private async evict(handle: CollectionHandle): Promise<void> {
    const pending = this.handles.get(handle.name);
    if (!pending) return;
    const current = await pending.catch(() => null);
    if (current === handle && this.handles.get(handle.name) === pending) {
      this.handles.delete(handle.name);
    }
  }

  private async existingHandle(domain: string): Promise<CollectionHandle | null> {
    const name = toCollectionName(domain);
    await this.deletions.get(name)?.catch(() => false);
    if (this.handles.has(name)) return this.handleFor(domain);
    if (!(await this.readDescriptor(name))) return null;
    return this.handleFor(domain);
  }

  private handleFor(domain: string): Promise<CollectionHandle> {
    return this.handleByName(toCollectionName(domain), domain);
  }

  /**
   * Single-flight: concurrent first access to one name shares one
   * initialization, which waits for any deletion of that name in progress.
   */
  private handleByName(name: string, displayName: string): Promise<CollectionHandle> {
    let pending = this.handles.get(name);
    if (!pending) {
      const deletion = this.deletions.get(name);
      const open = () => this.openCollection(name, displayName);
      const init = deletion ? deletion.then(open, open) : open();
      pending = init;
      this.handles.set(name, init);
      void init.catch(() => {
        if (this.handles.get(name) === init) this.handles.delete(name);
      });
    }
    return pending;
  }

  private async openCollection(name: string, domain: string): Promise<CollectionHandle> {
    const folder = path.join(this.rootDir, name);
    const index = new LocalIndex(folder);
    if (!(await index.isIndexCreated())) {
      await mkdir(folder, { recursive: true });
      await index.createIndex();
    }

    let descriptor = await this.readDescriptor(name);
    if (!descriptor) {
      descriptor = { name, displayName: domain, createdAt: new Date().toISOString() };
      await writeFile(path.join(folder, DESCRIPTOR_FILE), JSON.stringify(descriptor, null, 2));
      this.log(`RAG: created collection ${name} for "${domain}"`);
    }

    return new CollectionHandle(name, descriptor.displayName, index);
  }

  private async readDescriptor(name: string): Promise<CollectionDescriptor | null> {
    try {
      const data = await readFile(path.join(this.rootDir, name, DESCRIPTOR_FILE), "utf-8");
      const parsed: unknown = JSON.parse(data);
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "displayName" in parsed &&
        typeof parsed.displayName === "string"
      ) {
        return {
          name,
          displayName: parsed.displayName,
          createdAt: "createdAt" in parsed && typeof parsed.createdAt === "string" ? parsed.createdAt : "",
        };
      }
      return null;
    } catch {
      return null;
    }
  }
}
