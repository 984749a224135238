import fs from "fs/promises";
import path from "path";
import type {
  CatalogMatch,
  CatalogMetadata,
  ChunkMetadata,
  ContentFilter,
  Course,
  CourseChunk,
  MetadataPredicate,
} from "../types";
import type { Embedder } from "./embeddings";

// ─── Search Results ────────────────────────────────────────

export class SearchResults {
  constructor(
    readonly documents: string[],
    readonly metadata: ChunkMetadata[],
    readonly distances: number[],
    readonly error?: string,
  ) {
    if (documents.length !== metadata.length || documents.length !== distances.length) {
      throw new Error(
        `SearchResults length mismatch: ${documents.length} documents, ${metadata.length} metadata, ${distances.length} distances`,
      );
    }
  }

  static empty(error?: string): SearchResults {
    return new SearchResults([], [], [], error);
  }

  isEmpty(): boolean {
    return this.documents.length === 0;
  }
}

// ─── Filters ───────────────────────────────────────────────

/**
 * Exact-match metadata filter for content queries.
 *
 *   buildContentFilter()           → undefined
 *   buildContentFilter("X", 2)     → { $and: [{ courseTitle: "X" }, { lessonNumber: 2 }] }
 */
export function buildContentFilter(courseTitle?: string, lessonNumber?: number): ContentFilter | undefined {
  if (courseTitle !== undefined) {
    return lessonNumber !== undefined ? { $and: [{ courseTitle }, { lessonNumber }] } : { courseTitle };
  }
  if (lessonNumber !== undefined) return { lessonNumber };
  return undefined;
}

function matchesPredicate(meta: ChunkMetadata, predicate: MetadataPredicate): boolean {
  if ("courseTitle" in predicate) return meta.courseTitle === predicate.courseTitle;
  return meta.lessonNumber === predicate.lessonNumber;
}

export function matchesFilter(meta: ChunkMetadata, filter?: ContentFilter): boolean {
  if (!filter) return true;
  if ("$and" in filter) return filter.$and.every((p) => matchesPredicate(meta, p));
  return matchesPredicate(meta, filter);
}

// ─── Similarity ────────────────────────────────────────────

export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) return 1;
  let dot = 0, magA = 0, magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  const denom = Math.sqrt(magA) * Math.sqrt(magB);
  return denom === 0 ? 1 : 1 - dot / denom;
}

// ─── Index Contract ────────────────────────────────────────

export interface CourseIndex {
  upsertCatalog(course: Course): Promise<void>;
  upsertContent(chunks: CourseChunk[]): Promise<void>;
  removeCourseContent(title: string): Promise<void>;
  queryCatalog(nameHint: string): Promise<CatalogMatch | null>;
  queryContent(queryText: string, filter?: ContentFilter, limit?: number): Promise<SearchResults>;
  clear(): Promise<void>;
  countCourses(): Promise<number>;
  listTitles(): Promise<string[]>;
  listAllCatalogMetadata(): Promise<CatalogMetadata[]>;
  getCatalogEntry(title: string): Promise<CatalogMetadata | null>;
  getCourseLink(title: string): Promise<string | null>;
  getLessonLink(title: string, lessonNumber: number): Promise<string | null>;
}

interface IndexRecord<M> {
  id: string;
  document: string;
  metadata: M;
  embedding: number[];
}

interface ContentRecordMetadata {
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

interface IndexSnapshot {
  version: 1;
  embeddingModel: string;
  catalog: IndexRecord<CatalogMetadata>[];
  content: IndexRecord<ContentRecordMetadata>[];
}

export interface InMemoryCourseIndexOptions {
  embedder: Embedder;
  maxResults: number;
  /** JSON snapshot location; omit to keep the index in memory. */
  persistPath?: string;
}

export const chunkRecordId = (chunk: CourseChunk): string => JSON.stringify([chunk.courseTitle, chunk.chunkIndex]);

// ─── In-Memory Index ───────────────────────────────────────

export class InMemoryCourseIndex implements CourseIndex {
  private catalog: IndexRecord<CatalogMetadata>[] = [];
  private content: IndexRecord<ContentRecordMetadata>[] = [];
  private readonly embedder: Embedder;
  private readonly maxResults: number;
  private readonly persistPath?: string;

  constructor(options: InMemoryCourseIndexOptions) {
    this.embedder = options.embedder;
    this.maxResults = options.maxResults;
    this.persistPath = options.persistPath;
  }

  /** Restore both collections from the snapshot, if one exists. */
  async load(): Promise<void> {
    if (!this.persistPath) return;
    let raw: string;
    try {
      raw = await fs.readFile(this.persistPath, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        console.log(`[VectorStore] No index at ${this.persistPath}, starting empty`);
        return;
      }
      throw e;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      console.warn(`[VectorStore] Ignoring unreadable index ${this.persistPath}:`, errorMessage(e));
      return;
    }
    if (!isSnapshot(parsed)) {
      console.warn(`[VectorStore] Ignoring index ${this.persistPath}: unexpected shape`);
      return;
    }
    if (parsed.embeddingModel !== this.embedder.model) {
      console.warn(
        `[VectorStore] Index was built with ${parsed.embeddingModel}, current model is ${this.embedder.model}; starting empty`,
      );
      return;
    }
    this.catalog = parsed.catalog;
    this.content = parsed.content;
    console.log(`[VectorStore] Loaded ${this.catalog.length} courses, ${this.content.length} chunks`);
  }

  async upsertCatalog(course: Course): Promise<void> {
    const embedding = await this.embedder.embed(course.title);
    const record: IndexRecord<CatalogMetadata> = {
      id: course.title,
      document: course.title,
      metadata: {
        title: course.title,
        instructor: course.instructor,
        courseLink: course.courseLink,
        lessons: course.lessons.map((l) => ({ ...l })),
      },
      embedding,
    };
    this.catalog = [...this.catalog.filter((r) => r.id !== record.id), record];
    await this.persist();
  }

  async upsertContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const embeddings = await this.embedder.embedMany(chunks.map((c) => c.content));
    const records = chunks.map((chunk, i): IndexRecord<ContentRecordMetadata> => ({
      id: chunkRecordId(chunk),
      document: chunk.content,
      metadata: {
        courseTitle: chunk.courseTitle,
        lessonNumber: chunk.lessonNumber,
        chunkIndex: chunk.chunkIndex,
      },
      embedding: embeddings[i],
    }));
    const replaced = new Set(records.map((r) => r.id));
    this.content = [...this.content.filter((r) => !replaced.has(r.id)), ...records];
    await this.persist();
  }

  async removeCourseContent(title: string): Promise<void> {
    const before = this.content.length;
    this.content = this.content.filter((r) => r.metadata.courseTitle !== title);
    if (this.content.length === before) return;
    await this.persist();
  }

  async queryCatalog(nameHint: string): Promise<CatalogMatch | null> {
    if (this.catalog.length === 0) return null;
    try {
      const queryEmbedding = await this.embedder.embed(nameHint);
      let best: CatalogMatch | null = null;
      for (const record of this.catalog) {
        const distance = cosineDistance(queryEmbedding, record.embedding);
        if (!best || distance < best.distance) {
          best = { title: record.metadata.title, metadata: record.metadata, distance };
        }
      }
      return best;
    } catch (e) {
      console.warn(`[VectorStore] Course name resolution failed for "${nameHint}":`, errorMessage(e));
      return null;
    }
  }

  async queryContent(queryText: string, filter?: ContentFilter, limit?: number): Promise<SearchResults> {
    try {
      const queryEmbedding = await this.embedder.embed(queryText);
      const hits = this.content
        .filter((r) => matchesFilter(r.metadata, filter))
        .map((r) => ({ record: r, distance: cosineDistance(queryEmbedding, r.embedding) }))
        .sort((a, b) => a.distance - b.distance)
        .slice(0, limit ?? this.maxResults);

      return new SearchResults(
        hits.map((h) => h.record.document),
        hits.map((h) => ({ ...h.record.metadata })),
        hits.map((h) => h.distance),
      );
    } catch (e) {
      return SearchResults.empty(`Search error: ${errorMessage(e)}`);
    }
  }

  async clear(): Promise<void> {
    this.catalog = [];
    this.content = [];
    await this.persist();
    console.log("[VectorStore] Cleared catalog and content");
  }

  async countCourses(): Promise<number> {
    return this.catalog.length;
  }

  async listTitles(): Promise<string[]> {
    return this.catalog.map((r) => r.metadata.title);
  }

  async listAllCatalogMetadata(): Promise<CatalogMetadata[]> {
    return this.catalog.map((r) => r.metadata);
  }

  async getCatalogEntry(title: string): Promise<CatalogMetadata | null> {
    return this.catalog.find((r) => r.id === title)?.metadata ?? null;
  }

  async getCourseLink(title: string): Promise<string | null> {
    return (await this.getCatalogEntry(title))?.courseLink ?? null;
  }

  async getLessonLink(title: string, lessonNumber: number): Promise<string | null> {
    const entry = await this.getCatalogEntry(title);
    const lesson = entry?.lessons.find((l) => l.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  private async persist(): Promise<void> {
    if (!this.persistPath) return;
    const snapshot: IndexSnapshot = {
      version: 1,
      embeddingModel: this.embedder.model,
      catalog: this.catalog,
      content: this.content,
    };
    await fs.mkdir(path.dirname(this.persistPath), { recursive: true });
    await fs.writeFile(this.persistPath, JSON.stringify(snapshot), "utf8");
  }
}

// ─── Helpers ───────────────────────────────────────────────

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRecordList(value: unknown, isMetadata: (meta: Record<string, unknown>) => boolean): boolean {
  return (
    Array.isArray(value) &&
    value.every((r: unknown) => {
      if (!isObject(r)) return false;
      return (
        typeof r.id === "string" &&
        typeof r.document === "string" &&
        isObject(r.metadata) &&
        isMetadata(r.metadata) &&
        Array.isArray(r.embedding)
      );
    })
  );
}

function isSnapshot(value: unknown): value is IndexSnapshot {
  return (
    isObject(value) &&
    value.version === 1 &&
    typeof value.embeddingModel === "string" &&
    isRecordList(value.catalog, (m) => typeof m.title === "string" && Array.isArray(m.lessons)) &&
    isRecordList(value.content, (m) => typeof m.courseTitle === "string" && typeof m.chunkIndex === "number")
  );
}
