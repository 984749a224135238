import fs from "fs/promises";
import path from "path";
import type { AppConfig } from "../config";
import { COURSE_FILE_EXTENSIONS } from "../constants";
import type { Course, CourseChunk, LlmBackend, QueryResponse } from "../types";
import { AIGenerator, type GeneratedResponse } from "./aiGenerator";
import { CourseRetriever } from "./courseSearch";
import { DocumentError, DocumentProcessor, type ParsedCourseDocument } from "./documentProcessor";
import { GeminiEmbedder, HashingEmbedder, type Embedder } from "./embeddings";
import { GeminiBackend } from "./geminiService";
import { OpenAICompatibleBackend } from "./internalModelService";
import { CourseOutlineTool, CourseSearchTool, ToolManager } from "./searchTools";
import { SessionManager } from "./sessionManager";
import { errorMessage, InMemoryCourseIndex, type CourseIndex } from "./vectorStore";

export interface CourseAssistantDeps {
  index: CourseIndex;
  backend: LlmBackend;
  processor: DocumentProcessor;
  maxHistory: number;
  maxResults?: number;
  maxCourseDistance?: number;
}

export interface IngestResult {
  course: Course | null;
  chunkCount: number;
}

export interface FolderIngestResult {
  coursesAdded: number;
  chunksAdded: number;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export function createEmbedder(config: AppConfig): Embedder {
  if (!config.geminiApiKey) {
    console.warn("[Embeddings] No Gemini API key found, using local hashing embeddings");
    return new HashingEmbedder();
  }
  return new GeminiEmbedder(config.geminiApiKey, config.embeddingModel);
}

export function createBackend(config: AppConfig): LlmBackend {
  if (config.llmProvider === "openai-compatible") {
    return new OpenAICompatibleBackend({
      ...config.openaiCompatible,
      maxOutputTokens: config.maxOutputTokens,
    });
  }
  return new GeminiBackend({
    apiKey: config.geminiApiKey,
    model: config.chatModel,
    maxOutputTokens: config.maxOutputTokens,
  });
}

/** Composition root: ingestion into the index, and tool-augmented question answering. */
export class CourseAssistant {
  readonly index: CourseIndex;
  readonly toolManager = new ToolManager();
  readonly sessions: SessionManager;
  private readonly generator: AIGenerator;
  private readonly processor: DocumentProcessor;

  constructor(deps: CourseAssistantDeps) {
    this.index = deps.index;
    this.processor = deps.processor;
    this.sessions = new SessionManager(deps.maxHistory);
    this.generator = new AIGenerator(deps.backend);

    const retriever = new CourseRetriever(deps.index, {
      limit: deps.maxResults,
      maxCourseDistance: deps.maxCourseDistance,
    });
    this.toolManager.register(new CourseSearchTool(retriever));
    this.toolManager.register(new CourseOutlineTool(retriever));
  }

  static async create(config: AppConfig): Promise<CourseAssistant> {
    const index = new InMemoryCourseIndex({
      embedder: createEmbedder(config),
      maxResults: config.maxResults,
      persistPath: config.indexPath || undefined,
    });
    await index.load();
    return new CourseAssistant({
      index,
      backend: createBackend(config),
      processor: new DocumentProcessor(config.chunkSize, config.chunkOverlap),
      maxHistory: config.maxHistory,
      maxResults: config.maxResults,
      maxCourseDistance: config.maxCourseDistance,
    });
  }

  // ─── Ingestion ───────────────────────────────────────────

  async ingest(filePath: string): Promise<IngestResult> {
    try {
      const { course, chunks } = await this.processor.processFile(filePath);
      await this.store(course, chunks);
      return { course, chunkCount: chunks.length };
    } catch (e) {
      if (!(e instanceof DocumentError)) throw e;
      console.warn(`[Ingest] Skipping ${filePath}: ${e.message}`);
      return { course: null, chunkCount: 0 };
    }
  }

  async ingestFolder(folderPath: string, clearExisting = false): Promise<FolderIngestResult> {
    if (clearExisting) {
      await this.index.clear();
    }

    let entries: string[];
    try {
      entries = await fs.readdir(folderPath);
    } catch (e) {
      console.warn(`[Ingest] Folder ${folderPath} is not readable: ${errorMessage(e)}`);
      return { coursesAdded: 0, chunksAdded: 0 };
    }

    const existing = new Set(await this.index.listTitles());
    const files = entries
      .filter((name) => COURSE_FILE_EXTENSIONS.includes(path.extname(name).toLowerCase()))
      .sort();

    let coursesAdded = 0;
    let chunksAdded = 0;
    for (const name of files) {
      const filePath = path.join(folderPath, name);
      let parsed: ParsedCourseDocument;
      try {
        parsed = await this.processor.processFile(filePath);
      } catch (e) {
        if (!(e instanceof DocumentError)) throw e;
        console.warn(`[Ingest] Skipping ${filePath}: ${e.message}`);
        continue;
      }

      const { course, chunks } = parsed;
      if (existing.has(course.title)) {
        console.log(`[Ingest] "${course.title}" already indexed, skipping`);
        continue;
      }
      await this.store(course, chunks);
      existing.add(course.title);
      coursesAdded++;
      chunksAdded += chunks.length;
    }

    return { coursesAdded, chunksAdded };
  }

  // Chunks left from an earlier version of the course are dropped first.
  private async store(course: Course, chunks: CourseChunk[]): Promise<void> {
    await this.index.upsertCatalog(course);
    await this.index.removeCourseContent(course.title);
    await this.index.upsertContent(chunks);
    console.log(`[Ingest] Added "${course.title}" - ${chunks.length} chunks`);
  }

  // ─── Querying ────────────────────────────────────────────

  async query(text: string, sessionId?: string): Promise<QueryResponse> {
    const id = sessionId ?? this.sessions.create();
    const history = this.sessions.render(id);

    let generated: GeneratedResponse;
    try {
      generated = await this.generator.generateResponse({
        query: text,
        history: history || undefined,
        tools: this.toolManager.definitions(),
        toolManager: this.toolManager,
      });
    } finally {
      this.toolManager.resetSources();
    }
    const { answer, sources } = generated;

    this.sessions.append(id, text, answer);
    return { answer, sources, sessionId: id };
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    return {
      totalCourses: await this.index.countCourses(),
      courseTitles: await this.index.listTitles(),
    };
  }
}
