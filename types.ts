// ─── Course Data ───────────────────────────────────────────

export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string;
}

export interface Course {
  /** Unique across the catalog; re-ingesting a title overwrites it. */
  title: string;
  instructor?: string;
  courseLink?: string;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

// ─── Index Records ─────────────────────────────────────────

export interface CatalogMetadata {
  title: string;
  instructor?: string;
  courseLink?: string;
  lessons: Lesson[];
}

/** Metadata returned with a content hit. Fields may be missing on foreign records. */
export interface ChunkMetadata {
  courseTitle?: string;
  lessonNumber?: number;
  chunkIndex?: number;
}

export type MetadataPredicate = { courseTitle: string } | { lessonNumber: number };

export type ContentFilter = MetadataPredicate | { $and: MetadataPredicate[] };

export interface CatalogMatch {
  title: string;
  metadata: CatalogMetadata;
  distance: number;
}

// ─── Retrieval ─────────────────────────────────────────────

export interface Source {
  label: string;
  url: string | null;
}

export type RetrievalOutcome =
  | { kind: "results"; text: string; sources: Source[] }
  | { kind: "empty"; text: string }
  | { kind: "error"; text: string };

// ─── Tools ─────────────────────────────────────────────────

export type ToolArgs = Record<string, unknown>;

export interface ToolParameter {
  type: "string" | "integer";
  description: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, ToolParameter>;
    required: string[];
  };
}

export interface ToolOutcome {
  text: string;
  /** Present only when the tool performed a retrieval. */
  sources?: Source[];
}

// ─── Dialogue ──────────────────────────────────────────────

export interface ToolCallBlock {
  type: "tool_call";
  id: string;
  name: string;
  args: ToolArgs;
}

export type AssistantBlock = { type: "text"; text: string } | ToolCallBlock;

export interface ToolResultBlock {
  type: "tool_result";
  callId: string;
  toolName: string;
  content: string;
}

export type ChatMessage =
  | { role: "user"; content: string | ToolResultBlock[] }
  | { role: "assistant"; content: AssistantBlock[] };

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  tools?: ToolDefinition[];
}

export type BackendReply =
  | { kind: "text"; text: string }
  | { kind: "tool_use"; content: AssistantBlock[] };

export interface LlmBackend {
  readonly model: string;
  complete(request: CompletionRequest): Promise<BackendReply>;
}

export interface QueryResponse {
  answer: string;
  sources: Source[];
  sessionId: string;
}
