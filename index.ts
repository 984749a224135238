export { loadConfig, type AppConfig, type LlmProvider } from "./config";
export { SYSTEM_PROMPT, SEARCH_TOOL_NAME, OUTLINE_TOOL_NAME } from "./constants";
export * from "./types";
export { AIGenerator, buildSystemPrompt, type GeneratedResponse, type GenerateOptions } from "./services/aiGenerator";
export {
  CourseAssistant,
  createBackend,
  createEmbedder,
  type CourseAnalytics,
  type FolderIngestResult,
  type IngestResult,
} from "./services/courseAssistant";
export { CourseRetriever, emptyResultMessage } from "./services/courseSearch";
export { DocumentError, DocumentProcessor, chunkText, parseCourseDocument } from "./services/documentProcessor";
export { GeminiEmbedder, HashingEmbedder, type Embedder } from "./services/embeddings";
export { GeminiBackend } from "./services/geminiService";
export { OpenAICompatibleBackend } from "./services/internalModelService";
export { CourseOutlineTool, CourseSearchTool, ToolManager, type CourseTool } from "./services/searchTools";
export { SessionManager, type Exchange } from "./services/sessionManager";
export {
  InMemoryCourseIndex,
  SearchResults,
  buildContentFilter,
  type CourseIndex,
} from "./services/vectorStore";
