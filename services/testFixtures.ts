import type { BackendReply, CompletionRequest, Course, CourseChunk, LlmBackend } from "../types";
import { HashingEmbedder } from "./embeddings";
import { InMemoryCourseIndex } from "./vectorStore";

// Shared course data for the service tests.

export const introCourse: Course = {
  title: "Test Course: Introduction to AI",
  courseLink: "https://example.com/course",
  instructor: "Test Instructor",
  lessons: [
    { lessonNumber: 0, title: "Introduction", lessonLink: "https://example.com/lesson/0" },
    { lessonNumber: 1, title: "Basics", lessonLink: "https://example.com/lesson/1" },
    { lessonNumber: 2, title: "Advanced Topics" },
  ],
};

export const mcpCourse: Course = {
  title: "Building with MCP Servers",
  instructor: "Another Instructor",
  lessons: [{ lessonNumber: 1, title: "Servers" }],
};

export const introChunks: CourseChunk[] = [
  { content: "This is the introduction to artificial intelligence.", courseTitle: introCourse.title, lessonNumber: 0, chunkIndex: 0 },
  { content: "Here we cover the basic concepts of machine learning.", courseTitle: introCourse.title, lessonNumber: 1, chunkIndex: 1 },
  { content: "Advanced topics include deep learning and neural networks.", courseTitle: introCourse.title, lessonNumber: 2, chunkIndex: 2 },
];

export const mcpChunks: CourseChunk[] = [
  { content: "MCP servers expose tools to models.", courseTitle: mcpCourse.title, lessonNumber: 1, chunkIndex: 0 },
];

export const createIndex = (persistPath?: string) =>
  new InMemoryCourseIndex({ embedder: new HashingEmbedder(), maxResults: 5, persistPath });

export async function seededIndex(): Promise<InMemoryCourseIndex> {
  const index = createIndex();
  await index.upsertCatalog(introCourse);
  await index.upsertCatalog(mcpCourse);
  await index.upsertContent([...introChunks, ...mcpChunks]);
  return index;
}

/** Replays canned replies in order and records every request it receives. */
export class ScriptedBackend implements LlmBackend {
  readonly model = "scripted";
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: BackendReply[]) {}

  async complete(request: CompletionRequest): Promise<BackendReply> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) throw new Error("ScriptedBackend ran out of replies");
    return reply;
  }
}
