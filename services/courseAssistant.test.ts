import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SEARCH_TOOL_NAME } from "../constants";
import type { BackendReply, CourseChunk } from "../types";
import { CourseAssistant } from "./courseAssistant";
import { DocumentProcessor } from "./documentProcessor";
import { ScriptedBackend, createIndex, seededIndex } from "./testFixtures";
import type { CourseIndex } from "./vectorStore";

const introDocument = [
  "Course Title: Test Course: Introduction to AI",
  "Course Link: https://example.com/course",
  "Course Instructor: Test Instructor",
  "",
  "Lesson 0: Introduction",
  "Lesson Link: https://example.com/lesson/0",
  "This is the introduction to artificial intelligence.",
  "",
  "Lesson 1: Basics",
  "Lesson Link: https://example.com/lesson/1",
  "Here we cover the basic concepts of machine learning.",
].join("\n");

const mcpDocument = [
  "Course Title: Building with MCP Servers",
  "Course Instructor: Another Instructor",
  "",
  "Lesson 1: Servers",
  "MCP servers expose tools to models.",
].join("\n");

const searchLessonOne: BackendReply = {
  kind: "tool_use",
  content: [
    {
      type: "tool_call",
      id: "call_1",
      name: SEARCH_TOOL_NAME,
      args: { query: "learning", course_name: "Introduction", lesson_number: 1 },
    },
  ],
};

function createAssistant(index: CourseIndex, replies: BackendReply[] = []) {
  const backend = new ScriptedBackend(replies);
  const assistant = new CourseAssistant({
    index,
    backend,
    processor: new DocumentProcessor(800, 100),
    maxHistory: 2,
  });
  return { assistant, backend };
}

let dir: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "course-assistant-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("CourseAssistant ingestion", () => {
  it("indexes a single course document", async () => {
    const file = path.join(dir, "course1.txt");
    await fs.writeFile(file, introDocument, "utf8");
    const { assistant } = createAssistant(createIndex());

    const result = await assistant.ingest(file);

    expect(result.course?.title).toBe("Test Course: Introduction to AI");
    expect(result.chunkCount).toBe(2);
    expect(await assistant.getCourseAnalytics()).toEqual({
      totalCourses: 1,
      courseTitles: ["Test Course: Introduction to AI"],
    });
  });

  it("skips a missing or malformed document", async () => {
    const bad = path.join(dir, "bad.txt");
    await fs.writeFile(bad, "no header here", "utf8");
    const { assistant } = createAssistant(createIndex());

    expect(await assistant.ingest(bad)).toEqual({ course: null, chunkCount: 0 });
    expect(await assistant.ingest(path.join(dir, "missing.txt"))).toEqual({ course: null, chunkCount: 0 });
    expect(await assistant.getCourseAnalytics()).toEqual({ totalCourses: 0, courseTitles: [] });
  });

  it("loads a folder once and skips titles already indexed", async () => {
    await fs.writeFile(path.join(dir, "course1.txt"), introDocument, "utf8");
    await fs.writeFile(path.join(dir, "course2.md"), mcpDocument, "utf8");
    await fs.writeFile(path.join(dir, "bad.txt"), "no header here", "utf8");
    await fs.writeFile(path.join(dir, "notes.json"), "{}", "utf8");
    const { assistant } = createAssistant(createIndex());

    expect(await assistant.ingestFolder(dir)).toEqual({ coursesAdded: 2, chunksAdded: 3 });
    expect(await assistant.ingestFolder(dir)).toEqual({ coursesAdded: 0, chunksAdded: 0 });
    expect((await assistant.getCourseAnalytics()).courseTitles).toEqual([
      "Test Course: Introduction to AI",
      "Building with MCP Servers",
    ]);
  });

  it("rebuilds from scratch when asked to clear", async () => {
    await fs.writeFile(path.join(dir, "course1.txt"), introDocument, "utf8");
    const { assistant } = createAssistant(createIndex());
    await assistant.ingestFolder(dir);

    expect(await assistant.ingestFolder(dir, true)).toEqual({ coursesAdded: 1, chunksAdded: 2 });
    expect((await assistant.getCourseAnalytics()).totalCourses).toBe(1);
  });

  it("drops chunks of an earlier version when a course is re-ingested", async () => {
    const file = path.join(dir, "courseA.txt");
    await fs.writeFile(file, "Course Title: Course A\nLesson 0: One\nOld zebra one.\nLesson 1: Two\nOld zebra two.", "utf8");
    const index = createIndex();
    const { assistant } = createAssistant(index);
    expect((await assistant.ingest(file)).chunkCount).toBe(2);

    await fs.writeFile(file, "Course Title: Course A\nLesson 0: One\nNew zebra one.", "utf8");
    expect((await assistant.ingest(file)).chunkCount).toBe(1);

    const results = await index.queryContent("zebra", { courseTitle: "Course A" });
    expect(results.documents).toEqual(["New zebra one."]);
    expect((await assistant.getCourseAnalytics()).totalCourses).toBe(1);
  });

  it("reports nothing added for an unreadable folder", async () => {
    const { assistant } = createAssistant(createIndex());
    expect(await assistant.ingestFolder(path.join(dir, "absent"))).toEqual({ coursesAdded: 0, chunksAdded: 0 });
  });

  it("stores chunks with their lesson metadata", async () => {
    const file = path.join(dir, "course2.md");
    await fs.writeFile(file, mcpDocument, "utf8");
    const index = createIndex();
    const upsert = vi.spyOn(index, "upsertContent");
    const { assistant } = createAssistant(index);

    await assistant.ingest(file);

    const expected: CourseChunk[] = [
      { content: "MCP servers expose tools to models.", courseTitle: "Building with MCP Servers", lessonNumber: 1, chunkIndex: 0 },
    ];
    expect(upsert).toHaveBeenCalledWith(expected);
  });
});

describe("CourseAssistant queries", () => {
  it("answers with sources and a new session id", async () => {
    const { assistant, backend } = createAssistant(await seededIndex(), [
      searchLessonOne,
      { kind: "text", text: "Lesson 1 covers machine learning basics." },
    ]);

    const response = await assistant.query("What does lesson 1 of the intro course cover?");

    expect(response.answer).toBe("Lesson 1 covers machine learning basics.");
    expect(response.sources).toEqual([
      { label: "Test Course: Introduction to AI - Lesson 1", url: "https://example.com/lesson/1" },
    ]);
    expect(assistant.sessions.has(response.sessionId)).toBe(true);
    expect(assistant.toolManager.lastSources()).toEqual([]);
    expect(backend.requests[0].tools?.map((t) => t.name)).toEqual(["search_course_content", "get_course_outline"]);
  });

  it("carries history into the next turn of a session", async () => {
    const { assistant, backend } = createAssistant(await seededIndex(), [
      { kind: "text", text: "Hello there." },
      { kind: "text", text: "Machine learning is covered in lesson 1." },
    ]);

    const first = await assistant.query("Hi");
    const second = await assistant.query("Where is machine learning covered?", first.sessionId);

    expect(second.sessionId).toBe(first.sessionId);
    expect(second.sources).toEqual([]);
    expect(backend.requests[0].system).not.toContain("Previous conversation:");
    expect(backend.requests[1].system).toContain("Previous conversation:\nUser: Hi\nAssistant: Hello there.");
  });

  it("clears tool sources when a query fails", async () => {
    const { assistant } = createAssistant(await seededIndex(), [searchLessonOne]);

    await expect(assistant.query("What does lesson 1 cover?")).rejects.toThrow("ScriptedBackend ran out of replies");
    expect(assistant.toolManager.lastSources()).toEqual([]);
  });

  it("does not record a turn that failed", async () => {
    const { assistant } = createAssistant(await seededIndex(), []);
    const sessionId = assistant.sessions.create();

    await expect(assistant.query("Hi", sessionId)).rejects.toThrow("ScriptedBackend ran out of replies");
    expect(assistant.sessions.render(sessionId)).toBe("");
  });
});
