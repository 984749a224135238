import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { OUTLINE_TOOL_NAME, SEARCH_TOOL_NAME } from "../constants";
import { CourseRetriever } from "./courseSearch";
import { CourseOutlineTool, CourseSearchTool, ToolManager, type CourseTool } from "./searchTools";
import { createIndex, introCourse, seededIndex } from "./testFixtures";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

const lessonOneHit = "[Test Course: Introduction to AI - Lesson 1]\nHere we cover the basic concepts of machine learning.";
const lessonOneSource = { label: "Test Course: Introduction to AI - Lesson 1", url: "https://example.com/lesson/1" };

describe("CourseSearchTool", () => {
  it("declares query as its only required parameter", () => {
    const tool = new CourseSearchTool(new CourseRetriever(createIndex()));

    expect(tool.definition.name).toBe("search_course_content");
    expect(Object.keys(tool.definition.parameters.properties)).toEqual(["query", "course_name", "lesson_number"]);
    expect(tool.definition.parameters.properties.lesson_number.type).toBe("integer");
    expect(tool.definition.parameters.required).toEqual(["query"]);
  });

  it("returns formatted hits and their sources", async () => {
    const tool = new CourseSearchTool(new CourseRetriever(await seededIndex()));
    const outcome = await tool.execute({ query: "learning", course_name: "Introduction", lesson_number: 1 });

    expect(outcome).toEqual({ text: lessonOneHit, sources: [lessonOneSource] });
  });

  it("accepts a lesson number sent as a string", async () => {
    const tool = new CourseSearchTool(new CourseRetriever(await seededIndex()));
    const outcome = await tool.execute({ query: "learning", course_name: "Introduction", lesson_number: "1" });

    expect(outcome.text).toBe(lessonOneHit);
  });

  it("clears sources when nothing matches", async () => {
    const tool = new CourseSearchTool(new CourseRetriever(await seededIndex()));

    expect(await tool.execute({ query: "anything", course_name: "MCP", lesson_number: 5 })).toEqual({
      text: "No relevant content found in course 'Building with MCP Servers' in lesson 5.",
      sources: [],
    });
  });

  it("reports an unknown course on an empty catalog", async () => {
    const tool = new CourseSearchTool(new CourseRetriever(createIndex()));

    expect(await tool.execute({ query: "anything", course_name: "Foo" })).toEqual({
      text: "No course found matching 'Foo'.",
      sources: [],
    });
  });

  it("rejects malformed arguments", async () => {
    const tool = new CourseSearchTool(new CourseRetriever(createIndex()));

    expect((await tool.execute({})).text).toBe("Invalid arguments: 'query' must be a non-empty string.");
    expect((await tool.execute({ query: "x", course_name: 3 })).text).toBe(
      "Invalid arguments: 'course_name' must be a string.",
    );
    expect((await tool.execute({ query: "x", lesson_number: 1.5 })).text).toBe(
      "Invalid arguments: 'lesson_number' must be an integer.",
    );
  });
});

describe("CourseOutlineTool", () => {
  it("lists the course header and lessons in order", async () => {
    const index = createIndex();
    await index.upsertCatalog({ ...introCourse, lessons: [...introCourse.lessons].reverse() });
    const outcome = await new CourseOutlineTool(new CourseRetriever(index)).execute({ course_name: "Introduction" });

    expect(outcome.text).toBe(
      [
        "Course Title: Test Course: Introduction to AI",
        "Course Link: https://example.com/course",
        "Course Instructor: Test Instructor",
        "",
        "Lessons (3 total):",
        "Lesson 0: Introduction",
        "Lesson 1: Basics",
        "Lesson 2: Advanced Topics",
      ].join("\n"),
    );
    expect(outcome.sources).toBeUndefined();
  });

  it("prints N/A for a missing course link", async () => {
    const outcome = await new CourseOutlineTool(new CourseRetriever(await seededIndex())).execute({ course_name: "MCP" });

    expect(outcome.text.split("\n").slice(0, 3)).toEqual([
      "Course Title: Building with MCP Servers",
      "Course Link: N/A",
      "Course Instructor: Another Instructor",
    ]);
  });

  it("applies the same distance cutoff as content search", async () => {
    const retriever = new CourseRetriever(await seededIndex(), { maxCourseDistance: 0.1 });

    expect(await new CourseOutlineTool(retriever).execute({ course_name: "Cooking Pasta" })).toEqual({
      text: "No course found matching 'Cooking Pasta'.",
    });
    expect(await new CourseSearchTool(retriever).execute({ query: "anything", course_name: "Cooking Pasta" })).toEqual({
      text: "No course found matching 'Cooking Pasta'.",
      sources: [],
    });
  });

  it("reports an unknown course", async () => {
    expect(await new CourseOutlineTool(new CourseRetriever(createIndex())).execute({ course_name: "Foo" })).toEqual({
      text: "No course found matching 'Foo'.",
    });
  });
});

describe("ToolManager", () => {
  async function createManager(): Promise<ToolManager> {
    const retriever = new CourseRetriever(await seededIndex());
    const manager = new ToolManager();
    manager.register(new CourseSearchTool(retriever));
    manager.register(new CourseOutlineTool(retriever));
    return manager;
  }

  it("lists the definitions of registered tools", async () => {
    const manager = await createManager();
    expect(manager.definitions().map((d) => d.name)).toEqual([SEARCH_TOOL_NAME, OUTLINE_TOOL_NAME]);
  });

  it("reports an unknown tool as text", async () => {
    const manager = await createManager();
    expect(await manager.invoke("nope", {})).toEqual({ text: "Tool 'nope' not found" });
  });

  it("turns a throwing tool into text", async () => {
    const broken: CourseTool = {
      definition: {
        name: "broken",
        description: "Always fails",
        parameters: { type: "object", properties: {}, required: [] },
      },
      execute: async () => {
        throw new Error("kaput");
      },
    };
    const manager = new ToolManager();
    manager.register(broken);

    expect(await manager.invoke("broken")).toEqual({ text: "Tool 'broken' failed: kaput" });
  });

  it("keeps the sources of the last search until reset", async () => {
    const manager = await createManager();
    await manager.invoke(SEARCH_TOOL_NAME, { query: "learning", course_name: "Introduction", lesson_number: 1 });
    expect(manager.lastSources()).toEqual([lessonOneSource]);

    await manager.invoke(OUTLINE_TOOL_NAME, { course_name: "MCP" });
    expect(manager.lastSources()).toEqual([lessonOneSource]);

    manager.resetSources();
    expect(manager.lastSources()).toEqual([]);
  });

  it("replaces sources with an empty list after a fruitless search", async () => {
    const manager = await createManager();
    await manager.invoke(SEARCH_TOOL_NAME, { query: "learning", course_name: "Introduction", lesson_number: 1 });
    await manager.invoke(SEARCH_TOOL_NAME, { query: "anything", course_name: "MCP", lesson_number: 5 });

    expect(manager.lastSources()).toEqual([]);
  });
});
