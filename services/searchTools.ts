import { OUTLINE_TOOL_NAME, SEARCH_TOOL_NAME } from "../constants";
import type { Source, ToolArgs, ToolDefinition, ToolOutcome } from "../types";
import { courseNotFoundMessage, type CourseRetriever } from "./courseSearch";
import { errorMessage } from "./vectorStore";

export interface CourseTool {
  readonly definition: ToolDefinition;
  execute(args: ToolArgs): Promise<ToolOutcome>;
}

// ─── Argument Helpers ──────────────────────────────────────

const optionalString = (value: unknown): string | undefined | null => {
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : null;
};

/** Accepts integers and integer strings; `null` marks an invalid value. */
const optionalInteger = (value: unknown): number | undefined | null => {
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof parsed === "number" && Number.isInteger(parsed) ? parsed : null;
};

// ─── Content Search Tool ───────────────────────────────────

export class CourseSearchTool implements CourseTool {
  readonly definition: ToolDefinition = {
    name: SEARCH_TOOL_NAME,
    description: "Search course materials with smart course name matching and lesson filtering",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "What to search for in the course content" },
        course_name: {
          type: "string",
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
        lesson_number: { type: "integer", description: "Specific lesson number to search within (e.g. 1, 2, 3)" },
      },
      required: ["query"],
    },
  };

  constructor(private readonly retriever: CourseRetriever) {}

  async execute(args: ToolArgs): Promise<ToolOutcome> {
    const query = args.query;
    const courseName = optionalString(args.course_name);
    const lessonNumber = optionalInteger(args.lesson_number);
    if (typeof query !== "string" || query.trim() === "") {
      return { text: "Invalid arguments: 'query' must be a non-empty string.", sources: [] };
    }
    if (courseName === null) {
      return { text: "Invalid arguments: 'course_name' must be a string.", sources: [] };
    }
    if (lessonNumber === null) {
      return { text: "Invalid arguments: 'lesson_number' must be an integer.", sources: [] };
    }

    const outcome = await this.retriever.search(query, courseName, lessonNumber);
    return outcome.kind === "results"
      ? { text: outcome.text, sources: outcome.sources }
      : { text: outcome.text, sources: [] };
  }
}

// ─── Course Outline Tool ───────────────────────────────────

export class CourseOutlineTool implements CourseTool {
  readonly definition: ToolDefinition = {
    name: OUTLINE_TOOL_NAME,
    description: "Get a course outline: title, course link, instructor and the complete lesson list",
    parameters: {
      type: "object",
      properties: {
        course_name: {
          type: "string",
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
      },
      required: ["course_name"],
    },
  };

  constructor(private readonly retriever: CourseRetriever) {}

  async execute(args: ToolArgs): Promise<ToolOutcome> {
    const courseName = args.course_name;
    if (typeof courseName !== "string" || courseName.trim() === "") {
      return { text: "Invalid arguments: 'course_name' must be a non-empty string." };
    }

    const match = await this.retriever.resolveCourse(courseName);
    if (!match) return { text: courseNotFoundMessage(courseName) };

    const { metadata } = match;
    const lessons = [...metadata.lessons].sort((a, b) => a.lessonNumber - b.lessonNumber);
    const lines = [
      `Course Title: ${metadata.title}`,
      `Course Link: ${metadata.courseLink ?? "N/A"}`,
      `Course Instructor: ${metadata.instructor ?? "N/A"}`,
      "",
      `Lessons (${lessons.length} total):`,
      ...lessons.map((l) => `Lesson ${l.lessonNumber}: ${l.title}`),
    ];
    return { text: lines.join("\n") };
  }
}

// ─── Tool Registry ─────────────────────────────────────────

export class ToolManager {
  private readonly tools = new Map<string, CourseTool>();
  private sources: Source[] = [];

  register(tool: CourseTool): void {
    this.tools.set(tool.definition.name, tool);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  /** Never rejects: unknown tools and tool failures come back as text for the model. */
  async invoke(name: string, args: ToolArgs = {}): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) return { text: `Tool '${name}' not found` };

    let outcome: ToolOutcome;
    try {
      outcome = await tool.execute(args);
    } catch (e) {
      console.warn(`[Tools] ${name} failed:`, errorMessage(e));
      return { text: `Tool '${name}' failed: ${errorMessage(e)}` };
    }
    if (outcome.sources !== undefined) this.sources = outcome.sources;
    return outcome;
  }

  lastSources(): Source[] {
    return this.sources;
  }

  resetSources(): void {
    this.sources = [];
  }
}
