import fs from "fs/promises";
import type { Course, CourseChunk, Lesson } from "../types";

export type DocumentErrorKind = "not_found" | "malformed";

export class DocumentError extends Error {
  constructor(
    readonly kind: DocumentErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "DocumentError";
  }
}

export interface ParsedCourseDocument {
  course: Course;
  chunks: CourseChunk[];
}

// ─── Chunking ──────────────────────────────────────────────

/**
 * Sentence-based chunking. Each chunk holds whole sentences up to `chunkSize`
 * characters; the next chunk restarts with the trailing sentences of the
 * previous one that fit in `chunkOverlap` characters.
 */
export function chunkText(text: string, chunkSize: number, chunkOverlap: number): string[] {
  const sentences = text
    .replace(/\s+/g, " ")
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter((s) => s.length > 0);

  const chunks: string[] = [];
  let start = 0;
  while (start < sentences.length) {
    let end = start;
    let size = 0;
    while (end < sentences.length) {
      const added = sentences[end].length + (end > start ? 1 : 0);
      if (end > start && size + added > chunkSize) break;
      size += added;
      end++;
    }
    chunks.push(sentences.slice(start, end).join(" "));
    if (end >= sentences.length) break;

    // Always advance by at least one sentence.
    let next = end;
    let overlap = 0;
    while (next - 1 > start) {
      const len = sentences[next - 1].length + 1;
      if (overlap + len > chunkOverlap) break;
      overlap += len;
      next--;
    }
    start = next;
  }
  return chunks;
}

// ─── Parsing ───────────────────────────────────────────────

const TITLE_RE = /^Course Title:\s*(.+)$/i;
const COURSE_LINK_RE = /^Course Link:\s*(.+)$/i;
const INSTRUCTOR_RE = /^Course Instructor:\s*(.+)$/i;
const LESSON_RE = /^Lesson\s+(\d+):\s*(.+)$/i;
const LESSON_LINK_RE = /^Lesson Link:\s*(.+)$/i;

interface LessonDraft {
  lesson?: Lesson;
  lines: string[];
}

export function parseCourseDocument(text: string, chunkSize: number, chunkOverlap: number): ParsedCourseDocument {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  let cursor = 0;
  while (cursor < lines.length && lines[cursor].trim() === "") cursor++;

  const titleMatch = TITLE_RE.exec(lines[cursor]?.trim() ?? "");
  if (!titleMatch) {
    throw new DocumentError("malformed", "Missing 'Course Title:' header line");
  }
  const course: Course = { title: titleMatch[1].trim(), lessons: [] };
  cursor++;

  // Header lines may appear in any order before the first lesson marker.
  for (; cursor < lines.length; cursor++) {
    const line = lines[cursor].trim();
    if (line === "") continue;
    const link = COURSE_LINK_RE.exec(line);
    const instructor = INSTRUCTOR_RE.exec(line);
    if (link) course.courseLink = link[1].trim();
    else if (instructor) course.instructor = instructor[1].trim();
    else break;
  }

  const drafts: LessonDraft[] = [{ lines: [] }];
  for (; cursor < lines.length; cursor++) {
    const line = lines[cursor].trim();
    const marker = LESSON_RE.exec(line);
    if (marker) {
      const lesson: Lesson = { lessonNumber: Number(marker[1]), title: marker[2].trim() };
      const linkLine = LESSON_LINK_RE.exec(lines[cursor + 1]?.trim() ?? "");
      if (linkLine) {
        lesson.lessonLink = linkLine[1].trim();
        cursor++;
      }
      course.lessons.push(lesson);
      drafts.push({ lesson, lines: [] });
      continue;
    }
    drafts[drafts.length - 1].lines.push(line);
  }

  const chunks: CourseChunk[] = [];
  // Text before the first lesson only counts when the document has no lessons.
  const bodies = course.lessons.length > 0 ? drafts.slice(1) : drafts;
  for (const draft of bodies) {
    for (const content of chunkText(draft.lines.join("\n"), chunkSize, chunkOverlap)) {
      chunks.push({
        content,
        courseTitle: course.title,
        lessonNumber: draft.lesson?.lessonNumber,
        chunkIndex: chunks.length,
      });
    }
  }

  return { course, chunks };
}

// ─── File Processing ───────────────────────────────────────

export class DocumentProcessor {
  constructor(
    private readonly chunkSize: number,
    private readonly chunkOverlap: number,
  ) {}

  async processFile(filePath: string): Promise<ParsedCourseDocument> {
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf8");
    } catch (e) {
      const code = typeof e === "object" && e !== null && "code" in e ? e.code : undefined;
      if (code === "ENOENT" || code === "EISDIR") {
        throw new DocumentError("not_found", `No course document at ${filePath}`);
      }
      throw e;
    }
    return parseCourseDocument(text, this.chunkSize, this.chunkOverlap);
  }
}
