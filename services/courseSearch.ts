import type { CatalogMatch, ChunkMetadata, RetrievalOutcome, Source } from "../types";
import { buildContentFilter, type CourseIndex, type SearchResults } from "./vectorStore";

export interface CourseRetrieverOptions {
  /** Reject catalog matches farther than this cosine distance. */
  maxCourseDistance?: number;
  limit?: number;
}

export const courseNotFoundMessage = (hint: string) => `No course found matching '${hint}'.`;

export function emptyResultMessage(courseTitle?: string, lessonNumber?: number): string {
  let message = "No relevant content found";
  if (courseTitle !== undefined) message += ` in course '${courseTitle}'`;
  if (lessonNumber !== undefined) message += ` in lesson ${lessonNumber}`;
  return `${message}.`;
}

export function resultLabel(meta: ChunkMetadata): string {
  const course = meta.courseTitle ?? "unknown";
  return meta.lessonNumber !== undefined ? `${course} - Lesson ${meta.lessonNumber}` : course;
}

/**
 * Resolves a course hint against the catalog, then runs a filtered content
 * query and formats the hits with their provenance.
 */
export class CourseRetriever {
  constructor(
    private readonly index: CourseIndex,
    private readonly options: CourseRetrieverOptions = {},
  ) {}

  /** Closest catalog entry for a hint, or null when none is within the distance cutoff. */
  async resolveCourse(hint: string): Promise<CatalogMatch | null> {
    const match = await this.index.queryCatalog(hint);
    if (!match) return null;
    const { maxCourseDistance } = this.options;
    return maxCourseDistance !== undefined && match.distance > maxCourseDistance ? null : match;
  }

  async search(query: string, courseName?: string, lessonNumber?: number): Promise<RetrievalOutcome> {
    let courseTitle: string | undefined;
    if (courseName !== undefined) {
      const match = await this.resolveCourse(courseName);
      if (!match) {
        return { kind: "error", text: courseNotFoundMessage(courseName) };
      }
      courseTitle = match.title;
    }

    const filter = buildContentFilter(courseTitle, lessonNumber);
    const results = await this.index.queryContent(query, filter, this.options.limit);

    if (results.error !== undefined) {
      return { kind: "error", text: results.error };
    }
    if (results.isEmpty()) {
      return { kind: "empty", text: emptyResultMessage(courseTitle, lessonNumber) };
    }
    return this.formatResults(results);
  }

  private async formatResults(results: SearchResults): Promise<RetrievalOutcome> {
    const blocks: string[] = [];
    const sources: Source[] = [];

    for (const [i, document] of results.documents.entries()) {
      const meta = results.metadata[i];
      const label = resultLabel(meta);
      blocks.push(`[${label}]\n${document}`);

      const url =
        meta.courseTitle !== undefined && meta.lessonNumber !== undefined
          ? await this.index.getLessonLink(meta.courseTitle, meta.lessonNumber)
          : null;
      sources.push({ label, url });
    }

    return { kind: "results", text: blocks.join("\n\n"), sources };
  }
}
