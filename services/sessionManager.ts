import { v4 as uuid } from "uuid";

export interface Exchange {
  query: string;
  answer: string;
}

/** Per-session conversation memory, bounded to the most recent exchanges. */
export class SessionManager {
  private readonly sessions = new Map<string, Exchange[]>();

  constructor(private readonly maxHistory: number) {}

  create(): string {
    const id = uuid();
    this.sessions.set(id, []);
    return id;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  append(sessionId: string, query: string, answer: string): void {
    const exchanges = [...(this.sessions.get(sessionId) ?? []), { query, answer }];
    this.sessions.set(sessionId, exchanges.slice(Math.max(0, exchanges.length - this.maxHistory)));
  }

  exchanges(sessionId: string): Exchange[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  render(sessionId: string): string {
    return this.exchanges(sessionId)
      .map((e) => `User: ${e.query}\nAssistant: ${e.answer}`)
      .join("\n");
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }
}
