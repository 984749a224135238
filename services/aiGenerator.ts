import { SYSTEM_PROMPT } from "../constants";
import type {
  AssistantBlock,
  BackendReply,
  ChatMessage,
  LlmBackend,
  Source,
  ToolCallBlock,
  ToolDefinition,
  ToolResultBlock,
} from "../types";
import type { ToolManager } from "./searchTools";

export interface GenerateOptions {
  query: string;
  history?: string;
  tools?: ToolDefinition[];
  toolManager?: ToolManager;
}

export interface GeneratedResponse {
  answer: string;
  sources: Source[];
}

export function buildSystemPrompt(history?: string): string {
  return history ? `${SYSTEM_PROMPT}\n\nPrevious conversation:\n${history}` : SYSTEM_PROMPT;
}

export const toolCallsOf = (content: AssistantBlock[]): ToolCallBlock[] =>
  content.filter((b): b is ToolCallBlock => b.type === "tool_call");

const textOf = (content: AssistantBlock[]): string =>
  content
    .map((b) => (b.type === "text" ? b.text : ""))
    .join("")
    .trim();

function replyText(reply: BackendReply): string {
  switch (reply.kind) {
    case "text":
      return reply.text;
    case "tool_use":
      return textOf(reply.content);
    default: {
      const unreachable: never = reply;
      return unreachable;
    }
  }
}

/**
 * One bounded exchange: a first completion that may request tools, and at
 * most one follow-up completion, without tools, that sees their results.
 */
export class AIGenerator {
  constructor(private readonly backend: LlmBackend) {}

  async generateResponse(options: GenerateOptions): Promise<GeneratedResponse> {
    const system = buildSystemPrompt(options.history);
    const userMessage: ChatMessage = { role: "user", content: options.query };
    const tools = options.tools && options.tools.length > 0 ? options.tools : undefined;

    const first = await this.backend.complete({ system, messages: [userMessage], tools });
    if (first.kind === "text" || !options.toolManager || toolCallsOf(first.content).length === 0) {
      return { answer: replyText(first), sources: [] };
    }

    const { results, sources } = await this.runTools(first.content, options.toolManager);
    const messages: ChatMessage[] = [
      userMessage,
      { role: "assistant", content: first.content },
      { role: "user", content: results },
    ];
    const final = await this.backend.complete({ system, messages });
    return { answer: replyText(final), sources };
  }

  // Calls run one at a time, in the order the model listed them.
  private async runTools(
    content: AssistantBlock[],
    toolManager: ToolManager,
  ): Promise<{ results: ToolResultBlock[]; sources: Source[] }> {
    const results: ToolResultBlock[] = [];
    let sources: Source[] = [];

    for (const call of toolCallsOf(content)) {
      console.log(`[Generator] Tool call ${call.name}`, call.args);
      const outcome = await toolManager.invoke(call.name, call.args);
      if (outcome.sources !== undefined) sources = outcome.sources;
      results.push({ type: "tool_result", callId: call.id, toolName: call.name, content: outcome.text });
    }
    return { results, sources };
  }
}
