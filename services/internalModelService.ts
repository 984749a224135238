import type {
  AssistantBlock,
  BackendReply,
  ChatMessage,
  CompletionRequest,
  LlmBackend,
  ToolArgs,
  ToolDefinition,
} from "../types";

// OpenAI-compatible chat-completions endpoint (self-hosted model brokers, vLLM, etc.)

export interface OpenAICompatibleBackendOptions {
  endpoint: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
  maxOutputTokens: number;
  fetchImpl?: typeof fetch;
}

type WireMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

// ─── Request Mapping ───────────────────────────────────────

export function toWireTools(tools: ToolDefinition[]) {
  return tools.map((tool) => ({
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  }));
}

export function toWireMessages(system: string, messages: ChatMessage[]): WireMessage[] {
  const wire: WireMessage[] = [{ role: "system", content: system }];
  for (const message of messages) {
    if (message.role === "assistant") {
      const text = message.content.map((b) => (b.type === "text" ? b.text : "")).join("");
      const toolCalls = message.content.flatMap((b): WireToolCall[] =>
        b.type === "tool_call"
          ? [{ id: b.id, type: "function", function: { name: b.name, arguments: JSON.stringify(b.args) } }]
          : [],
      );
      wire.push({ role: "assistant", content: text || null, ...(toolCalls.length ? { tool_calls: toolCalls } : {}) });
    } else if (typeof message.content === "string") {
      wire.push({ role: "user", content: message.content });
    } else {
      for (const result of message.content) {
        wire.push({ role: "tool", tool_call_id: result.callId, content: result.content });
      }
    }
  }
  return wire;
}

// ─── Response Mapping ──────────────────────────────────────

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function parseArguments(raw: unknown): ToolArgs {
  if (isObject(raw)) return raw;
  if (typeof raw !== "string" || raw.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isObject(parsed) ? parsed : {};
  } catch {
    console.warn("[Internal Model] Tool call arguments were not valid JSON:", raw);
    return {};
  }
}

export function parseCompletion(data: unknown): BackendReply {
  const choice = isObject(data) && Array.isArray(data.choices) ? data.choices[0] : undefined;
  const message: unknown = isObject(choice) ? choice.message : undefined;
  if (!isObject(message)) {
    throw new Error("Invalid chat completion response shape");
  }

  const text = typeof message.content === "string" ? message.content : "";
  const rawCalls = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  const content: AssistantBlock[] = text ? [{ type: "text", text }] : [];
  for (const [i, call] of rawCalls.entries()) {
    if (!isObject(call) || !isObject(call.function) || typeof call.function.name !== "string") continue;
    content.push({
      type: "tool_call",
      id: typeof call.id === "string" ? call.id : `call_${i}`,
      name: call.function.name,
      args: parseArguments(call.function.arguments),
    });
  }

  return content.some((b) => b.type === "tool_call") ? { kind: "tool_use", content } : { kind: "text", text };
}

// ─── Backend ───────────────────────────────────────────────

export class OpenAICompatibleBackend implements LlmBackend {
  readonly model: string;
  private readonly options: OpenAICompatibleBackendOptions;

  constructor(options: OpenAICompatibleBackendOptions) {
    this.model = options.model;
    this.options = options;
  }

  async complete(request: CompletionRequest): Promise<BackendReply> {
    const { endpoint, apiKey, timeoutMs, maxOutputTokens } = this.options;
    if (!endpoint || !apiKey) {
      throw new Error("Internal model endpoint or API key missing. Set OPENAI_COMPAT_ENDPOINT and OPENAI_COMPAT_API_KEY.");
    }
    const fetchImpl = this.options.fetchImpl ?? fetch;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchImpl(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          temperature: 0,
          max_tokens: maxOutputTokens,
          messages: toWireMessages(request.system, request.messages),
          ...(request.tools ? { tools: toWireTools(request.tools), tool_choice: "auto" } : {}),
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Internal Model API Failed: ${response.status} ${response.statusText}`);
      }
      const data: unknown = await response.json();
      const reply = parseCompletion(data);
      console.log(`[Internal Model] ${this.model} replied with ${reply.kind}`);
      return reply;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`LLM request timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
