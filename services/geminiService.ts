import {
  FunctionCallingMode,
  GoogleGenerativeAI,
  SchemaType,
  type Content,
  type FunctionDeclaration,
  type GenerateContentResponse,
  type Part,
  type Schema,
} from "@google/generative-ai";
import type {
  AssistantBlock,
  BackendReply,
  ChatMessage,
  CompletionRequest,
  LlmBackend,
  ToolArgs,
  ToolDefinition,
  ToolParameter,
} from "../types";

export interface GeminiBackendOptions {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  temperature?: number;
}

// ─── Request Mapping ───────────────────────────────────────

const toSchema = (param: ToolParameter): Schema =>
  param.type === "integer"
    ? { type: SchemaType.INTEGER, description: param.description }
    : { type: SchemaType.STRING, description: param.description };

export function toFunctionDeclarations(tools: ToolDefinition[]): FunctionDeclaration[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: {
      type: SchemaType.OBJECT,
      properties: Object.fromEntries(
        Object.entries(tool.parameters.properties).map(([key, param]) => [key, toSchema(param)]),
      ),
      required: tool.parameters.required,
    },
  }));
}

const toModelPart = (block: AssistantBlock): Part =>
  block.type === "text" ? { text: block.text } : { functionCall: { name: block.name, args: block.args } };

export function toGeminiContents(messages: ChatMessage[]): Content[] {
  return messages.map((message): Content => {
    if (message.role === "assistant") {
      return { role: "model", parts: message.content.map(toModelPart) };
    }
    if (typeof message.content === "string") {
      return { role: "user", parts: [{ text: message.content }] };
    }
    return {
      role: "function",
      parts: message.content.map((result) => ({
        functionResponse: { name: result.toolName, response: { name: result.toolName, content: result.content } },
      })),
    };
  });
}

// ─── Response Mapping ──────────────────────────────────────

const isArgs = (value: unknown): value is ToolArgs =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Gemini has no call ids; calls are numbered in the order they arrive. */
export function toBackendReply(response: GenerateContentResponse): BackendReply {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  const content: AssistantBlock[] = [];
  let callCount = 0;

  for (const part of parts) {
    if (part.functionCall) {
      const { name, args } = part.functionCall;
      content.push({ type: "tool_call", id: `${name}_${callCount++}`, name, args: isArgs(args) ? args : {} });
    } else if (typeof part.text === "string") {
      content.push({ type: "text", text: part.text });
    }
  }

  if (callCount > 0) return { kind: "tool_use", content };
  return { kind: "text", text: content.map((b) => (b.type === "text" ? b.text : "")).join("") };
}

// ─── Backend ───────────────────────────────────────────────

export class GeminiBackend implements LlmBackend {
  readonly model: string;
  private readonly apiKey: string;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;

  constructor(options: GeminiBackendOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature ?? 0;
  }

  async complete(request: CompletionRequest): Promise<BackendReply> {
    if (!this.apiKey) {
      throw new Error("No Gemini API key found. Please add GEMINI_API_KEY to your .env file.");
    }
    const genAI = new GoogleGenerativeAI(this.apiKey);
    const model = genAI.getGenerativeModel({
      model: this.model,
      systemInstruction: request.system,
      generationConfig: { temperature: this.temperature, maxOutputTokens: this.maxOutputTokens },
      ...(request.tools
        ? {
            tools: [{ functionDeclarations: toFunctionDeclarations(request.tools) }],
            toolConfig: { functionCallingConfig: { mode: FunctionCallingMode.AUTO } },
          }
        : {}),
    });

    const result = await model.generateContent({ contents: toGeminiContents(request.messages) });
    const reply = toBackendReply(result.response);
    console.log(`[Gemini] ${this.model} replied with ${reply.kind}`);
    return reply;
  }
}
