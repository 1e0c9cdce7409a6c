// ============================================================================
// COMPLETION SERVICE
// ============================================================================
// The single seam between the engine and a language model. Callers hand over a
// system prompt, a bounded dialogue window and the user's text; they get text
// back or a ResolverFailure (timeout, provider error, unusable reply).

import { ChatBedrockConverse } from "@langchain/aws";
import { ChatOpenAI } from "@langchain/openai";
import { AIMessage, BaseMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { z } from "zod";

import { DialogueTurn, LLMConfig } from "../types/index.js";
import { ResolverFailure, describeError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";

const log = createLogger("llm");

export interface CompletionRequest {
  system: string;
  prompt: string;
  history?: DialogueTurn[];
  /** Ask for a JSON object reply */
  json?: boolean;
}

export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}

// ============================================================================
// LLM MODEL CREATION
// ============================================================================

export function createModel(llmConfig: LLMConfig): BaseChatModel {
  switch (llmConfig.provider) {
    case "bedrock":
      return new ChatBedrockConverse({
        model: llmConfig.bedrock?.model || "anthropic.claude-3-5-sonnet-20241022-v2:0",
        region: llmConfig.bedrock?.region || "us-east-1",
      });
    case "openai":
      if (!llmConfig.openai) throw new Error("OpenAI config not found");
      return new ChatOpenAI({
        modelName: llmConfig.openai.model,
        openAIApiKey: llmConfig.openai.apiKey,
        configuration: { baseURL: llmConfig.openai.baseUrl },
      });
    case "local":
      if (!llmConfig.local) throw new Error("Local config not found");
      return new ChatOpenAI({
        modelName: llmConfig.local.model,
        openAIApiKey: llmConfig.local.apiKey || "not-needed",
        configuration: { baseURL: llmConfig.local.baseUrl },
      });
  }
}

// ============================================================================
// LANGCHAIN ADAPTER
// ============================================================================

export class LangChainCompletionService implements CompletionService {
  constructor(
    private model: BaseChatModel,
    private timeoutMs: number
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const messages = buildMessages(request);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ResolverFailure(`Completion timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      const response = await Promise.race([this.model.invoke(messages, { signal: controller.signal }), timeout]);
      return contentToText(response.content);
    } catch (error) {
      if (error instanceof ResolverFailure) throw error;
      throw new ResolverFailure(`Completion failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createCompletionService(llmConfig: LLMConfig): CompletionService {
  return new LangChainCompletionService(createModel(llmConfig), llmConfig.timeoutMs);
}

function buildMessages(request: CompletionRequest): BaseMessage[] {
  const system = request.json
    ? `${request.system}\n\nRespond with a single JSON object and nothing else.`
    : request.system;

  const messages: BaseMessage[] = [new SystemMessage(system)];
  for (const turn of request.history ?? []) {
    messages.push(turn.role === "user" ? new HumanMessage(turn.content) : new AIMessage(turn.content));
  }
  messages.push(new HumanMessage(request.prompt));
  return messages;
}

// ============================================================================
// REPLY PARSING
// ============================================================================

/**
 * Flatten message content (a string or a list of parts) to plain text
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Pull the outermost JSON object out of a model reply
 */
export function parseJsonReply(text: string): unknown {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ResolverFailure("Completion reply contained no JSON object");
  }
  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new ResolverFailure("Completion reply contained malformed JSON", { cause: error });
  }
}

/**
 * Request a JSON reply and validate it against a schema
 */
export async function requestStructured<T>(
  service: CompletionService,
  request: CompletionRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const text = await service.complete({ ...request, json: true });
  const result = schema.safeParse(parseJsonReply(text));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    log.debug(`Structured reply rejected: ${issues.join("; ")}`);
    throw new ResolverFailure(`Completion reply did not match the expected shape: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Request free text, falling back to `fallback` when the service fails or answers with nothing
 */
export async function completeOr(
  service: CompletionService,
  request: CompletionRequest,
  fallback: string
): Promise<string> {
  try {
    const text = (await service.complete(request)).trim();
    return text || fallback;
  } catch (error) {
    log.warn(`Using fallback text: ${describeError(error)}`);
    return fallback;
  }
}
