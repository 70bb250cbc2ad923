import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import type { JsonObject, LanguageModelCaller, ModelCallOptions } from "../types.ts";
import { settingsService, type InferenceSettings } from "./settingsService.ts";
import { loggerService } from "./loggerService.ts";
import { LlmTransportError, ResponseParseError } from "./errors.ts";

const DEFAULT_MAX_TOKENS = 2048;
const RAW_PREVIEW_LENGTH = 500;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const stripCodeFence = (text: string): string => {
  if (!text.startsWith("```")) return text;
  // Drop the opening fence line (``` or ```json) and a closing fence line if present
  const lines = text.split("\n").slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim() === "```") {
    lines.pop();
  }
  return lines.join("\n").trim();
};

type ParseAttempt = { value: JsonObject } | { failure: string };

const tryParseObject = (text: string): ParseAttempt => {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonObject(parsed)) return { value: parsed };
    return { failure: `Expected JSON object, got ${Array.isArray(parsed) ? "array" : typeof parsed}` };
  } catch (error) {
    return { failure: error instanceof Error ? error.message : String(error) };
  }
};

/**
 * Decodes a model reply into a JSON object. Tolerates markdown fences and
 * prose around the object; anything else is a ResponseParseError.
 */
export const parseJsonResponse = (text: string): JsonObject => {
  const cleaned = stripCodeFence(text.trim());
  const preview = text.slice(0, RAW_PREVIEW_LENGTH);

  const direct = tryParseObject(cleaned);
  if ("value" in direct) return direct.value;

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start >= 0 && end > start) {
    const embedded = tryParseObject(cleaned.slice(start, end + 1));
    if ("value" in embedded) return embedded.value;
  }

  throw new ResponseParseError(
    `Could not parse model response as JSON: ${direct.failure}\nResponse text: ${preview}`,
    preview
  );
};

const toTransportError = (error: unknown, model: string): LlmTransportError => {
  if (error instanceof OpenAI.APIError) {
    return new LlmTransportError(`Model call to ${model} failed: ${error.message}`, error.status);
  }
  return new LlmTransportError(
    `Model call to ${model} failed: ${error instanceof Error ? error.message : String(error)}`
  );
};

/** The slice of the OpenAI SDK the client uses; `openai.chat.completions` satisfies it. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

/**
 * Language model caller over an OpenAI-compatible chat completions endpoint.
 */
export class InferenceClient implements LanguageModelCaller {
  private readonly completions: ChatCompletionsApi;

  constructor(settings: Pick<InferenceSettings, "endpoint" | "apiKey">, completions?: ChatCompletionsApi) {
    this.completions = completions ?? new OpenAI({
      baseURL: settings.endpoint,
      apiKey: settings.apiKey || "lm-studio",
    }).chat.completions;
  }

  async call({
    system,
    user,
    model,
    maxTokens = DEFAULT_MAX_TOKENS,
    temperature = 0,
  }: ModelCallOptions): Promise<string> {
    loggerService.debug("LLM call", { model, systemChars: system.length, userChars: user.length });

    let completion: ChatCompletion;
    try {
      completion = await this.completions.create({
        model,
        max_tokens: maxTokens,
        temperature,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
      });
    } catch (error) {
      loggerService.error("LLM call failed", { model, error });
      throw toTransportError(error, model);
    }

    const text = completion.choices[0]?.message?.content ?? "";
    loggerService.debug("LLM response", { model, chars: text.length });
    return text;
  }

  async callJson(options: ModelCallOptions): Promise<JsonObject> {
    const text = await this.call(options);
    return parseJsonResponse(text);
  }
}

export const createInferenceClient = (): InferenceClient =>
  new InferenceClient(settingsService.getInferenceSettings());
