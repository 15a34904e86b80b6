import { generateText } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { GenerationError, describeError } from "./errors";

/** A single-turn prompt: system instructions plus the user message. */
export interface GenerationRequest {
  system: string;
  prompt: string;
}

/** Text generation capability. Implementations never retry. */
export interface TextGenerator {
  readonly modelName: string;
  /** @throws {GenerationError} On any upstream failure, abort included. */
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

export interface OpenAIGeneratorOptions {
  apiKey?: string;
  baseURL?: string;
  /** Chat model (default "gpt-4o"). */
  modelName?: string;
  temperature?: number;
}

export const DEFAULT_LLM_MODEL = "gpt-4o";

/** OpenAI chat completions through the AI SDK. */
export class OpenAIGenerator implements TextGenerator {
  public readonly modelName: string;
  private readonly temperature: number;
  private readonly provider: ReturnType<typeof createOpenAI>;

  public constructor(opts: OpenAIGeneratorOptions = {}) {
    this.modelName = opts.modelName?.trim() || DEFAULT_LLM_MODEL;
    this.temperature = opts.temperature ?? 0;
    this.provider = createOpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  }

  public async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.provider.chat(this.modelName),
        system: request.system,
        prompt: request.prompt,
        temperature: this.temperature,
        maxRetries: 0,
        abortSignal: signal,
      });
      return text;
    } catch (e) {
      throw new GenerationError(`Generation request failed: ${describeError(e)}`, { cause: e });
    }
  }
}
