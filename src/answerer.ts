import { GenerationError } from "./errors";
import type { GenerationRequest, TextGenerator } from "./generation";
import type { Chunk, GroundedAnswer } from "./types";

/** Exact reply the model is told to give when the context lacks the answer. */
export const NOT_FOUND_SIGNAL = "NOT_FOUND_IN_CONTEXT";

export const DEFAULT_NOT_FOUND_MESSAGE =
  "The answer was not found in the provided document context.";

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant. Answer the user's question based ONLY on the provided context.
If the context does not contain the answer, reply with exactly ${NOT_FOUND_SIGNAL} and nothing else. Be concise and accurate.`;

const NOT_FOUND_PATTERN = new RegExp(`\\b${NOT_FOUND_SIGNAL}\\b`);

const CONTEXT_SEPARATOR = "\n\n---\n\n";

export interface AnswererOptions {
  /** Replaces the default system prompt. Should keep the not-found instruction. */
  systemPrompt?: string;
  /** Answer text returned alongside `found: false`. */
  notFoundMessage?: string;
}

/**
 * Turns a question plus retrieved chunks into a grounded answer. The model
 * only ever sees the supplied chunks; with no chunks it is not called at all.
 */
export class Answerer {
  private readonly generator: TextGenerator;
  private readonly systemPrompt: string;
  private readonly notFoundMessage: string;

  public constructor(generator: TextGenerator, opts: AnswererOptions = {}) {
    this.generator = generator;
    this.systemPrompt = opts.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.notFoundMessage = opts.notFoundMessage ?? DEFAULT_NOT_FOUND_MESSAGE;
  }

  /** Prompt sent to the generator for the given question and context. */
  public buildPrompt(question: string, chunks: readonly Chunk[]): GenerationRequest {
    const context = chunks.map((c) => c.text).join(CONTEXT_SEPARATOR);
    return {
      system: this.systemPrompt,
      prompt: `Context from the document:\n\n${context}${CONTEXT_SEPARATOR}Question: ${question}\n\nAnswer:`,
    };
  }

  /**
   * @throws {GenerationError} If the generator fails or replies with nothing.
   */
  public async answer(
    question: string,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<GroundedAnswer> {
    if (chunks.length === 0) return this.notFound();

    const reply = await this.generator.generate(this.buildPrompt(question, chunks), signal);
    const text = reply
      .trim()
      .replace(/^answer:\s*/i, "")
      .trim();
    if (!text) throw new GenerationError("Generation returned an empty answer");
    if (NOT_FOUND_PATTERN.test(text)) return this.notFound();
    return { answer: text, found: true };
  }

  private notFound(): GroundedAnswer {
    return { answer: this.notFoundMessage, found: false };
  }
}
