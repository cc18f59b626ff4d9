import OpenAI from "openai";
import type { GenerationMode, GenerationRequest, GenerationService } from "./generation";

const DEFAULT_MODEL = "gpt-4o-mini";
const GENERATION_TEMPERATURE = 0.2;
const VALIDATION_TEMPERATURE = 0.0;
const REQUEST_TIMEOUT_MS = 20_000;

const TEMPERATURES: Record<GenerationMode, number> = {
  generation: GENERATION_TEMPERATURE,
  validation: VALIDATION_TEMPERATURE
};

export type OpenAIGenerationOptions = {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  timeoutMs?: number;
};

export class OpenAIGeneration implements GenerationService {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAIGenerationOptions) {
    if (!options.apiKey) {
      throw new Error("OPENAI_API_KEY is required to call OpenAI APIs.");
    }
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async generate({ messages, mode = "generation", signal }: GenerationRequest) {
    const response = await this.client.responses.create(
      {
        model: this.model,
        temperature: TEMPERATURES[mode],
        input: messages.map((message) => ({ role: message.role, content: message.content })),
        stream: false
      },
      {
        signal,
        timeout: this.timeoutMs
      }
    );
    return response.output_text ?? "";
  }
}
