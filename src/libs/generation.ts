export type GenerationMessage = {
  role: "system" | "user";
  content: string;
};

/**
 * `generation` asks for creative output; `validation` asks for a deterministic
 * judgement (underwriting inference, review, compliance).
 */
export type GenerationMode = "generation" | "validation";

export type GenerationRequest = {
  /** Short label used in logs and by test doubles, e.g. `risk` or `review`. */
  purpose: string;
  messages: GenerationMessage[];
  mode?: GenerationMode;
  signal?: AbortSignal;
};

/**
 * The text-generation service the stages consult. Replies are free-form text; callers
 * recover structure with the extractor.
 */
export interface GenerationService {
  generate(request: GenerationRequest): Promise<string>;
}
