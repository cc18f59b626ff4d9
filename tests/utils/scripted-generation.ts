import type { GenerationRequest, GenerationService } from "../../src/libs/generation";

export type ScriptedReply = string | Error | ((request: GenerationRequest) => string | Promise<string>);

/**
 * Generation double keyed by request purpose. A list is consumed in order and its last
 * entry repeats; a purpose with no script fails the call.
 */
export class ScriptedGeneration implements GenerationService {
  readonly calls: GenerationRequest[] = [];
  private readonly cursors = new Map<string, number>();

  constructor(private readonly script: Record<string, ScriptedReply | ScriptedReply[]> = {}) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.calls.push(request);
    const entry = this.script[request.purpose];
    if (entry === undefined) {
      throw new Error(`No scripted reply for ${request.purpose}`);
    }

    let reply: ScriptedReply;
    if (Array.isArray(entry)) {
      const index = this.cursors.get(request.purpose) ?? 0;
      this.cursors.set(request.purpose, index + 1);
      reply = entry[Math.min(index, entry.length - 1)];
    } else {
      reply = entry;
    }

    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(request) : reply;
  }

  callsFor(purpose: string) {
    return this.calls.filter((call) => call.purpose === purpose).length;
  }

  purposes() {
    return [...new Set(this.calls.map((call) => call.purpose))];
  }
}
