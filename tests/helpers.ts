import type { CompletionOptions, ModelInvoker } from '../src/services/modelClient.js';

export interface RecordedCall {
  prompt: string;
  options: CompletionOptions;
}

/**
 * In-process stand-in for the model provider. `respond` decides each answer
 * from the compiled prompt; a thrown error becomes a rejected call.
 */
export class FakeModel implements ModelInvoker {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: (prompt: string) => string | Promise<string>) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, options });
    return this.respond(prompt);
  }
}

export function modelAnswer(fields: Record<string, string>): string {
  return JSON.stringify(fields);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
