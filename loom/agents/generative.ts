import { generateText } from "ai";
import type { LanguageModel, ModelMessage } from "ai";
import type { Agent } from "./types.js";

export type GenerativeAgentOptions = {
  model: LanguageModel;
  name?: string;
  systemContext?: string;

  // Replay earlier exchanges on each call. History is never trimmed.
  keepHistory?: boolean;

  temperature?: number;
  maxOutputTokens?: number;
};

/** Agent backed by the AI SDK; `systemContext` is sent as the system prompt. */
export class GenerativeAgent implements Agent {
  readonly name?: string;
  systemContext: string;

  private readonly model: LanguageModel;
  private readonly keepHistory: boolean;
  private readonly temperature?: number;
  private readonly maxOutputTokens?: number;
  private readonly messages: ModelMessage[] = [];

  constructor(opts: GenerativeAgentOptions) {
    this.name = opts.name;
    this.model = opts.model;
    this.systemContext = opts.systemContext ?? "";
    this.keepHistory = opts.keepHistory ?? false;
    this.temperature = opts.temperature;
    this.maxOutputTokens = opts.maxOutputTokens;
  }

  get history(): readonly ModelMessage[] {
    return this.messages;
  }

  async exec(prompt: string): Promise<string> {
    const userMessage: ModelMessage = { role: "user", content: prompt };

    const result = await generateText({
      model: this.model,
      system: this.systemContext === "" ? undefined : this.systemContext,
      messages: this.keepHistory ? [...this.messages, userMessage] : [userMessage],
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
    });

    if (this.keepHistory) {
      this.messages.push(userMessage, { role: "assistant", content: result.text });
    }
    return result.text;
  }
}
