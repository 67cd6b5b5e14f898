import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { LlmConfig } from "../../runtime/src/config.js";

export interface Message {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface CompletionOptions {
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  content: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Opaque text-completion service. Everything above the agent layer talks to
 * the model through this, so tests can hand in a scripted substitute.
 */
export interface LanguageModel {
  complete(messages: Message[], options?: CompletionOptions): Promise<LLMResponse>;
}

// OpenAI-compatible local servers (Ollama, llama.cpp) ignore the key, but the
// client refuses to start without one.
const LOCAL_ENDPOINT_KEY = "local";

export class Agent implements LanguageModel {
  private readonly config: LlmConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;

  constructor(config: LlmConfig) {
    this.config = config;

    if (config.provider === "anthropic") {
      this.anthropicClient = new Anthropic({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 1,
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: config.apiKey || LOCAL_ENDPOINT_KEY,
        baseURL: config.baseUrl,
        maxRetries: 1,
      });
    }
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<LLMResponse> {
    const temperature = options.temperature ?? this.config.temperature;
    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    const requestOptions = options.timeoutMs ? { timeout: options.timeoutMs } : undefined;

    if (this.anthropicClient) {
      // Anthropic takes the system prompt out of band.
      const system = messages
        .filter((m) => m.role === "system")
        .map((m) => m.content)
        .join("\n\n");
      const turns = messages.flatMap((m) =>
        m.role === "system" ? [] : [{ role: m.role, content: m.content }],
      );

      const response = await this.anthropicClient.messages.create(
        {
          model: this.config.model,
          max_tokens: maxTokens,
          temperature,
          system: system || undefined,
          messages: turns,
        },
        requestOptions,
      );

      let content = "";
      for (const block of response.content) {
        if (block.type === "text") content += block.text;
      }

      return {
        content: content.trim(),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    }

    if (this.openaiClient) {
      const response = await this.openaiClient.chat.completions.create(
        {
          model: this.config.model,
          temperature,
          max_tokens: maxTokens,
          messages: messages.map(toOpenAIMessage),
        },
        requestOptions,
      );

      const choice = response.choices[0];
      return {
        content: (choice?.message.content || "").trim(),
        usage: {
          inputTokens: response.usage?.prompt_tokens || 0,
          outputTokens: response.usage?.completion_tokens || 0,
        },
      };
    }

    throw new Error(`Provider ${this.config.provider} not supported`);
  }
}

function toOpenAIMessage(message: Message): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}
