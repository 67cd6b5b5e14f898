import { z } from "zod";

export const DEFAULT_GATEWAY_URL = "http://127.0.0.1:8000";

const chatReplySchema = z.object({
  response: z.string(),
  outcome: z.string().nullable().optional(),
  term: z.string().optional(),
  candidates: z.array(z.string()).optional(),
});

const taskListSchema = z.object({
  tasks: z.array(
    z.object({
      name: z.string(),
      url: z.string(),
      instruction: z.string(),
      actions: z.array(z.unknown()),
      savedAt: z.string(),
    }),
  ),
});

const stepResultSchema = z.object({
  index: z.number(),
  status: z.enum(["succeeded", "failed", "not_attempted"]),
  detail: z.string(),
});

const taskRunSchema = z.object({
  task: z.string(),
  status: z.enum(["completed", "failed"]),
  results: z.array(stepResultSchema),
  failure: z.object({ index: z.number(), reason: z.string() }).optional(),
});

const errorBodySchema = z.object({ error: z.string() });

export type ChatReply = z.infer<typeof chatReplySchema>;
export type TaskRun = z.infer<typeof taskRunSchema>;

export class GatewayRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "GatewayRequestError";
  }
}

/** Thin JSON client for the gateway's HTTP routes. */
export class GatewayClient {
  constructor(
    private readonly baseUrl: string = DEFAULT_GATEWAY_URL,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async chat(sessionId: string, query: string): Promise<ChatReply> {
    const body = await this.request("POST", "/chat", { query, session_id: sessionId });
    return chatReplySchema.parse(body);
  }

  async clearHistory(sessionId: string): Promise<void> {
    await this.request("DELETE", `/history/${encodeURIComponent(sessionId)}`);
  }

  async listTasks() {
    const body = await this.request("GET", "/tasks");
    return taskListSchema.parse(body).tasks;
  }

  async removeTask(name: string): Promise<void> {
    await this.request("DELETE", `/tasks/${encodeURIComponent(name)}`);
  }

  async runTask(name: string): Promise<TaskRun> {
    const body = await this.request("POST", `/tasks/${encodeURIComponent(name)}/run`, {});
    return taskRunSchema.parse(body);
  }

  async health(): Promise<boolean> {
    try {
      await this.request("GET", "/health");
      return true;
    } catch {
      return false;
    }
  }

  private async request(method: string, path: string, payload?: unknown): Promise<unknown> {
    const send = this.fetchImpl;
    const response = await send(`${this.baseUrl.replace(/\/+$/, "")}${path}`, {
      method,
      headers: payload === undefined ? undefined : { "content-type": "application/json" },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });

    const text = await response.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(body);
      const message = parsed.success ? parsed.data.error : `HTTP ${response.status}`;
      throw new GatewayRequestError(message, response.status);
    }
    return body;
  }
}
