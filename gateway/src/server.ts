import cors from "@fastify/cors";
import Fastify, { type FastifyReply } from "fastify";
import { z } from "zod";
import {
  ConfigurationError,
  PlanValidationError,
  TaskStoreError,
  TransientAgentError,
  errorMessage,
} from "../../runtime/src/errors.js";
import { logger as rootLogger, type Logger } from "../../runtime/src/logger.js";
import type { SessionLog } from "../../runtime/src/session-log.js";
import type { TaskStore } from "../../runtime/src/task-store.js";
import type { ControllerStatus } from "../../runtime/src/web-agent/session-controller.js";
import { LatencyTracker } from "./chat-history.js";
import type { PageAssistant } from "./page-assistant.js";
import { APOLOGY_REPLY, type QueryRouter } from "./query-router.js";

export const HISTORY_PAGE_LIMIT = 100;

export interface GatewayDeps {
  router: Pick<QueryRouter, "handleTurn">;
  sessions: SessionLog;
  assistant: Pick<PageAssistant, "connect" | "plan" | "execute" | "simplify" | "runTask">;
  tasks: Pick<TaskStore, "list" | "get" | "save" | "remove">;
  browserStatus: () => ControllerStatus;
  model: string;
  corsOrigin: string;
  logger?: Logger;
}

class RequestError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
    this.name = "RequestError";
  }
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new RequestError(
      400,
      "Invalid request body",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

const chatBody = z.object({
  query: z.string().trim().min(1, "Query is required"),
  session_id: z.string().trim().min(1).default("default"),
});

const connectBody = z.object({ url: z.string().trim().min(1) });

const elementSchema = z.object({
  index: z.number().int(),
  tag: z.enum(["A", "BUTTON", "INPUT", "TEXTAREA", "SELECT", "LI"]),
  text: z.string(),
  attributes: z.object({
    id: z.string().default(""),
    name: z.string().default(""),
    type: z.string().default(""),
    class: z.string().default(""),
    placeholder: z.string().default(""),
    href: z.string().default(""),
    ariaLabel: z.string().default(""),
    context: z.string().default(""),
  }),
  visible: z.boolean().default(true),
});

const planBody = z.object({
  instruction: z.string().trim().min(1),
  elements: z.array(elementSchema).optional(),
});

const executeBody = z.object({ actions: z.unknown() });

const saveTaskBody = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().min(1),
  instruction: z.string().default(""),
  actions: z.unknown(),
});

const sessionParams = z.object({ sessionId: z.string().min(1) });
const taskParams = z.object({ name: z.string().min(1) });

/**
 * HTTP surface of the assistant. Routes validate their input and hand off to
 * the router, the page assistant and the stores; errors are mapped to status
 * codes in one place.
 */
export async function buildGateway(deps: GatewayDeps) {
  const log = deps.logger ?? rootLogger;
  const app = Fastify({ loggerInstance: log });
  const latency = new LatencyTracker();

  await app.register(cors, { origin: deps.corsOrigin });

  app.setErrorHandler((error: Error, request, reply: FastifyReply) => {
    if (error instanceof RequestError) {
      return reply.status(error.statusCode).send({ error: error.message, details: error.details });
    }
    if (error instanceof PlanValidationError) {
      return reply.status(422).send({
        error: error.message,
        code: error.code,
        stepIndex: error.stepIndex,
        issues: error.issues,
      });
    }
    if (error instanceof TransientAgentError) {
      request.log.warn({ phase: error.phase, reason: error.message }, "browser operation failed");
      return reply.status(502).send({ error: error.message, code: error.code, phase: error.phase });
    }
    if (error instanceof TaskStoreError) {
      request.log.error({ reason: error.message }, "saved tasks unavailable");
      return reply.status(500).send({ error: error.message, code: error.code });
    }
    if (error instanceof ConfigurationError) {
      request.log.error({ reason: error.message }, "configuration error while serving");
      return reply.status(500).send({ error: error.message, code: error.code });
    }
    request.log.error({ err: error }, "unhandled route error");
    return reply.status(500).send({ error: "Internal server error" });
  });

  app.get("/health", async () => {
    return {
      status: "ok",
      model: deps.model,
      browser: deps.browserStatus(),
      latency: latency.snapshot(),
      timestamp: new Date().toISOString(),
    };
  });

  app.post("/chat", async (request) => {
    const body = parseBody(chatBody, request.body);
    try {
      const result = await deps.router.handleTurn(body.session_id, body.query);
      latency.record(result.outcome, result.durationMs);
      return {
        response: result.reply,
        outcome: result.outcome,
        term: result.term,
        confirmed: result.confirmed,
        candidates: result.candidates,
        retrieval: result.retrieval,
        trace: result.trace,
      };
    } catch (error) {
      request.log.error(
        { sessionId: body.session_id, term: body.query, reason: errorMessage(error) },
        "chat turn failed",
      );
      return { response: APOLOGY_REPLY, outcome: null };
    }
  });

  app.get("/history/:sessionId", async (request) => {
    const { sessionId } = parseBody(sessionParams, request.params);
    const messages = deps.sessions.getRecentMessages(sessionId, HISTORY_PAGE_LIMIT);
    return {
      messages: messages.map((message) => ({
        role: message.role,
        content: message.content,
        timestamp: new Date(message.createdAt).toISOString(),
      })),
    };
  });

  app.delete("/history/:sessionId", async (request) => {
    const { sessionId } = parseBody(sessionParams, request.params);
    const deleted = deps.sessions.clearSession(sessionId);
    return { status: "cleared", deleted };
  });

  app.post("/connect", async (request) => {
    const { url } = parseBody(connectBody, request.body);
    const page = await deps.assistant.connect(url);
    return { status: "connected", url: page.url, title: page.title, elements: page.elements };
  });

  app.post("/plan", async (request) => {
    const body = parseBody(planBody, request.body);
    const plan = await deps.assistant.plan(body.instruction, body.elements);
    return { actions: plan.steps };
  });

  app.post("/execute", async (request) => {
    const { actions } = parseBody(executeBody, request.body);
    return await deps.assistant.execute(actions);
  });

  app.post("/simplify", async () => {
    return await deps.assistant.simplify();
  });

  app.get("/tasks", async () => {
    return { tasks: deps.tasks.list() };
  });

  app.post("/tasks", async (request, reply) => {
    const body = parseBody(saveTaskBody, request.body);
    const task = deps.tasks.save(body);
    return reply.status(201).send({ status: "saved", task });
  });

  app.delete("/tasks/:name", async (request) => {
    const { name } = parseBody(taskParams, request.params);
    if (!deps.tasks.remove(name)) throw new RequestError(404, `No saved task named '${name}'`);
    return { status: "deleted", task: name };
  });

  app.post("/tasks/:name/run", async (request) => {
    const { name } = parseBody(taskParams, request.params);
    const task = deps.tasks.get(name);
    if (!task) throw new RequestError(404, `No saved task named '${name}'`);
    const report = await deps.assistant.runTask(task);
    return { task: task.name, ...report };
  });

  return app;
}
