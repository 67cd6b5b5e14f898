import type { Page } from "playwright";
import { LlmIntentClassifier } from "../../agent/src/classifier.js";
import { Agent } from "../../agent/src/index.js";
import { PromptLibrary } from "../../agent/src/prompts.js";
import type { LucidConfig } from "../../runtime/src/config.js";
import { errorMessage } from "../../runtime/src/errors.js";
import { createLogger } from "../../runtime/src/logger.js";
import { ConversationLog } from "../../runtime/src/session-log.js";
import { TaskStore } from "../../runtime/src/task-store.js";
import { ActionExecutor } from "../../runtime/src/web-agent/action-executor.js";
import { RetrievalAgent } from "../../runtime/src/web-agent/retrieval-agent.js";
import {
  RenderingSessionController,
  chromiumLauncher,
} from "../../runtime/src/web-agent/session-controller.js";
import { PageAssistant } from "./page-assistant.js";
import { QueryRouter } from "./query-router.js";

const log = createLogger("bootstrap");

export interface Services {
  config: LucidConfig;
  agent: Agent;
  prompts: PromptLibrary;
  sessions: ConversationLog;
  tasks: TaskStore;
  controller: RenderingSessionController<Page>;
  router: QueryRouter;
  assistant: PageAssistant<Page>;
  /** Release the browser session, then close the message database. */
  close(): Promise<void>;
}

/**
 * Wire every process-wide resource. Prompt templates are checked here, so a
 * ConfigurationError surfaces before the server listens. The browser is not
 * launched until the first request needs it.
 */
export function createServices(config: LucidConfig): Services {
  const prompts = PromptLibrary.fromFile(config.storage.promptsPath);
  const agent = new Agent(config.llm);
  const sessions = new ConversationLog(config.storage.dbPath);
  const tasks = new TaskStore(config.storage.tasksPath);
  const controller = new RenderingSessionController(
    chromiumLauncher({ headless: config.browser.headless }),
  );

  const retriever = new RetrievalAgent(controller, {
    reference: config.reference,
    timeouts: config.timeouts,
  });
  const executor = new ActionExecutor(controller, {
    timeouts: config.timeouts,
    postActionDelayMs: config.postActionDelayMs,
  });

  const router = new QueryRouter({
    sessions,
    classifier: new LlmIntentClassifier(agent, prompts, config.timeouts.modelMs),
    model: agent,
    prompts,
    retriever,
    settings: {
      historyLimit: config.chat.historyLimit,
      maxQueryLength: config.chat.maxQueryLength,
      typoCandidates: config.chat.typoCandidates,
      modelTimeoutMs: config.timeouts.modelMs,
    },
  });

  const assistant = new PageAssistant<Page>({
    pages: controller,
    executor,
    model: agent,
    prompts,
    timeouts: config.timeouts,
    minChars: config.reference.minChars,
  });

  log.info(
    { provider: config.llm.provider, model: config.llm.model, db: config.storage.dbPath },
    "services ready",
  );

  return {
    config,
    agent,
    prompts,
    sessions,
    tasks,
    controller,
    router,
    assistant,
    async close() {
      try {
        await controller.release();
      } finally {
        try {
          sessions.close();
        } catch (error) {
          log.warn({ reason: errorMessage(error) }, "closing the message database failed");
        }
      }
    },
  };
}
