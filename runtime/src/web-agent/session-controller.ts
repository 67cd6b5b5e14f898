import { chromium, type Page } from "playwright";
import { AsyncLock } from "../async-lock.js";
import { errorMessage, toTransientAgentError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";

export interface PageHandle {
  close(): Promise<void>;
  isClosed(): boolean;
}

export interface ContextHandle<P extends PageHandle> {
  newPage(): Promise<P>;
  close(): Promise<void>;
}

/** The launched engine process. A Playwright Browser satisfies this. */
export interface EngineHandle<P extends PageHandle> {
  newContext(): Promise<ContextHandle<P>>;
  close(): Promise<void>;
  isConnected(): boolean;
}

export type EngineLauncher<P extends PageHandle> = () => Promise<EngineHandle<P>>;

export interface RenderingSession<P extends PageHandle> {
  engine: EngineHandle<P>;
  browser: ContextHandle<P>;
  page: P;
  startedAt: number;
}

export interface ControllerStatus {
  active: boolean;
  launches: number;
  pendingCallers: number;
}

type ShutdownSignal = "SIGINT" | "SIGTERM";

/**
 * Owner of the one rendering session in the process: one engine, one browser
 * context, one page. Every page operation goes through runExclusive, so two
 * requests never drive the page at the same time. The session lives until
 * release() at shutdown.
 */
export class RenderingSessionController<P extends PageHandle = Page> {
  private session: RenderingSession<P> | null = null;
  private launching: Promise<RenderingSession<P>> | null = null;
  private readonly lock = new AsyncLock();
  private launches = 0;
  private hooksInstalled = false;

  constructor(
    private readonly launch: EngineLauncher<P>,
    private readonly log: Logger = createLogger("rendering-session"),
  ) {}

  /** Lazily start engine, context and page. Repeat calls return the live session. */
  async acquire(): Promise<RenderingSession<P>> {
    if (this.session && !this.session.engine.isConnected()) {
      const dead = this.session;
      this.session = null;
      this.log.warn("rendering engine disconnected; launching a new one");
      await dead.engine.close().catch((error: unknown) => {
        this.log.warn({ reason: errorMessage(error) }, "closing the disconnected engine failed");
      });
    }

    if (this.session) {
      if (this.session.page.isClosed()) {
        this.session.page = await this.session.browser.newPage();
        this.log.warn("active page was closed; opened a replacement");
      }
      return this.session;
    }

    if (!this.launching) {
      this.launching = this.start().finally(() => {
        this.launching = null;
      });
    }
    return await this.launching;
  }

  /** Run `fn` against the page while holding the session lock. */
  async runExclusive<T>(fn: (page: P) => Promise<T>): Promise<T> {
    return await this.lock.withLock(async () => {
      const session = await this.acquire();
      return await fn(session.page);
    });
  }

  /**
   * Tear down page, then browser context, then engine. Each step runs even if
   * the one before it failed.
   */
  async release(): Promise<void> {
    const pending = this.launching;
    if (pending) {
      // A failed launch is reported to whoever called acquire().
      await pending.catch(() => undefined);
    }

    const session = this.session;
    this.session = null;
    if (!session) return;

    const steps: Array<[string, () => Promise<void>]> = [
      ["page", () => (session.page.isClosed() ? Promise.resolve() : session.page.close())],
      ["browser", () => session.browser.close()],
      ["engine", () => session.engine.close()],
    ];

    for (const [label, close] of steps) {
      try {
        await close();
      } catch (error) {
        this.log.warn({ step: label, reason: errorMessage(error) }, "rendering session teardown step failed");
      }
    }
    this.log.info("rendering session released");
  }

  status(): ControllerStatus {
    return {
      active: this.session !== null,
      launches: this.launches,
      pendingCallers: this.lock.pending,
    };
  }

  /**
   * Release the session when the process is asked to stop or dies on an
   * unhandled fault. `onExit` runs after release; by default the process exits.
   */
  installShutdownHooks(
    onExit: (code: number) => void = (code) => process.exit(code),
  ): void {
    if (this.hooksInstalled) return;
    this.hooksInstalled = true;

    const shutdown = (code: number) => {
      void this.release()
        .catch((error: unknown) => {
          this.log.error({ reason: errorMessage(error) }, "release during shutdown failed");
        })
        .finally(() => onExit(code));
    };

    for (const signal of ["SIGINT", "SIGTERM"] satisfies ShutdownSignal[]) {
      process.once(signal, () => shutdown(0));
    }
    process.once("uncaughtException", (error) => {
      this.log.fatal({ reason: errorMessage(error) }, "uncaught exception");
      shutdown(1);
    });
    process.once("unhandledRejection", (reason) => {
      this.log.fatal({ reason: errorMessage(reason) }, "unhandled rejection");
      shutdown(1);
    });
  }

  private async start(): Promise<RenderingSession<P>> {
    let engine: EngineHandle<P> | null = null;
    try {
      engine = await this.launch();
      this.launches += 1;
      const browser = await engine.newContext();
      const page = await browser.newPage();
      const session: RenderingSession<P> = {
        engine,
        browser,
        page,
        startedAt: Date.now(),
      };
      this.session = session;
      this.log.info({ launches: this.launches }, "rendering session started");
      return session;
    } catch (error) {
      if (engine) {
        await engine.close().catch((closeError: unknown) => {
          this.log.warn({ reason: errorMessage(closeError) }, "engine close after failed start failed");
        });
      }
      throw toTransientAgentError(error, "launch", "Rendering session launch");
    }
  }
}

export function chromiumLauncher(options: { headless: boolean }): EngineLauncher<Page> {
  return () => chromium.launch({ headless: options.headless });
}
