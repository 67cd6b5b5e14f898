import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { ensureEnvLoaded, loadLucidConfig, type LucidConfig } from "../../runtime/src/config.js";
import { ConfigurationError, errorMessage } from "../../runtime/src/errors.js";
import { logger } from "../../runtime/src/logger.js";
import { createServices } from "./bootstrap.js";
import { buildGateway } from "./server.js";

export interface RunningGateway {
  url: string;
  stop(): Promise<void>;
}

/**
 * Load configuration, wire services and start listening. Shutdown signals
 * and fatal faults close the server, release the browser and close the log.
 */
export async function startGateway(overrides: Partial<LucidConfig["server"]> = {}): Promise<RunningGateway> {
  ensureEnvLoaded();
  const config = loadLucidConfig();
  logger.level = config.logLevel;
  const server = { ...config.server, ...overrides };

  const services = createServices(config);
  const app = await buildGateway({
    router: services.router,
    sessions: services.sessions,
    assistant: services.assistant,
    tasks: services.tasks,
    browserStatus: () => services.controller.status(),
    model: `${config.llm.provider}:${config.llm.model}`,
    corsOrigin: server.corsOrigin,
  });

  let stopping: Promise<void> | null = null;
  const stop = () => {
    stopping ??= app.close().finally(() => services.close());
    return stopping;
  };

  // The controller releases the browser first; the rest is closed here.
  services.controller.installShutdownHooks((code) => {
    void stop()
      .catch((error: unknown) => {
        logger.error({ reason: errorMessage(error) }, "shutdown failed");
      })
      .finally(() => process.exit(code));
  });

  const url = await app.listen({ port: server.port, host: server.host });
  logger.info({ url }, "gateway listening");
  return { url, stop };
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  startGateway().catch((error: unknown) => {
    const label = error instanceof ConfigurationError ? "invalid configuration" : "gateway failed to start";
    logger.fatal({ reason: errorMessage(error) }, label);
    process.exit(1);
  });
}
