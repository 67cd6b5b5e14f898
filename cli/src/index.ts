#!/usr/bin/env node
import { program } from "commander";
import chalk from "chalk";
import { chatCommand } from "./commands/chat.js";
import { tasksListCommand, tasksRemoveCommand, tasksRunCommand } from "./commands/tasks.js";
import { DEFAULT_GATEWAY_URL } from "./utils/gateway-client.js";

const gatewayUrl = process.env.LUCID_GATEWAY_URL || DEFAULT_GATEWAY_URL;

program
  .name("lucid")
  .description(chalk.cyan("Lucid, a plain-language topic assistant"))
  .version("0.1.0");

program
  .command("serve")
  .description("Start the HTTP gateway")
  .option("-p, --port <port>", "Port to listen on")
  .option("--host <host>", "Interface to bind")
  .action(async (options: { port?: string; host?: string }) => {
    const { startGateway } = await import("../../gateway/src/index.js");
    const port = options.port ? Number.parseInt(options.port, 10) : undefined;
    const running = await startGateway({
      ...(port && Number.isFinite(port) ? { port } : {}),
      ...(options.host ? { host: options.host } : {}),
    });
    console.log(chalk.green(`🚀 Gateway running on ${running.url}`));
  });

program
  .command("chat")
  .description("Chat with the assistant through a running gateway")
  .option("-s, --session <id>", "Conversation session id", "cli")
  .option("-u, --url <url>", "Gateway base URL", gatewayUrl)
  .action(chatCommand);

const tasks = program.command("tasks").description("Saved browsing tasks");

tasks
  .command("list")
  .description("List saved tasks")
  .option("-u, --url <url>", "Gateway base URL", gatewayUrl)
  .action(tasksListCommand);

tasks
  .command("run <name>")
  .description("Replay a saved task in the shared browser")
  .option("-u, --url <url>", "Gateway base URL", gatewayUrl)
  .action(tasksRunCommand);

tasks
  .command("remove <name>")
  .description("Delete a saved task")
  .option("-u, --url <url>", "Gateway base URL", gatewayUrl)
  .action(tasksRemoveCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
