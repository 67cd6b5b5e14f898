import chalk from "chalk";
import inquirer from "inquirer";
import ora from "ora";
import { errorMessage } from "../../../runtime/src/errors.js";
import { GatewayClient } from "../utils/gateway-client.js";

export interface ChatOptions {
  session: string;
  url: string;
}

export async function chatCommand(options: ChatOptions) {
  console.log(chalk.cyan.bold("\n💬 Lucid Chat\n"));

  const client = new GatewayClient(options.url);
  const spinner = ora("Connecting to the gateway...").start();
  if (!(await client.health())) {
    spinner.fail(`Gateway is not reachable at ${options.url}`);
    console.log(chalk.yellow("Start it with: lucid serve\n"));
    process.exitCode = 1;
    return;
  }
  spinner.succeed(`Connected (session ${options.session})`);
  console.log(chalk.gray('Type "exit" or "quit" to end, "/clear" to forget this session\n'));

  while (true) {
    const { message } = await inquirer.prompt<{ message: string }>([
      {
        type: "input",
        name: "message",
        message: chalk.blue("You:"),
        prefix: "",
      },
    ]);

    const text = message.trim();
    if (text.toLowerCase() === "exit" || text.toLowerCase() === "quit") break;
    if (!text) continue;

    if (text === "/clear") {
      await client.clearHistory(options.session);
      console.log(chalk.gray("History cleared.\n"));
      continue;
    }

    const thinking = ora("Lucid is thinking...").start();
    try {
      const reply = await client.chat(options.session, text);
      thinking.stop();
      console.log(chalk.green("\nLucid:"), `${reply.response}\n`);
      if (reply.outcome) {
        console.log(chalk.dim(`  route: ${reply.outcome}${reply.term ? ` (${reply.term})` : ""}\n`));
      }
    } catch (error) {
      thinking.fail("Error talking to the gateway");
      console.error(chalk.red(`${errorMessage(error)}\n`));
    }
  }

  console.log(chalk.cyan("\n👋 Goodbye!\n"));
}
