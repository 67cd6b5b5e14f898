import chalk from "chalk";
import ora from "ora";
import { errorMessage } from "../../../runtime/src/errors.js";
import { GatewayClient, type TaskRun } from "../utils/gateway-client.js";

export function formatTaskRun(run: TaskRun): string[] {
  const icons = { succeeded: "✓", failed: "✗", not_attempted: "·" } as const;
  const lines = run.results.map(
    (result) => `  ${icons[result.status]} ${result.index + 1}. ${result.detail || result.status}`,
  );
  if (run.failure) {
    lines.push(`  Stopped at step ${run.failure.index + 1}: ${run.failure.reason}`);
  }
  return lines;
}

export async function tasksListCommand(options: { url: string }) {
  const client = new GatewayClient(options.url);
  try {
    const tasks = await client.listTasks();
    if (tasks.length === 0) {
      console.log(chalk.gray("No saved tasks."));
      return;
    }
    for (const task of tasks) {
      console.log(`${chalk.bold(task.name)} ${chalk.gray(task.url)}`);
      if (task.instruction) console.log(chalk.dim(`  ${task.instruction}`));
      console.log(chalk.dim(`  ${task.actions.length} step(s), saved ${task.savedAt}`));
    }
  } catch (error) {
    console.error(chalk.red(`Could not list tasks: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

export async function tasksRunCommand(name: string, options: { url: string }) {
  const client = new GatewayClient(options.url);
  const spinner = ora(`Running task '${name}'...`).start();
  try {
    const run = await client.runTask(name);
    if (run.status === "completed") {
      spinner.succeed(`Task '${run.task}' completed`);
    } else {
      spinner.fail(`Task '${run.task}' failed`);
      process.exitCode = 1;
    }
    for (const line of formatTaskRun(run)) console.log(line);
  } catch (error) {
    spinner.fail(`Could not run task '${name}': ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

export async function tasksRemoveCommand(name: string, options: { url: string }) {
  const client = new GatewayClient(options.url);
  try {
    await client.removeTask(name);
    console.log(chalk.green(`Removed task '${name}'.`));
  } catch (error) {
    console.error(chalk.red(`Could not remove task '${name}': ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}
