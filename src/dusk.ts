#!/usr/bin/env node

// ============================================================================
// DUSK CLI
// ============================================================================
// serve    run the tRPC server with the notification scheduler
// chat     talk to the engine in this terminal (in-process)
// send     send one message to a running server
// watch    print a user's notifications from a running server as they arrive
// tasks    list a user's tasks; stats shows their analytics
// digest   send a user's daily digest now
// config   show or change the configuration

import { createInterface } from "readline";

import { DuskConfig, LLMConfig } from "./types/index.js";
import { loadConfig, saveConfig, updateLLMConfig, describeConfig, getConfigPath } from "./config/index.js";
import { setLogLevel } from "./logging/index.js";
import { AppContext, createAppContext } from "./app/context.js";
import { startServerCLI } from "./server/index.js";
import { DEFAULT_SERVER_URL, createDuskClient, checkServerHealth, watchNotifications } from "./client/index.js";
import { formatAnalytics, formatTaskList } from "./format/index.js";
import { describeError } from "./errors/index.js";

const DEFAULT_USER = "local";

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

interface ParsedArgs {
  command: string;
  params: Record<string, string>;
  rest: string[];
}

const VALUE_FLAGS = new Set(["--user", "--url", "--port", "--provider", "--model", "--region", "--base-url", "--timeout"]);

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { command: "help", params: {}, rest: [] };
  if (args.length === 0) return result;

  result.command = args[0];
  let i = 1;
  while (i < args.length) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg) && args[i + 1] !== undefined) {
      result.params[arg.slice(2)] = args[i + 1];
      i += 2;
    } else {
      result.rest.push(arg);
      i++;
    }
  }
  return result;
}

// ============================================================================
// COMMANDS
// ============================================================================

async function chat(config: DuskConfig, userId: string) {
  const app = await createAppContext(config);
  if (config.scheduler.enabled) app.scheduler.start();

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("\x1b[1myou\x1b[0m ");
  console.log(`\x1b[90mChatting as ${userId}. Type "exit" to leave.\x1b[0m\n`);

  try {
    const first = await app.orchestrator.handleMessage({ userId, text: "hello" });
    console.log(`\x1b[36mdusk\x1b[0m ${first.reply}\n`);
    rl.prompt();

    for await (const line of rl) {
      if (line.trim() === "exit") break;
      if (line.trim()) {
        const { reply } = await app.orchestrator.handleMessage({ userId, text: line });
        console.log(`\x1b[36mdusk\x1b[0m ${reply}\n`);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    await app.close();
  }
}

async function send(url: string, userId: string, text: string) {
  if (!text) {
    console.error(`\x1b[31mUsage: dusk send [--user <id>] [--url <url>] <message>\x1b[0m`);
    process.exit(1);
  }
  const client = createDuskClient({ url });
  const { reply } = await client.chat.send.mutate({ userId, text });
  console.log(reply);
}

async function watch(url: string, userId: string) {
  console.log(`\x1b[90mWatching notifications for ${userId} at ${url}. Press Ctrl+C to stop.\x1b[0m\n`);

  await new Promise<void>((resolve, reject) => {
    const stop = watchNotifications({
      url,
      userId,
      onNotification: (n) => console.log(`\x1b[36m${n.kind}\x1b[0m ${n.text}\n`),
      onError: (message) => {
        stop();
        reject(new Error(message));
      },
    });
    process.once("SIGINT", () => {
      stop();
      resolve();
    });
  });
}

async function withApp(config: DuskConfig, work: (app: AppContext) => Promise<void>) {
  const app = await createAppContext(config);
  try {
    await work(app);
  } finally {
    await app.close();
  }
}

function configure(config: DuskConfig, params: Record<string, string>) {
  const provider = params.provider;
  if (!provider && !params.model && !params.region && !params["base-url"] && !params.timeout) {
    console.log(`\n\x1b[36mConfig\x1b[0m (${getConfigPath()})\n`);
    console.log(describeConfig(config));
    console.log();
    return;
  }

  const llm: Partial<LLMConfig> = {};
  if (provider === "bedrock" || provider === "openai" || provider === "local") {
    llm.provider = provider;
  } else if (provider) {
    console.error(`\x1b[31mUnknown provider: ${provider} (bedrock, openai, local)\x1b[0m`);
    process.exit(1);
  }

  const target = llm.provider ?? config.llm.provider;
  if (target === "bedrock" && (params.model || params.region)) {
    llm.bedrock = {
      model: params.model ?? config.llm.bedrock?.model,
      region: params.region ?? config.llm.bedrock?.region,
    };
  }
  if (target === "openai" && params["base-url"] && params.model) {
    llm.openai = { baseUrl: params["base-url"], model: params.model, apiKey: process.env.OPENAI_API_KEY ?? "" };
  }
  if (target === "local" && params["base-url"] && params.model) {
    llm.local = { baseUrl: params["base-url"], model: params.model };
  }
  if (params.timeout) {
    const timeoutMs = Number(params.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      console.error(`\x1b[31mTimeout must be a positive number of milliseconds\x1b[0m`);
      process.exit(1);
    }
    llm.timeoutMs = timeoutMs;
  }

  const updated = updateLLMConfig(config, llm);
  saveConfig(updated);
  console.log(`\x1b[32m✓ Config saved\x1b[0m\n`);
  console.log(describeConfig(updated));
}

function showHelp() {
  console.log(`
\x1b[36m┌─────────────────────────────────────────┐
│  \x1b[1mdusk\x1b[0m\x1b[36m - Conversational Task Tracking      │
└─────────────────────────────────────────┘\x1b[0m

\x1b[33mServer:\x1b[0m
  dusk serve [--port <n>]              Run the API and the scheduler
  dusk status [--url <url>]            Check a running server

\x1b[33mConversation:\x1b[0m
  dusk chat [--user <id>]              Chat in this terminal
  dusk send [--user <id>] <message>    Send one message to a server
  dusk watch [--user <id>]             Print notifications as they arrive

\x1b[33mTasks:\x1b[0m
  dusk tasks [--user <id>]             List tasks
  dusk stats [--user <id>]             Completion statistics
  dusk digest [--user <id>]            Send today's digest now

\x1b[33mConfig:\x1b[0m
  dusk config                          Show configuration
  dusk config --provider <name> [--model <m>] [--region <r>] [--base-url <url>]
  dusk config --timeout <ms>           Completion timeout
`);
}

// ============================================================================
// MAIN
// ============================================================================

async function main() {
  const { command, params, rest } = parseArgs(process.argv.slice(2));
  const userId = params.user ?? DEFAULT_USER;
  const url = params.url ?? DEFAULT_SERVER_URL;

  if (command === "help" || command === "--help") {
    showHelp();
    return;
  }

  if (command === "status") {
    const healthy = await checkServerHealth(url);
    console.log(healthy ? `\x1b[32m✓ Server is up at ${url}\x1b[0m` : `\x1b[31m✗ No server at ${url}\x1b[0m`);
    if (!healthy) process.exit(1);
    return;
  }

  if (command === "send") {
    await send(url, userId, rest.join(" "));
    return;
  }

  if (command === "watch") {
    await watch(url, userId);
    return;
  }

  const config = loadConfig();
  setLogLevel(config.log.level);

  switch (command) {
    case "serve":
      await startServerCLI(params.port ? Number(params.port) : undefined);
      break;

    case "chat":
      await chat(config, userId);
      break;

    case "tasks":
      await withApp(config, async (app) => {
        const user = await app.orchestrator.getUser(userId);
        const tasks = await app.storage.listTasks(userId);
        console.log(tasks.length ? formatTaskList(tasks, user.timezone) : "No tasks yet.");
      });
      break;

    case "stats":
      await withApp(config, async (app) => {
        console.log(formatAnalytics(await app.storage.getAnalytics(userId)));
      });
      break;

    case "digest":
      await withApp(config, async (app) => {
        const outcome = await app.scheduler.sendDigestNow(userId);
        if (outcome !== "sent") console.log(`\x1b[33mDigest ${outcome}\x1b[0m`);
      });
      break;

    case "config":
      configure(config, params);
      break;

    default:
      showHelp();
  }
}

main().catch((error: unknown) => {
  console.error(`\n\x1b[31m✗ Error:\x1b[0m ${describeError(error)}`);
  process.exit(1);
});
