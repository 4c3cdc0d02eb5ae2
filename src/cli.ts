#!/usr/bin/env -S npx tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";
import { Agent } from "./agent.ts";
import { parseArgs } from "./args.ts";
import { loadConfig } from "./config.ts";
import { errorMessage } from "./errors.ts";
import { buildAdapter } from "./llm.ts";
import { createLogger } from "./logger.ts";
import { agentPrompt } from "./prompts.ts";
import { ToolRegistry } from "./registry.ts";
import { registerBuiltinTools } from "./tools/index.ts";

const EXIT_WORDS = new Set(["exit", "quit", "q"]);

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || (!args.prompt && !args.interactive)) {
    printHelp();
    return;
  }
  if (args.systemPromptFile) {
    const abs = path.resolve(process.cwd(), args.systemPromptFile);
    args.overrides.systemPrompt = await fs.readFile(abs, "utf8");
  }

  const config = loadConfig(process.env, args.overrides);
  const registry = registerBuiltinTools(new ToolRegistry());
  const logger = createLogger({
    provider: config.provider,
    model: config.model,
    logJsonPath: config.logJsonPath,
    enableHumanLogs: config.enableHumanLogs,
    enableFileLogs: config.enableFileLogs,
    pretty: config.prettyLogs,
  });
  const agent = new Agent({
    adapter: buildAdapter(config),
    registry,
    systemPrompt: config.systemPrompt ?? agentPrompt(registry.names()),
    maxToolRounds: config.maxToolRounds,
    requestTimeoutMs: config.requestTimeoutMs,
    retries: config.retries,
    logger,
    verbose: args.verbose,
  });

  if (args.prompt) {
    logger.human({ body: args.prompt, variant: "user" });
    await agent.interact(args.prompt);
  }
  if (args.interactive) {
    await repl(agent);
  }
}

async function repl(agent: Agent) {
  const rl = createInterface({ input, output });
  try {
    while (true) {
      const line = (await rl.question("[user] > ")).trim();
      if (!line) continue;
      if (EXIT_WORDS.has(line)) break;
      await agent.interact(line);
    }
  } finally {
    rl.close();
  }
}

function printHelp() {
  console.log(`codeqa <question> [options]
Options:
  --provider <echo|openai|azure|ollama>  LLM provider (default: echo)
  --model <name>             Model name (default: gpt-4o-mini)
  -i, --interactive          Keep asking questions until exit, quit or q
  --max-rounds <n>           Limit tool calls per question (default: 16)
  --timeout-ms <n>           Per-LLM-call timeout in milliseconds
  --retries <n>              Retry failed/timed out LLM calls (default: 0)
  --log-json <file>          Write JSON logs to file (default: .codeqa-log.jsonl)
  --no-log-json              Disable JSONL logging
  --quiet                    Suppress human-readable logs
  --pretty                   Colors and spinner
  --verbose                  Show intermediate model turns
  --system <file>            Load system prompt from file
  --help                     Show this help
`);
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
