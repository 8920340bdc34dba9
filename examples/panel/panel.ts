import { openai } from "@ai-sdk/openai";
import { readFileSync, existsSync } from "fs";
import {
  createLoom,
  createLibsqlDb,
  consoleLogger,
  loadConfig,
  GenerativeAgent,
  PromptMatrix,
} from "../../loom/index.js";

// Load .env if OPENAI_API_KEY not already set
if (!process.env.OPENAI_API_KEY) {
  const envPath = new URL(".env", import.meta.url).pathname;
  if (existsSync(envPath)) {
    for (const line of readFileSync(envPath, "utf-8").split("\n")) {
      const m = line.match(/^\s*([\w]+)\s*=\s*(.*)\s*$/);
      if (m && m[1] && m[2] !== undefined) process.env[m[1]] = m[2];
    }
  }
}

if (!process.env.OPENAI_API_KEY) {
  console.error("OPENAI_API_KEY is required. Set it in your environment or in examples/panel/.env");
  process.exit(1);
}

const topic = process.argv.slice(2).join(" ");
if (!topic) {
  console.error("Usage: node dist/examples/panel/panel.js <topic>");
  process.exit(1);
}

const config = loadConfig();
const logger = consoleLogger("panel");

// Two panelists, three rounds. Later rounds quote the earlier answers by ref.
const agents = [
  new GenerativeAgent({
    name: "optimist",
    model: openai(config.model),
    systemContext: "You argue for {topic}. Keep answers under 80 words.",
  }),
  new GenerativeAgent({
    name: "skeptic",
    model: openai(config.model),
    systemContext: "You argue against {topic}. Keep answers under 80 words.",
  }),
];

const prompts = new PromptMatrix([
  [
    "Open the debate on {topic}.",
    "Respond to your opponent: {Agent_1_Step_0_response}",
    "Close the debate. Your opponent said: {Agent_1_Step_1_response}",
  ],
  [
    "Open the debate on {topic}.",
    "Respond to your opponent: {Agent_0_Step_1_response}",
    null,
  ],
]);

const { db } = createLibsqlDb({ url: config.databaseUrl, authToken: config.authToken });
const loom = createLoom({ db, logger, eventsTtlMs: config.eventsTtlMs });
await loom.migrate();

const { chainId, chain } = await loom.createChain({ prompts, agents, context: { topic } });

for (const result of await loom.drain(chainId)) {
  if (result.outcome === "step") {
    const { address, result: text } = result.completion;
    const who = address ? agents[address.agentIndex]?.name : "?";
    console.log(`\n[${who}, round ${(address?.stepIndex ?? 0) + 1}]\n${String(text)}`);
  } else if (result.outcome === "retry") {
    console.error(`step failed (attempt ${result.attempt}): ${result.error}`);
    process.exit(1);
  }
}

console.log(`\nchain ${chainId}: ${chain.status}`);
await loom.gcEventsIfDue();
