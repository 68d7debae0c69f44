import { readFile } from "node:fs/promises";
import { parseActions } from "./actions";
import { loadConfig } from "./config";
import { createAgent, runAgent } from "./index";

async function main(): Promise<void> {
  const file = process.argv[2];
  if (!file) {
    console.error("Usage: npm run agent -- <actions.json>");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const actions = parseActions(JSON.parse(await readFile(file, "utf8")));
  const agent = createAgent(config);
  const results = await runAgent(agent, actions);

  results.forEach((result, idx) => {
    const status = result.success ? "✅" : `❌ ${result.code ?? "Error"}`;
    const value = result.value === undefined ? "" : ` = ${result.value}`;
    console.log(`  [${idx}] ${result.action}${value} ${status}`);
  });

  console.log("\n📊 Profiles:");
  for (const account of agent.engine.ledger.accounts()) {
    const profile = agent.engine.getUserProfile(account);
    console.log(
      `  ${account} | Points: ${profile.points} | Level: ${profile.level} | Streak: ${profile.streakDays} | Badges: ${profile.unlockedCount} unlocked, ${profile.mintedCount} minted`
    );
  }

  if (results.some((result) => !result.success)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(`\n❌ Agent Error: ${errorMessage}`);
  process.exitCode = 1;
});
