import { extractCommand } from "./commands/extract";
import { loadCommand } from "./commands/load";
import { searchCommand } from "./commands/search";
import { statsCommand } from "./commands/stats";

export async function runCli() {
  const command = process.argv[2];

  const runners: Record<string, () => Promise<void>> = {
    extract: extractCommand,
    load: loadCommand,
    search: searchCommand,
    stats: statsCommand,
  };

  const runner = runners[command || ""];
  if (!runner) {
    console.error(`Unknown command: ${command || "(none)"}`);
    console.error("Available commands:");
    Object.keys(runners).forEach((c) => console.error(`  ${c}`));
    process.exit(1);
  }

  try {
    await runner();
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

if (require.main === module) {
  void runCli();
}
