/**
 * Pipeline extractor CLI.
 * Usage: npm run extractor -- <command> [options]   (see USAGE in cli.ts)
 * Or: npx tsx apps/extractor/src/index.ts extract --mode standard
 */
import "dotenv/config";
import { runCli } from "./cli.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
