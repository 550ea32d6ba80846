#!/usr/bin/env node
import { Command } from "commander";
import { prepareBriefing, runBriefing } from "../briefing/run.js";
import { BriefingError, StartupConfigError, describeError } from "../errors.js";
import { maskSecrets } from "../logging/logger.js";
import { VERSION } from "../version.js";

type RunOptions = {
  feeds?: string;
  symbols?: string;
  dryRun?: boolean;
  out?: string;
};

function parseSymbolList(value: string): string[] {
  return value.split(",");
}

const program = new Command();

program
  .name("market-briefing")
  .description("Collect headlines and quotes, summarize them and email the briefing")
  .version(VERSION);

program
  .command("run")
  .description("Run one briefing")
  .option("--feeds <path>", "Feed configuration JSON (default: config/feeds.json)")
  .option("--symbols <list>", "Comma-separated ticker symbols")
  .option("--dry-run", "Render the report without sending email")
  .option("--out <file>", "Where a dry run writes the HTML ('-' for stdout)", "-")
  .action(async (opts: RunOptions) => {
    try {
      const { deps } = prepareBriefing({
        feedsPath: opts.feeds,
        symbols: opts.symbols ? parseSymbolList(opts.symbols) : undefined,
        dryRun: opts.dryRun === true,
        outPath: opts.out,
      });
      await runBriefing(deps);
    } catch (err) {
      if (err instanceof StartupConfigError) {
        console.error(`Configuration error: ${err.message}`);
      } else {
        const label = err instanceof BriefingError ? err.name : "Unexpected error";
        console.error(`${label}: ${maskSecrets(describeError(err))}`);
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
