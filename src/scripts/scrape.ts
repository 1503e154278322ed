import { runScrape } from "../lib/pipeline";
import { clearHttpCache } from "../lib/scraping/http-cache";
import { ScrapeError } from "../lib/errors";
import { parseArgs, toScrapeRequest } from "../lib/cli-args";

const USAGE = `Usage:
  tsx src/scripts/scrape.ts scrape --make <make> --model <model> --postcode <postcode> [--page <token>]...
  tsx src/scripts/scrape.ts clear-cache`;

async function main() {
  const { command, flags } = parseArgs(process.argv.slice(2));

  if (command === "clear-cache") {
    const removed = clearHttpCache();
    console.log(`[cache] cache cleaned (${removed} entries)`);
    return;
  }

  if (command === "scrape") {
    const request = toScrapeRequest(flags);
    if (!request) {
      console.error("Error: --make, --model and --postcode are required");
      console.error(USAGE);
      process.exit(1);
    }

    const runAt = new Date();
    console.log(
      `Scraping ${request.make} ${request.model} near ${request.postCode}` +
        (request.pages && request.pages.length > 0 ? ` (pages ${request.pages.join(", ")})` : "")
    );

    const result = await runScrape(request, { runAt });
    console.log(`\n=== Summary ===`);
    console.log(`Pages: ${result.pageCount}`);
    console.log(`Records: ${result.dataset.length}`);
    console.log(`Output: ${result.outputPath}`);
    return;
  }

  console.error(command ? `Unknown command: ${command}` : "Error: command required");
  console.error(USAGE);
  process.exit(1);
}

main().catch((err) => {
  if (err instanceof ScrapeError) {
    console.error(`Fatal error: ${err.name}: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
