import { ScrapeRequest } from "./types";

export interface ParsedArgs {
  command: string | undefined;
  flags: Record<string, string[]>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const flags: Record<string, string[]> = {};

  // Parse --name value pairs; repeated flags accumulate
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg.startsWith("--") && rest[i + 1] !== undefined) {
      const name = arg.slice(2);
      if (!flags[name]) flags[name] = [];
      flags[name].push(rest[i + 1]);
      i++;
    }
  }

  return { command, flags };
}

export function toScrapeRequest(flags: Record<string, string[]>): ScrapeRequest | null {
  const make = flags["make"]?.[0];
  const model = flags["model"]?.[0];
  const postCode = flags["postcode"]?.[0];
  if (!make || !model || !postCode) return null;

  // "--page 1,2,3" and repeated "--page" flags are both accepted
  const pages = (flags["page"] ?? [])
    .flatMap((p) => p.split(","))
    .map((p) => p.trim())
    .filter(Boolean);

  return { make, model, postCode, pages };
}
