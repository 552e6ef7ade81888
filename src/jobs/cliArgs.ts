import { type RepoConfig, parseRepo } from "../config.js";
import { UserInputError } from "../errors.js";

export interface CliOptions {
  repo?: RepoConfig;
  prNumber?: number;
  direction?: string;
  output?: string;
  enhance: boolean;
  illustrate: boolean;
  update?: string;
  help: boolean;
}

export const USAGE = `
📝 PR Blog Post Generator

Usage: pr-storyteller --repo owner/name --pr <number> [options]

Options:
  --repo owner/name     Repository the pull request belongs to
  --pr <number>         Pull request number
  --direction <text>    Extra direction for the article (or the revision)
  --output <path>       Output file (default: blog_post_<pr>_<yyyyMMdd>.md)
  --no-enhance          Skip enriching the article with web search results
  --no-image            Skip generating an illustration
  --update <path>       Revise an existing article in place using --direction
  --help, -h            Show this help message

Examples:
  pr-storyteller --repo acme/widgets --pr 42
  pr-storyteller --repo acme/widgets --pr 42 --direction "Focus on performance"
  pr-storyteller --update blog_post_42_20250101.md --direction "Shorten the intro"
`;

const VALUE_FLAGS = ["repo", "pr", "direction", "output", "update"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(name);
}

function parsePrNumber(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new UserInputError(`Invalid pull request number: ${raw}`);
  }
  return Number(raw);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values: Partial<Record<ValueFlag, string>> = {};
  const options: CliOptions = { enhance: true, illustrate: true, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--no-enhance") {
      options.enhance = false;
      continue;
    }
    if (arg === "--no-image") {
      options.illustrate = false;
      continue;
    }

    if (!arg.startsWith("--")) {
      throw new UserInputError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!isValueFlag(name)) {
      throw new UserInputError(`Unknown option: --${name}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      value = argv[++i];
    }
    if (value === undefined || value.length === 0) {
      throw new UserInputError(`Option --${name} requires a value`);
    }
    values[name] = value;
  }

  if (options.help) return options;

  if (values.repo !== undefined) options.repo = parseRepo(values.repo);
  if (values.pr !== undefined) options.prNumber = parsePrNumber(values.pr);
  options.direction = values.direction;
  options.output = values.output;
  options.update = values.update;

  if (!options.update && (!options.repo || options.prNumber === undefined)) {
    throw new UserInputError("Both --repo and --pr are required (or --update to revise an article)");
  }

  return options;
}
