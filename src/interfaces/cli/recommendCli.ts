import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import type { CatalogGateway } from "@/application/services/types";
import type { RecommendationList, SimilarBook } from "@/domain/entities/Book";
import type { GoodreadsConfig, RecommendOptions } from "@/shared/config/Config";
import type { Logger } from "@/shared/logging/Logger";

import { DefaultRecommendationAggregator } from "@/application/services/RecommendationAggregator";
import { RecommendBooksUseCase } from "@/application/usecases/RecommendBooksUseCase";
import { normalizeError } from "@/domain/errors/AppError";
import { AxiosHttpClient } from "@/infrastructure/http/HttpClient";
import { OAuthSigner } from "@/infrastructure/http/OAuthSigner";
import { GoodreadsGateway } from "@/infrastructure/http/gateways/GoodreadsGateway";
import { MAX_TIMEOUT_MS } from "@/shared/concurrency/Deadline";
import { loadConfigFile } from "@/shared/config/FileConfig";
import { ConsoleLogger } from "@/shared/logging/ConsoleLogger";

export const USAGE = "Usage: shelf-recs <config-file> [options]";
export const MISSING_CONFIG_MESSAGE = "Please, specify path to config file";
export const NOTHING_FOUND_MESSAGE = "Nothing found, leave me alone :(";
export const TIMEOUT_MESSAGE = "Not enough time :(";

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_NUMBER_BOOKS = 10;

export type ParsedCli =
  | { kind: "help"; text: string }
  | { kind: "invalid"; message: string }
  | { kind: "missing-config" }
  | { kind: "run"; configPath: string; options: RecommendOptions; verbose: boolean };

const POSITIVE_INTEGER_OPTIONS = ["timeout-ms", "number-books", "concurrency"] as const;

const isPositiveInteger = (value: unknown): boolean => Number.isInteger(value) && Number(value) >= 1;

function buildParser(args: string[]) {
  return yargs(args)
    .scriptName("shelf-recs")
    .usage("$0 <config-file> [options]\n\nRecommends books similar to the ones on your read shelf.")
    .option("timeout-ms", {
      alias: "t",
      type: "number",
      description: "Milliseconds to wait before giving up",
      default: DEFAULT_TIMEOUT_MS
    })
    .option("number-books", {
      alias: "n",
      type: "number",
      description: "How many books to recommend",
      default: DEFAULT_NUMBER_BOOKS
    })
    .option("user-id", {
      alias: "u",
      type: "number",
      description: "Goodreads user id; skips the authenticated user lookup"
    })
    .option("concurrency", {
      alias: "c",
      type: "number",
      description: "Similar-book lookups in flight at once",
      default: 1
    })
    .option("skip-failed", {
      type: "boolean",
      description: "Skip books whose similar-book lookup fails instead of giving up",
      default: false
    })
    .option("verbose", {
      alias: "v",
      type: "boolean",
      description: "Debug logging on stderr",
      default: false
    })
    .check((argv) => {
      for (const key of POSITIVE_INTEGER_OPTIONS) {
        if (!isPositiveInteger(argv[key])) {
          throw new Error(`--${key} must be a positive integer`);
        }
      }
      if (argv["timeout-ms"] > MAX_TIMEOUT_MS) {
        throw new Error(`--timeout-ms must be at most ${MAX_TIMEOUT_MS}`);
      }
      if (argv["user-id"] !== undefined && !isPositiveInteger(argv["user-id"])) {
        throw new Error("--user-id must be a positive integer");
      }
      return true;
    })
    .help()
    .alias("help", "h")
    .version(false)
    .strictOptions()
    .wrap(null);
}

export function parseCliArguments(argv: string[]): Promise<ParsedCli> {
  const args = hideBin(argv);

  return new Promise((resolve) => {
    buildParser(args).parse(args, {}, (error, parsed, output) => {
      if (error) {
        resolve({ kind: "invalid", message: error.message });
        return;
      }
      if (output) {
        resolve({ kind: "help", text: output });
        return;
      }

      const [configPath] = parsed._;
      if (configPath === undefined || String(configPath).trim() === "") {
        resolve({ kind: "missing-config" });
        return;
      }

      resolve({
        kind: "run",
        configPath: String(configPath),
        verbose: parsed.verbose,
        options: {
          timeoutMs: parsed["timeout-ms"],
          numberBooks: parsed["number-books"],
          concurrency: parsed.concurrency,
          skipFailed: parsed["skip-failed"],
          userId: parsed["user-id"]
        }
      });
    });
  });
}

export function formatBook(book: SimilarBook): string {
  const authors = book.authors.map((author) => author.name).join(", ");
  return `"${book.title}" by ${authors}\nMore: ${book.link}`;
}

export function formatRecommendations(books: RecommendationList): string[] {
  return books.flatMap((book, index) => [`#${index + 1}`, formatBook(book), ""]);
}

export interface CliDependencies {
  print: (line: string) => void;
  loadConfig: (configPath: string) => GoodreadsConfig;
  createLogger: (verbose: boolean) => Logger;
  createGateway: (config: GoodreadsConfig, logger: Logger) => CatalogGateway;
}

const defaultDependencies: CliDependencies = {
  print: (line) => {
    console.log(line);
  },
  loadConfig: loadConfigFile,
  createLogger: (verbose) => new ConsoleLogger("shelf-recs", verbose ? "debug" : undefined),
  createGateway: (config, logger) => new GoodreadsGateway(new AxiosHttpClient(), new OAuthSigner(config), config, logger)
};

export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const parsed = await parseCliArguments(argv);

  switch (parsed.kind) {
    case "help":
      deps.print(parsed.text);
      return 0;
    case "invalid":
      deps.print(parsed.message);
      return 1;
    case "missing-config":
      deps.print(MISSING_CONFIG_MESSAGE);
      deps.print(USAGE);
      return 1;
    case "run":
      break;
  }

  const { configPath, options, verbose } = parsed;
  const logger = deps.createLogger(verbose);

  let config: GoodreadsConfig;
  try {
    config = deps.loadConfig(configPath);
  } catch (error) {
    deps.print(`Config error: ${normalizeError(error).message}`);
    return 1;
  }

  const aggregator = new DefaultRecommendationAggregator({
    gateway: deps.createGateway(config, logger),
    logger,
    concurrency: options.concurrency,
    failurePolicy: options.skipFailed ? "skip" : "abort"
  });
  const useCase = new RecommendBooksUseCase({ aggregator, logger });

  const outcome = await useCase.execute({
    numberBooks: options.numberBooks,
    timeoutMs: options.timeoutMs,
    userId: options.userId ?? config.userId
  });

  switch (outcome.kind) {
    case "recommended":
      for (const line of formatRecommendations(outcome.books)) {
        deps.print(line);
      }
      return 0;
    case "empty":
      deps.print(NOTHING_FOUND_MESSAGE);
      return 0;
    case "timed-out":
      deps.print(TIMEOUT_MESSAGE);
      return 0;
    case "failed":
      deps.print(NOTHING_FOUND_MESSAGE);
      return 1;
  }
}
