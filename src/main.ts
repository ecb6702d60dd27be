/**
 * CLI entrypoint: evaluates one password and prints a JSON report
 *
 * Usage:
 *   npm run evaluate -- "correct horse"
 *   echo "correct horse" | npm run evaluate
 *   npm run evaluate -- --user-input alice --user-input 1990 --lang zh_CN "alice1990"
 *
 * Environment variables (optional, .env supported):
 *   - PASSWORD_MAX_LENGTH: Longest password accepted (defaults to 72)
 *   - PASSWORD_LANGUAGE: Feedback language (defaults to en)
 *   - CRACKSCORE_DATA_DIR: Data directory (defaults to data)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import { buildReport } from "./cli";
import { PasswordEstimator } from "./estimator";
import * as logger from "./logger";

type CliOptions = {
  userInput: string[];
  lang?: string;
  maxLength?: number;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8").replace(/\r?\n$/, "");
}

async function main() {
  const program = new Command();
  program
    .name("crackscore")
    .description("Estimate how many guesses a password takes to crack")
    .argument("[password]", "password to evaluate (read from stdin when omitted)")
    .option("-u, --user-input <value>", "word known to relate to the user (repeatable)", collect, [])
    .option("-l, --lang <tag>", "feedback language tag")
    .option("-m, --max-length <n>", "longest password accepted", positiveInt);

  await program.parseAsync(process.argv);

  const options = program.opts<CliOptions>();
  const [argument] = program.args;
  const password = argument ?? (await readStdin());

  const estimator = new PasswordEstimator({
    language: options.lang,
    maxLength: options.maxLength,
    userInputs: options.userInput,
  });
  const result = estimator.setPassword(password);

  logger.info("Password evaluated", {
    score: result.score,
    language: estimator.getLanguage(),
  });
  console.log(
    JSON.stringify(buildReport(result, estimator.getTranslator()), null, 2),
  );
}

main().catch((error: unknown) => {
  logger.error("Evaluation failed", {
    error: error instanceof Error ? error.message : String(error),
    name: error instanceof Error ? error.name : undefined,
  });
  process.exit(1);
});
