import yargs from "yargs";
import { runGenerate } from "./commands/generate.js";
import { runInit } from "./commands/init.js";
import { runLengths } from "./commands/lengths.js";
import { WORD_COUNT_RANGE, WORD_LENGTH_RANGE } from "./core/composer.js";
import { loadSettingsDictionary, resolveSettings } from "./core/settings.js";

/**
 * Print `wordpass: <message>` and exit 1.
 */
export function handleCliError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`wordpass: ${message}\n`);
  process.exit(1);
}

/**
 * With no arguments: the interactive generator on a terminal, a single
 * password otherwise.
 */
export async function runWithoutArguments(stdinIsTTY: boolean): Promise<void> {
  if (!stdinIsTTY) {
    await runGenerate();
    return;
  }
  const settings = await resolveSettings();
  const dictionary = await loadSettingsDictionary(settings);
  const { render } = await import("ink");
  const React = await import("react");
  const { App } = await import("./tui/App.js");
  const { waitUntilExit } = render(React.createElement(App, { dictionary, settings }));
  await waitUntilExit();
}

const lengthDescription = `(${WORD_LENGTH_RANGE.min}-${WORD_LENGTH_RANGE.max})`;

export function buildCli(args: string[]) {
  return yargs(args)
    .scriptName("wordpass")
    .usage("$0 [command] [options]")
    .option("config", {
      type: "string",
      describe: "Config file (default: $WORDPASS_CONFIG or ~/.config/wordpass/config.toml)",
    })
    .command(
      ["generate", "gen"],
      "Generate passwords",
      (yargs) =>
        yargs
          .option("min", { type: "number", describe: `Minimum word length ${lengthDescription}` })
          .option("max", { type: "number", describe: `Maximum word length ${lengthDescription}` })
          .option("words", {
            type: "number",
            describe: `Words per password (${WORD_COUNT_RANGE.min}-${WORD_COUNT_RANGE.max})`,
          })
          .option("count", {
            alias: "n",
            type: "number",
            describe: "Number of passwords to print",
          })
          .option("dictionary", {
            alias: "d",
            type: "string",
            describe: "Dictionary file or http(s) URL (.csv or .json)",
          })
          .option("symbols", { type: "string", describe: "Characters to draw symbols from" })
          .option("seed", { type: "number", describe: "Seed for reproducible output" })
          .option("copy", { alias: "c", type: "boolean", describe: "Copy to the clipboard" }),
      async (argv) => {
        try {
          await runGenerate({
            configPath: argv.config,
            minWordLength: argv.min,
            maxWordLength: argv.max,
            wordCount: argv.words,
            count: argv.count,
            dictionary: argv.dictionary,
            symbols: argv.symbols,
            seed: argv.seed,
            copy: argv.copy,
          });
        } catch (err: unknown) {
          handleCliError(err);
        }
      },
    )
    .command(
      "lengths",
      "List word lengths available in the dictionary",
      (yargs) =>
        yargs
          .option("min", { type: "number", describe: `Minimum word length ${lengthDescription}` })
          .option("max", { type: "number", describe: `Maximum word length ${lengthDescription}` })
          .option("dictionary", {
            alias: "d",
            type: "string",
            describe: "Dictionary file or http(s) URL (.csv or .json)",
          }),
      async (argv) => {
        try {
          await runLengths({
            configPath: argv.config,
            minWordLength: argv.min,
            maxWordLength: argv.max,
            dictionary: argv.dictionary,
          });
        } catch (err: unknown) {
          handleCliError(err);
        }
      },
    )
    .command(
      "init",
      "Write a config file with the default settings",
      (yargs) =>
        yargs.option("force", {
          type: "boolean",
          default: false,
          describe: "Overwrite an existing file",
        }),
      async (argv) => {
        try {
          await runInit({ configPath: argv.config, force: argv.force });
        } catch (err: unknown) {
          handleCliError(err);
        }
      },
    )
    .demandCommand(1, "Run 'wordpass --help' for usage information")
    .strict()
    .help()
    .version("0.1.0");
}
