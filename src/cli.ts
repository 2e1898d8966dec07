#!/usr/bin/env node
// Restore cursor visibility on exit; Ink hides the cursor and may not
// restore it if the process is killed or crashes.
process.on("exit", () => {
  if (process.stdout.isTTY) process.stdout.write("\x1B[?25h");
});

import { hideBin } from "yargs/helpers";
import { buildCli, handleCliError, runWithoutArguments } from "./program.js";

const args = hideBin(process.argv);

if (args.length === 0) {
  try {
    await runWithoutArguments(Boolean(process.stdin.isTTY));
  } catch (err: unknown) {
    handleCliError(err);
  }
  process.exit(0);
}

await buildCli(args).parseAsync();
