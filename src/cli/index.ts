#!/usr/bin/env node
import { run, subcommands } from "cmd-ts";
import { revise } from "./commands/revise";
import { prompts } from "./commands/prompts";
import { loadEnvFile } from "./utils";
import { VERSION } from "../constants";
import { error } from "../logging";

// cmd-ts calls process.exit(1) for --help, override to exit 0
const isHelp = process.argv.includes("--help") || process.argv.includes("-h");
if (isHelp) {
  const originalExit = process.exit;
  process.exit = ((code?: number) => {
    originalExit(0);
  }) as typeof process.exit;
}

loadEnvFile();

const app = subcommands({
  name: "manuscript-reviser",
  description: "Revise the prose of a Markdown manuscript with a completion model",
  version: VERSION,
  cmds: {
    revise,
    prompts,
  },
});

run(app, process.argv.slice(2)).catch((e: unknown) => {
  error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
