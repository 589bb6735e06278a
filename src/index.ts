#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { clearCommand } from "./cli/commands/clear";
import { copyCommand } from "./cli/commands/copy";
import { indexCommand } from "./cli/commands/index-folders";
import { statusCommand } from "./cli/commands/status";
import { VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan("tierkeep")} ${color.dim(`v${VERSION}`)} - Tiered storage lifecycle for session data`);

  p.note(
    `${color.cyan("clear")}       Delete files that have a validated backup
${color.cyan("copy")}        Copy files to a backup location and validate them
${color.cyan("status")}      Show the backup status of files
${color.cyan("index")}       Checksum files and record them in the store`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `tierkeep index /data/1234567890_366122_20240115      ${color.dim("# Record checksums")}
tierkeep copy /data/1234567890_366122_20240115 /archive ${color.dim("# Back up a session")}
tierkeep status /data/1234567890_366122_20240115/x.bin  ${color.dim("# Check one file")}
tierkeep clear /data --dry-run                          ${color.dim("# Preview a clear")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("tierkeep <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`tierkeep v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "clear":
      return clearCommand(commandArgs);

    case "copy":
      return copyCommand(commandArgs);

    case "status":
      return statusCommand(commandArgs);

    case "index":
      return indexCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("tierkeep --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
