import { stat } from "node:fs/promises";
import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config";
import { collectFiles, CopyOrchestrator, type CopyOutcome, loadFileRecord } from "../../core";
import { errorMessage, runPool } from "../../utils";
import { applyLogging, openRuntime } from "../runtime";
import { color, formatSummary, ui } from "../ui";

export async function copyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      ...INLINE_CONFIG_OPTIONS,
      "no-validate": { type: "boolean", default: false },
      "no-session-subdir": { type: "boolean", default: false },
      recopy: { type: "boolean", default: false },
      move: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [source, destination] = positionals;
  if (!source || !destination || positionals.length > 2) {
    ui.error("Expected a source and a destination");
    printHelp();
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    applyLogging(config, values.verbose);

    ui.intro("tierkeep copy");

    const sourceStats = await stat(source);
    const files = sourceStats.isDirectory()
      ? await collectFiles(source, { recursive: true, include: config.clear.include, exclude: config.clear.exclude })
      : [source];

    const runtime = await openRuntime(config);
    try {
      const orchestrator = new CopyOrchestrator({
        store: runtime.store,
        policy: runtime.policy,
        maxAttempts: config.copy.maxAttempts,
      });

      const s = ui.spinner();
      s.start(`Copying ${files.length} file(s) to ${destination}...`);
      const settled = await runPool(files, config.concurrency, async (file) => {
        const record = await loadFileRecord(file, { policy: runtime.policy });
        return orchestrator.copy(record, destination, {
          addSessionSubdir: !values["no-session-subdir"],
          validate: !values["no-validate"],
          allowRecopy: values.recopy,
          removeSourceOnSuccess: values.move,
        });
      });
      s.stop("Copy complete");

      const outcomes: CopyOutcome[] = [];
      let errors = 0;
      settled.forEach((result, index) => {
        if (result.ok) {
          outcomes.push(result.value);
          if (result.value.status === "failed" || result.value.status === "refused") {
            errors++;
            ui.error(`${result.value.source}: ${result.value.error?.message ?? result.value.reason ?? result.value.status}`);
          }
        } else {
          errors++;
          ui.error(`${files[index] ?? ""}: ${errorMessage(result.error)}`);
        }
      });

      const count = (status: CopyOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
      ui.note(
        formatSummary([
          { label: "Copied", value: count("copied") },
          { label: "Already valid", value: count("validated") },
          { label: "Skipped", value: count("skipped") },
          { label: "Sources removed", value: values.move ? outcomes.filter((o) => o.sourceRemoved).length : null },
          { label: "Failed", value: errors },
        ]),
        "Copy Summary",
      );

      if (errors > 0) {
        ui.outro("Copy finished with errors");
        return 1;
      }
      ui.outro("Copy complete!");
      return 0;
    } finally {
      runtime.close();
    }
  } catch (error) {
    ui.error(`Copy failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("tierkeep copy")} - Copy files to a backup location and validate them by checksum

${color.dim("USAGE:")}
  tierkeep copy <file|dir> <destination> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./tierkeep.config.yaml)
      --no-validate         Do not confirm the copy by checksum
      --no-session-subdir   Do not add the session folder to the destination
      --recopy              Copy even when the destination already holds a copy
      --move                Delete each source once its copy is validated
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("EXAMPLES:")}
  tierkeep copy /data/1234567890_366122_20240115 /archive
  tierkeep copy /data/1234567890_366122_20240115/x.bin /staging --move
`);
}
