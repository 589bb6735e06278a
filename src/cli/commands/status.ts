import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config";
import { isUnconfirmedStatus, loadFileRecord } from "../../core";
import { errorMessage } from "../../utils";
import { applyLogging, openRuntime } from "../runtime";
import { color, colorStatus, formatTableRow, formatTableSeparator, TABLE_WIDTHS, truncateStart, ui } from "../ui";

export async function statusCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      ...INLINE_CONFIG_OPTIONS,
      complete: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (positionals.length === 0) {
    ui.error("No files given");
    printHelp();
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    applyLogging(config, values.verbose);

    const runtime = await openRuntime(config);
    try {
      const widths = [TABLE_WIDTHS.file, TABLE_WIDTHS.status, TABLE_WIDTHS.backup];
      console.log(formatTableRow([color.bold("File"), color.bold("Status"), color.bold("Backup")], widths));
      console.log(formatTableSeparator(widths));

      let errors = 0;
      for (const file of positionals) {
        try {
          const record = await loadFileRecord(file, { policy: runtime.policy });
          let evaluation = await runtime.evaluator.evaluate(record);
          if (values.complete && isUnconfirmedStatus(evaluation.status)) {
            evaluation = await runtime.evaluator.ensureBackupChecksum(evaluation);
          }
          const backup = evaluation.chosen?.record.location ?? "";
          console.log(
            formatTableRow(
              [
                truncateStart(record.location ?? file, TABLE_WIDTHS.file),
                colorStatus(evaluation.status),
                truncateStart(backup, TABLE_WIDTHS.backup),
              ],
              widths,
            ),
          );
        } catch (error) {
          errors++;
          console.log(
            formatTableRow(
              [truncateStart(file, TABLE_WIDTHS.file), color.red("ERROR"), errorMessage(error)],
              widths,
            ),
          );
        }
      }
      return errors > 0 ? 1 : 0;
    } finally {
      runtime.close();
    }
  } catch (error) {
    ui.error(`Status failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("tierkeep status")} - Show the backup status of files

${color.dim("USAGE:")}
  tierkeep status <file...> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>   Path to config file (default: ./tierkeep.config.yaml)
      --complete        Compute missing checksums for unconfirmed backups
  -v, --verbose         Verbose output
  -h, --help            Show this help message

${color.dim("STATUS:")}
  VALID_ON_<TIER>         A copy with the same size and checksum exists
  UNCONFIRMED_ON_<TIER>   A copy exists but a checksum is missing on one side
  POSSIBLE_UNSYNCED       Copies exist but differ from this file
  NO_BACKUPS_IN_FILESYSTEM, NO_COPIES_IN_STORE, NO_MATCHES, NO_CHECKSUMS
`);
}
