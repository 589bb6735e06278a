import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config";
import { ClearOrchestrator, type ClearResult, expandClearTargets, FolderIndexer } from "../../core";
import { errorMessage, formatBytes, formatDuration } from "../../utils";
import { applyLogging, openRuntime } from "../runtime";
import { color, formatSummary, ui } from "../ui";

export async function clearCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      ...INLINE_CONFIG_OPTIONS,
      "no-index": { type: "boolean", default: false },
      force: { type: "boolean", short: "f", default: false },
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
    ui.error("No directories given to clear");
    printHelp();
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    applyLogging(config, values.verbose);
    const dryRun = config.clear.dryRun;

    ui.intro("tierkeep clear");

    const targets = await expandClearTargets(positionals, {
      onlySessionFolders: config.clear.onlySessionFolders,
      skipFilters: config.clear.skipFilters,
    });
    ui.step(`Checking ${targets.length} folder(s):`);
    for (const target of targets) {
      ui.message(`  ${color.dim("•")} ${target.folder}${target.includeSubfolders ? "" : color.dim(" (top level)")}`);
    }

    if (!values.force && !dryRun) {
      const confirmed = await ui.confirm({
        message: "Delete files that have a validated backup?",
        initialValue: false,
      });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Clear cancelled");
        return 1;
      }
    }

    const runtime = await openRuntime(config);
    try {
      const indexer = new FolderIndexer({
        store: runtime.store,
        policy: runtime.policy,
        regenerateThresholdBytes: config.checksum.regenerateThresholdBytes,
        concurrency: config.concurrency,
        collect: { include: config.clear.include, exclude: config.clear.exclude },
      });
      const orchestrator = new ClearOrchestrator({
        evaluator: runtime.evaluator,
        locator: runtime.locator,
        policy: runtime.policy,
        options: config.clear,
        concurrency: config.concurrency,
      });

      const started = Date.now();
      const results: ClearResult[] = [];
      for (const target of targets) {
        const s = ui.spinner();
        if (!values["no-index"]) {
          s.start(`Adding ${target.folder} to the store...`);
          await indexer.index(target.folder);
          s.stop(`Indexed ${target.folder}`);
        }
        s.start(`Clearing ${target.folder}...`);
        const result = await orchestrator.clear(target.folder, { includeSubfolders: target.includeSubfolders });
        s.stop(
          result.refused
            ? color.yellow(`Skipped ${target.folder}: ${result.refused}`)
            : `${result.filesDeleted} file(s) deleted from ${target.folder}`,
        );
        results.push(result);
      }

      const failures = results.flatMap((r) => r.failures);
      for (const failure of failures) {
        ui.error(`${failure.location}: ${failure.error}`);
      }

      ui.note(
        formatSummary([
          { label: "Checked", value: sum(results, (r) => r.checked) },
          { label: dryRun ? "Would delete" : "Deleted", value: sum(results, (r) => r.deletions.length) },
          { label: "Kept", value: sum(results, (r) => r.skipped) },
          { label: "Failed", value: failures.length },
          { label: "Recovered", value: formatBytes(sum(results, (r) => r.bytesFreed)) },
          { label: "Duration", value: formatDuration(Date.now() - started) },
        ]),
        "Clear Summary",
      );

      if (dryRun) {
        ui.warn("[DRY RUN] No files were deleted.");
      }
      if (failures.length > 0) {
        ui.outro("Clear finished with errors");
        return 1;
      }
      ui.outro("Clear complete!");
      return 0;
    } finally {
      runtime.close();
    }
  } catch (error) {
    ui.error(`Clear failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function sum(results: ClearResult[], pick: (r: ClearResult) => number): number {
  return results.reduce((total, r) => total + pick(r), 0);
}

function printHelp(): void {
  console.log(`
${color.bold("tierkeep clear")} - Delete files that have a validated backup on a tier

${color.dim("USAGE:")}
  tierkeep clear <dir...> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>          Path to config file (default: ./tierkeep.config.yaml)
      --archive <dir>          Archive tier root (also --staging, --local, --other)
      --min-age-days <n>       Only clear sessions at least n days old
      --include <text>         Only clear paths containing text (repeatable)
      --exclude <text>         Never clear paths containing text (repeatable)
      --no-subfolders          Do not descend into subfolders
      --skip-raw-data-check    Clear raw capture data without derived data on the archive tier
      --no-index               Do not add the folder to the store first
      --dry-run                Show what would be deleted without doing it
  -f, --force                  Skip the confirmation prompt
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${color.dim("SAFETY:")}
  A file is only deleted when a copy on one of the tiers has the same size
  and checksum, and that copy is checked again on disk immediately before
  the delete. Anything less keeps the file.

${color.dim("EXAMPLES:")}
  tierkeep clear /data/1234567890_366122_20240115
  tierkeep clear /data --min-age-days 7 --dry-run
`);
}
