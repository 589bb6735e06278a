import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config";
import { FolderIndexer } from "../../core";
import { errorMessage } from "../../utils";
import { applyLogging, openRuntime } from "../runtime";
import { color, formatSummary, ui } from "../ui";

export async function indexCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      ...INLINE_CONFIG_OPTIONS,
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
    ui.error("No directories given to index");
    printHelp();
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    applyLogging(config, values.verbose);

    ui.intro("tierkeep index");

    const runtime = await openRuntime(config);
    try {
      const indexer = new FolderIndexer({
        store: runtime.store,
        policy: runtime.policy,
        regenerateThresholdBytes: config.checksum.regenerateThresholdBytes,
        concurrency: config.concurrency,
        collect: {
          recursive: config.clear.includeSubfolders,
          include: config.clear.include,
          exclude: config.clear.exclude,
        },
      });

      let indexed = 0;
      let reused = 0;
      let failed = 0;
      for (const folder of positionals) {
        const s = ui.spinner();
        s.start(`Indexing ${folder}...`);
        const result = await indexer.index(folder);
        s.stop(`Indexed ${folder}`);
        indexed += result.indexed;
        reused += result.reused;
        failed += result.failures.length;
        for (const failure of result.failures) {
          ui.error(`${failure.location}: ${failure.error}`);
        }
      }

      ui.note(
        formatSummary([
          { label: "Hashed", value: indexed },
          { label: "From store", value: reused },
          { label: "Failed", value: failed },
          { label: "Store entries", value: runtime.store.count() },
        ]),
        "Index Summary",
      );
      ui.outro(failed > 0 ? "Index finished with errors" : "Index complete!");
      return failed > 0 ? 1 : 0;
    } finally {
      runtime.close();
    }
  } catch (error) {
    ui.error(`Index failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("tierkeep index")} - Checksum files and record them in the store

${color.dim("USAGE:")}
  tierkeep index <dir...> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>   Path to config file (default: ./tierkeep.config.yaml)
      --include <text>  Only index paths containing text (repeatable)
      --exclude <text>  Skip paths containing text (repeatable)
  -v, --verbose         Verbose output
  -h, --help            Show this help message

Files up to checksum.regenerateThresholdBytes are always hashed again; larger
files are only hashed when the store has no checksum for them.
`);
}
