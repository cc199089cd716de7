import { Command, InvalidArgumentError } from "commander";
import { exitCodeFor, fetchCommand } from "./commands/fetch.js";

export {
  exitCodeFor,
  fetchCommand,
  type FetchCommandDeps,
  type FetchCommandOptions,
} from "./commands/fetch.js";

export function parseSectorSize(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  const size = Number(value);
  if (!Number.isSafeInteger(size)) {
    throw new InvalidArgumentError("Sector size is too large.");
  }
  return size;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("paramsync")
    .description("Fetch and verify proof parameter files")
    .version("0.1.0");

  program
    .command("fetch")
    .description("Make every parameter file in a manifest present and verified")
    .argument("<manifest>", "Path to the parameter manifest (JSON)")
    .requiredOption(
      "-s, --sector-size <bytes>",
      "Sector size whose .params files are needed",
      parseSectorSize,
    )
    .option("-g, --gateway <url>", "Gateway URL prefix override")
    .option("-d, --dir <path>", "Parameter directory override")
    .action(
      async (
        manifest: string,
        opts: { sectorSize: number; gateway?: string; dir?: string },
      ) => {
        const outcome = await fetchCommand(manifest, opts);
        process.exitCode = exitCodeFor(outcome);
      },
    );

  return program;
}
