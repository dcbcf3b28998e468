import { Command, Option } from "commander";
import { exitCodeFor, runCustomReport } from "./index.js";
import { errorMessage } from "./utils/errors.js";
import type { LogFormat } from "./utils/logger.js";

const program = new Command();
program.name("mmmr").description("Restyle media mix model reports");

program
  .command("render")
  .argument("<modelDir>", "Folder of a saved model containing its generated report")
  .option("--config <path>", "Config file path")
  .option("--out <file>", "Output file name, written inside the model folder")
  .option("--no-summary", "Do not write the JSON summary")
  .addOption(
    new Option("--log-format <format>", "Log output format").choices(["human", "json"])
  )
  .option("--verbose", "Verbose logging", false)
  .action(
    async (
      modelDir: string,
      options: {
        config?: string;
        out?: string;
        summary: boolean;
        logFormat?: LogFormat;
        verbose: boolean;
      }
    ) => {
      try {
        const result = await runCustomReport(modelDir, {
          config: options.config,
          out: options.out,
          summary: options.summary,
          logFormat: options.logFormat,
          verbose: options.verbose
        });
        process.exitCode = result.exitCode;
      } catch (error) {
        console.error(errorMessage(error));
        process.exitCode = exitCodeFor(error);
      }
    }
  );

await program.parseAsync(process.argv);
