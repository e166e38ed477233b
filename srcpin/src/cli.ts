#!/usr/bin/env node

import { Command, Option } from "commander";
import { pin } from "./commands/pin.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { formatDiagnostic, type Diagnostic, type LogFormat } from "./log/logger.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("srcpin")
  .description("Pin container images, HTTP downloads and git sources to immutable identifiers")
  .version(VERSION)
  .exitOverride((err) => {
    // Usage errors exit with INVALID_ARGS; --help and --version keep exit 0.
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

function report(errors: Diagnostic[], format: LogFormat): void {
  for (const err of errors) process.stderr.write(formatDiagnostic(err, format) + "\n");
}

const formatOption = () =>
  new Option("--format <format>", "Diagnostic format").choices(["human", "jsonl"]).default("human");

program
  .command("pin")
  .description("Resolve references and write a source pinning policy")
  .argument("<references...>", "References documents (YAML or JSON) extracted from build manifests")
  .option("-o, --output <file>", "Write the policy to this file")
  .option("--stdout", "Write the policy to stdout (the default)")
  .addOption(new Option("--prefer-ecr-public", "Pin official Docker Hub images to their ECR Public mirror").conflicts("preferMcr"))
  .option("--prefer-mcr", "Pin official Docker Hub images to their MCR mirror")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layered over base.yaml")
  .addOption(formatOption())
  .option("--progress", "Report per-reference progress on stderr")
  .action(
    async (
      references: string[],
      opts: {
        output?: string;
        stdout?: boolean;
        preferEcrPublic?: boolean;
        preferMcr?: boolean;
        config?: string;
        env?: string;
        format: LogFormat;
        progress?: boolean;
      },
    ) => {
      const controller = new AbortController();
      const onSignal = () => controller.abort(new Error("interrupted"));
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);

      const res = await pin({
        references,
        output: opts.output,
        stdout: opts.stdout,
        prefer: opts.preferEcrPublic ? "ecr-public" : opts.preferMcr ? "mcr" : undefined,
        configDir: opts.config,
        envName: opts.env,
        format: opts.format,
        progress: opts.progress,
        signal: controller.signal,
      });

      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);

      if (!res.ok) {
        report(res.errors, opts.format);
        process.exit(res.exitCode);
      }
    },
  );

program
  .command("validate")
  .description("Validate references documents and/or a policy file")
  .option("--references <files...>", "References documents to check")
  .option("--policy <file>", "Policy file to check")
  .addOption(formatOption())
  .action(async (opts: { references?: string[]; policy?: string; format: LogFormat }) => {
    const res = await validateAll({ references: opts.references, policy: opts.policy });

    if (!res.ok) {
      report(res.errors, opts.format);
      process.exit(EXIT.INVALID_INPUT);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", details: { checked: res.checked } }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ level: "error", code: "UNEXPECTED", message }) + "\n");
  process.exit(EXIT.RESOLUTION_FAILED);
});
