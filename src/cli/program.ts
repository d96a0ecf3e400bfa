import { Command, Option } from "commander";
import { RulesetError, ValidationError } from "../trafficability/errors.js";
import { evaluateTrafficability } from "../trafficability/evaluator.js";
import { explain } from "../trafficability/glossary.js";
import { DEFAULT_RULESET, FACTORS } from "../trafficability/ruleset.config.js";
import { describeRule, loadRulesetFile } from "../trafficability/ruleset.js";
import { MEASUREMENT_FIELDS, type Ruleset } from "../trafficability/types.js";
import { renderTextReport } from "./report.js";

export type CliWriters = {
  out: (s: string) => void;
  err: (s: string) => void;
};

const processWriters: CliWriters = {
  out: (s) => process.stdout.write(s),
  err: (s) => process.stderr.write(s),
};

type AssessOptions = {
  bulkDensity?: string;
  coneIndex?: string;
  smd?: string;
  tirePressure?: string;
  wheelLoad?: string;
  rutDepth?: string;
  format: "json" | "text";
  ruleset?: string;
};

type RulesetOption = { ruleset?: string };

function rulesetFrom(path: string | undefined): Ruleset {
  return path ? loadRulesetFile(path) : DEFAULT_RULESET;
}

// Validation problems exit 2, configuration problems exit 1.
function fail(cmd: Command, err: unknown): never {
  if (err instanceof ValidationError) {
    cmd.error(`error: ${err.message}`, { exitCode: 2, code: "trafficability.validation" });
  }
  if (err instanceof RulesetError) {
    cmd.error(`error: ${err.message}`, { exitCode: 1, code: "trafficability.ruleset" });
  }
  throw err;
}

/**
 * Builds the `trafficability` command tree. Every command exits through
 * commander's exit override, so `parse` throws a CommanderError instead of
 * calling process.exit.
 */
export function buildProgram(writers: CliWriters = processWriters): Command {
  const program = new Command();

  program
    .name("trafficability")
    .description("Soil trafficability & compaction advisor")
    .configureOutput({ writeOut: writers.out, writeErr: writers.err })
    .exitOverride();

  program
    .command("assess")
    .description("classify trafficability risk from six field measurements")
    .option("--bulk-density <value>", "bulk density (g/cm³)")
    .option("--cone-index <value>", "cone index (kPa)")
    .option("--smd <value>", "soil moisture deficit (mm, negative = wetter than field capacity)")
    .option("--tire-pressure <value>", "tire inflation pressure (kPa)")
    .option("--wheel-load <value>", "representative wheel load (kg)")
    .option("--rut-depth <value>", "observed rut depth (cm)")
    .addOption(new Option("--format <format>", "output format").choices(["json", "text"]).default("json"))
    .option("--ruleset <file>", "JSON ruleset replacing the default thresholds")
    .action((opts: AssessOptions, cmd: Command) => {
      try {
        const evaluation = evaluateTrafficability(
          {
            bulk_density: opts.bulkDensity,
            cone_index: opts.coneIndex,
            soil_moisture_deficit: opts.smd,
            tire_pressure: opts.tirePressure,
            wheel_load: opts.wheelLoad,
            rut_depth: opts.rutDepth,
          },
          rulesetFrom(opts.ruleset)
        );

        writers.out(
          opts.format === "text" ? renderTextReport(evaluation) : JSON.stringify(evaluation, null, 2) + "\n"
        );
      } catch (err) {
        fail(cmd, err);
      }
    });

  program
    .command("explain")
    .description("answer a short question about trafficability terms and thresholds")
    .argument("<question...>", "question, e.g. \"what BD is critical?\"")
    .option("--ruleset <file>", "JSON ruleset replacing the default thresholds")
    .action((question: string[], opts: RulesetOption, cmd: Command) => {
      try {
        writers.out(explain(question.join(" "), rulesetFrom(opts.ruleset)).answer + "\n");
      } catch (err) {
        fail(cmd, err);
      }
    });

  program
    .command("thresholds")
    .description("list the thresholds in use")
    .option("--ruleset <file>", "JSON ruleset replacing the default thresholds")
    .action((opts: RulesetOption, cmd: Command) => {
      try {
        const ruleset = rulesetFrom(opts.ruleset);
        const lines = [`Ruleset ${ruleset.version}`];
        for (const field of MEASUREMENT_FIELDS) {
          lines.push(`- ${FACTORS[field].label}: ${describeRule(ruleset, field)}`);
        }
        writers.out(lines.join("\n") + "\n");
      } catch (err) {
        fail(cmd, err);
      }
    });

  return program;
}
