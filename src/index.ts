#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import * as fs from "fs";

import { loadCatalog } from "./classifier/catalog.js";
import { classifyLog, explainLog } from "./classifier/log-classifier.js";
import { JenkinsClient } from "./collector/jenkins-client.js";
import {
  loadConfig,
  loadConnectionSettings,
  resolveJobName,
  type FailscopeConfig
} from "./config/failscope.config.js";
import { ConnectionConfigError, FailscopeError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { renderReportTable } from "./publisher/report.js";
import { createRunContext, runReport } from "./report-runner.js";

interface CommonOptions {
  config: string;
  causes?: string;
  verbose?: boolean;
}

interface ReportCommandOptions extends CommonOptions {
  jobName?: string;
  hoursAgo?: string;
  includeSuccess?: boolean;
  settings?: string;
  output?: string;
}

interface JobsCommandOptions {
  config: string;
  settings?: string;
}

interface ClassifyCommandOptions extends CommonOptions {
  logs: string;
  explain?: boolean;
}

const program = new Command();

program
  .name("failscope")
  .description("🔎 Match failed CI builds against known failure signatures")
  .version("0.1.0");

function fail(error: unknown): never {
  if (error instanceof ConnectionConfigError) {
    console.error(chalk.red(`\n❌ ${error.message}`));
    if (error.guidance) {
      console.error(chalk.gray(error.guidance));
    }
  } else if (error instanceof FailscopeError) {
    console.error(chalk.red(`\n❌ ${error.message}`));
  } else {
    console.error(chalk.red("\n❌ Error:"), error);
  }
  process.exit(1);
}

function parseHours(value: string | undefined, config: FailscopeConfig): number {
  if (value === undefined) return config.defaults.hours_ago;
  const hours = Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new FailscopeError(`--hours-ago must be a positive number, got "${value}"`);
  }
  return hours;
}

function createServer(config: FailscopeConfig, settingsPath?: string): JenkinsClient {
  const settings = loadConnectionSettings(settingsPath ?? config.settings_path);
  return new JenkinsClient(settings, config.request_timeout_ms);
}

// ─────────────────────────────────────────────────────────────
// REPORT command - main entry point
// ─────────────────────────────────────────────────────────────
program
  .command("report", { isDefault: true })
  .description("Report recent builds of a job with their probable failure causes")
  .option("-j, --job-name <name>", "Name or alias of job e.g. mojo_runner, lint")
  .option("-t, --hours-ago <hours>", "Time period to report on (HOURS_AGO < time < now)")
  .option("-s, --include-success", "Include successful runs")
  .option("--causes <file>", "Signature catalog file")
  .option("--config <file>", "Config file path", "failscope.yml")
  .option("--settings <file>", "Jenkins connection settings file")
  .option("--output <file>", "Also write the report rows as JSON")
  .option("--verbose", "Log every visited build")
  .action(async (options: ReportCommandOptions) => {
    const logger = createConsoleLogger(options.verbose);

    try {
      const config = loadConfig(options.config);
      const catalog = loadCatalog(options.causes ?? config.catalog_path);
      const jobName = resolveJobName(options.jobName ?? config.defaults.job_name, config);
      const hoursAgo = parseHours(options.hoursAgo, config);
      const includeSuccess = options.includeSuccess ?? config.defaults.include_success;

      const context = createRunContext(createServer(config, options.settings), catalog, logger);

      logger.info(`📥 Walking ${jobName} builds from the last ${hoursAgo}h...`);
      const result = await runReport(context, { jobName, hoursAgo, includeSuccess });

      console.log(renderReportTable(result.rows));

      if (options.output) {
        const output = {
          jobName: result.jobName,
          window: {
            cutoff: result.window.cutoff.toISOString(),
            includeSuccess: result.window.includeSuccess
          },
          rows: result.rows,
          timestamp: result.window.now.toISOString()
        };
        fs.writeFileSync(options.output, JSON.stringify(output, null, 2));
        console.log(chalk.gray(`\n📄 Report written to ${options.output}`));
      }
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// JOBS command - list job names on the server
// ─────────────────────────────────────────────────────────────
program
  .command("jobs")
  .description("List the jobs on the Jenkins server")
  .option("--config <file>", "Config file path", "failscope.yml")
  .option("--settings <file>", "Jenkins connection settings file")
  .action(async (options: JobsCommandOptions) => {
    try {
      const config = loadConfig(options.config);
      const jobs = await createServer(config, options.settings).listJobs();
      for (const job of jobs) {
        console.log(job);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// CLASSIFY command - match a local log file
// ─────────────────────────────────────────────────────────────
program
  .command("classify")
  .description("Classify a local console log against the signature catalog")
  .requiredOption("--logs <file>", "Log file to classify")
  .option("--causes <file>", "Signature catalog file")
  .option("--config <file>", "Config file path", "failscope.yml")
  .option("--explain", "Show which rules fired for each signature")
  .action((options: ClassifyCommandOptions) => {
    try {
      const config = loadConfig(options.config);
      const catalog = loadCatalog(options.causes ?? config.catalog_path);
      if (!fs.existsSync(options.logs)) {
        throw new FailscopeError(`Log file not found: ${options.logs}`);
      }
      const logText = fs.readFileSync(options.logs, "utf-8");

      if (options.explain) {
        const matches = explainLog(logText, catalog);
        for (const match of matches) {
          console.log(chalk.green(match.name));
          for (const rule of match.rules) {
            const text = rule.kind === "regex" ? `/${rule.source}/` : `"${rule.text}"`;
            console.log(chalk.gray(`   ${rule.kind} ${text}`));
          }
        }
        if (!matches.length) {
          console.log(chalk.yellow("No known cause"));
        }
        return;
      }

      const causes = classifyLog(logText, catalog);
      if (!causes.size) {
        console.log(chalk.yellow("No known cause"));
        return;
      }
      for (const name of catalog.names().filter(n => causes.has(n))) {
        const url = catalog.lookup(name)?.bug?.url;
        console.log(url ? `${name}  ${chalk.gray(url)}` : name);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// CATALOG command - show loaded signatures
// ─────────────────────────────────────────────────────────────
program
  .command("catalog")
  .description("Validate the signature catalog and list its signatures")
  .option("--causes <file>", "Signature catalog file")
  .option("--config <file>", "Config file path", "failscope.yml")
  .action((options: CommonOptions) => {
    try {
      const config = loadConfig(options.config);
      const catalog = loadCatalog(options.causes ?? config.catalog_path);
      console.log(chalk.green(`✅ ${catalog.size} signature(s)\n`));
      for (const signature of catalog.signatures) {
        const bug = signature.bug ? chalk.gray(` ${signature.bug.url}`) : "";
        console.log(`${signature.name} (${signature.rules.length} rule(s))${bug}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// Parse and run
await program.parseAsync();
