import type { SignatureCatalog } from "./classifier/catalog.js";
import { classifyLog } from "./classifier/log-classifier.js";
import { createReportWindow, walkBuilds } from "./collector/build-selector.js";
import type { BuildDecision, BuildMetadata, CiServer, ReportWindow } from "./collector/types.js";
import { LogFetchError } from "./errors.js";
import type { Logger } from "./logger.js";
import { assembleReport, type ReportRow } from "./publisher/report.js";

/**
 * Everything a report run needs, built once at startup.
 */
export interface RunContext {
  readonly server: CiServer;
  readonly catalog: SignatureCatalog;
  readonly logger: Logger;
  readonly now: Date;
}

export interface ReportOptions {
  jobName: string;
  hoursAgo: number;
  includeSuccess: boolean;
}

export interface ReportResult {
  jobName: string;
  window: ReportWindow;
  decisions: BuildDecision[];
  classifications: Map<number, Set<string>>;
  rows: ReportRow[];
}

export function createRunContext(
  server: CiServer,
  catalog: SignatureCatalog,
  logger: Logger,
  now: Date = new Date()
): RunContext {
  return Object.freeze({ server, catalog, logger, now });
}

/**
 * Walk the job's recent history, classify included failures and build the
 * report rows.
 */
export async function runReport(context: RunContext, options: ReportOptions): Promise<ReportResult> {
  const { jobName } = options;
  const window = createReportWindow(options.hoursAgo, options.includeSuccess, context.now);
  const decisions: BuildDecision[] = [];
  const classifications = new Map<number, Set<string>>();

  context.logger.debug(`Reporting ${jobName} since ${window.cutoff.toISOString()}`);

  for await (const decision of walkBuilds(context.server, jobName, window, context.logger)) {
    decisions.push(decision);
    if (!decision.included) continue;
    classifications.set(decision.build.number, await classifyBuild(context, jobName, decision.build));
  }

  return {
    jobName,
    window,
    decisions,
    classifications,
    rows: assembleReport(jobName, decisions, classifications, context.catalog)
  };
}

async function classifyBuild(
  context: RunContext,
  jobName: string,
  build: BuildMetadata
): Promise<Set<string>> {
  if (build.result === "SUCCESS") {
    return new Set();
  }

  let logText: string;
  try {
    logText = await context.server.getConsoleText(jobName, build.number);
  } catch (error) {
    // A failure with an unknown cause is still worth a row
    if (error instanceof LogFetchError) {
      context.logger.warn(`${error.message}; reporting without a cause`);
      return new Set();
    }
    throw error;
  }

  const causes = classifyLog(logText, context.catalog);
  context.logger.debug(
    `${jobName} #${build.number}: ${causes.size ? [...causes].join(", ") : "no known cause"}`
  );
  return causes;
}
