import { BuildNotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BuildDecision, BuildMetadata, CiServer, ReportWindow } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

export function createReportWindow(
  hoursAgo: number,
  includeSuccess: boolean,
  now: Date = new Date()
): ReportWindow {
  return {
    now,
    cutoff: new Date(now.getTime() - hoursAgo * HOUR_MS),
    includeSuccess
  };
}

function isWithinWindow(build: BuildMetadata, window: ReportWindow): boolean {
  return build.timestamp.getTime() >= window.cutoff.getTime();
}

/**
 * Check if the build should appear in the report.
 */
export function isBuildIncluded(build: BuildMetadata, window: ReportWindow): boolean {
  if (!isWithinWindow(build, window)) return false;
  if (build.result === "SUCCESS" && !window.includeSuccess) return false;
  return true;
}

type WalkState = "walking" | "evaluating" | "stop";

/**
 * Walk a job's history backward from the last completed build.
 *
 * Builds are fetched one at a time. Every fetched build is yielded with its
 * inclusion decision; the first build older than the cutoff is yielded
 * (excluded) and ends the walk. Missing build numbers are skipped.
 */
export async function* walkBuilds(
  server: CiServer,
  jobName: string,
  window: ReportWindow,
  logger: Logger
): AsyncGenerator<BuildDecision> {
  const lastBuild = await server.getLastCompletedBuild(jobName);
  if (!lastBuild) {
    logger.debug(`${jobName} has no completed builds`);
    return;
  }

  let buildNumber = lastBuild.number;
  let state: WalkState = "walking";

  while (state !== "stop") {
    if (buildNumber < 1) {
      logger.debug(`Reached the start of ${jobName} history`);
      state = "stop";
      continue;
    }

    let build: BuildMetadata;
    try {
      build = await server.getBuildInfo(jobName, buildNumber);
    } catch (error) {
      if (error instanceof BuildNotFoundError) {
        logger.warn(`Skipping ${jobName} #${buildNumber}: build not found`);
        buildNumber -= 1;
        continue;
      }
      throw error;
    }

    state = "evaluating";
    const included = isBuildIncluded(build, window);
    logger.debug(
      `${jobName} #${build.number} ${build.result} ${build.timestamp.toISOString()} ${included ? "included" : "excluded"}`
    );
    yield { build, included };

    // decided strictly after inclusion, on the same comparison
    state = isWithinWindow(build, window) ? "walking" : "stop";
    buildNumber -= 1;
  }
}

/**
 * Collect the full walk for a job.
 */
export async function selectBuilds(
  server: CiServer,
  jobName: string,
  window: ReportWindow,
  logger: Logger
): Promise<BuildDecision[]> {
  const decisions: BuildDecision[] = [];
  for await (const decision of walkBuilds(server, jobName, window, logger)) {
    decisions.push(decision);
  }
  return decisions;
}
