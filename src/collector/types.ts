/**
 * Types for CI build history collection
 */

export type BuildResult =
  | "SUCCESS"
  | "FAILURE"
  | "UNSTABLE"
  | "ABORTED"
  | "NOT_BUILT"
  | (string & {});

export interface BuildRef {
  number: number;
  url?: string;
}

export interface BuildMetadata {
  number: number;
  result: BuildResult;
  timestamp: Date;
  url: string;
  displayName?: string;
}

/**
 * Capabilities the report needs from a CI server.
 */
export interface CiServer {
  getLastCompletedBuild(jobName: string): Promise<BuildRef | undefined>;
  /** Rejects with BuildNotFoundError when the build number has no metadata. */
  getBuildInfo(jobName: string, buildNumber: number): Promise<BuildMetadata>;
  /** Rejects with LogFetchError when the console text cannot be retrieved. */
  getConsoleText(jobName: string, buildNumber: number): Promise<string>;
  listJobs(): Promise<string[]>;
}

export interface ReportWindow {
  now: Date;
  cutoff: Date;
  includeSuccess: boolean;
}

export interface BuildDecision {
  build: BuildMetadata;
  included: boolean;
}
