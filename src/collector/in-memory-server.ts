import { BuildNotFoundError, LogFetchError } from "../errors.js";
import type { BuildMetadata, BuildRef, CiServer } from "./types.js";

export interface StoredBuild extends BuildMetadata {
  /** Omit to make the console text unavailable. */
  consoleText?: string;
}

/**
 * CiServer held in memory for tests. Build numbers absent from a job behave
 * like pruned builds.
 */
export class InMemoryCiServer implements CiServer {
  readonly buildInfoCalls: Array<[string, number]> = [];
  readonly consoleCalls: Array<[string, number]> = [];
  private readonly jobs = new Map<string, Map<number, StoredBuild>>();

  constructor(jobs: Record<string, StoredBuild[]> = {}) {
    for (const [jobName, builds] of Object.entries(jobs)) {
      this.jobs.set(jobName, new Map(builds.map(build => [build.number, build])));
    }
  }

  async getLastCompletedBuild(jobName: string): Promise<BuildRef | undefined> {
    const builds = this.jobs.get(jobName);
    if (!builds || builds.size === 0) return undefined;
    const number = Math.max(...builds.keys());
    return { number, url: builds.get(number)?.url };
  }

  async getBuildInfo(jobName: string, buildNumber: number): Promise<BuildMetadata> {
    this.buildInfoCalls.push([jobName, buildNumber]);
    const stored = this.jobs.get(jobName)?.get(buildNumber);
    if (!stored) {
      throw new BuildNotFoundError(jobName, buildNumber);
    }
    const { consoleText: _consoleText, ...metadata } = stored;
    return metadata;
  }

  async getConsoleText(jobName: string, buildNumber: number): Promise<string> {
    this.consoleCalls.push([jobName, buildNumber]);
    const consoleText = this.jobs.get(jobName)?.get(buildNumber)?.consoleText;
    if (consoleText === undefined) {
      throw new LogFetchError(jobName, buildNumber);
    }
    return consoleText;
  }

  async listJobs(): Promise<string[]> {
    return [...this.jobs.keys()];
  }
}
