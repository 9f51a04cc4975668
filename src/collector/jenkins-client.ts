import { z } from "zod";
import type { ConnectionSettings } from "../config/failscope.config.js";
import {
  BuildNotFoundError,
  ConnectionConfigError,
  FailscopeError,
  LogFetchError
} from "../errors.js";
import type { BuildMetadata, BuildRef, CiServer } from "./types.js";

const JobInfoSchema = z.object({
  lastCompletedBuild: z
    .object({
      number: z.number().int(),
      url: z.string().optional()
    })
    .nullable()
    .optional()
});

const BuildInfoSchema = z.object({
  number: z.number().int(),
  // null while the build is still running
  result: z.string().nullable(),
  timestamp: z.number(),
  url: z.string(),
  displayName: z.string().nullable().optional()
});

const JobListSchema = z.object({
  jobs: z.array(z.object({ name: z.string() })).default([])
});

/**
 * CiServer backed by the Jenkins JSON API.
 */
export class JenkinsClient implements CiServer {
  private readonly baseUrl: string;
  private readonly authorization: string;

  constructor(
    settings: ConnectionSettings,
    private readonly timeoutMs: number = 30000
  ) {
    this.baseUrl = settings.url.replace(/\/+$/, "");
    const credentials = Buffer.from(`${settings.username}:${settings.password}`).toString("base64");
    this.authorization = `Basic ${credentials}`;
  }

  async getLastCompletedBuild(jobName: string): Promise<BuildRef | undefined> {
    const response = await this.request(`${jobPath(jobName)}/api/json?tree=lastCompletedBuild[number,url]`);
    if (response.status === 404) {
      throw new FailscopeError(`Job not found: ${jobName}`);
    }
    const data = await this.readJson(response, `job ${jobName}`, JobInfoSchema);
    if (!data.lastCompletedBuild) return undefined;
    return {
      number: data.lastCompletedBuild.number,
      url: data.lastCompletedBuild.url
    };
  }

  async getBuildInfo(jobName: string, buildNumber: number): Promise<BuildMetadata> {
    const response = await this.request(
      `${jobPath(jobName)}/${buildNumber}/api/json?tree=number,result,timestamp,url,displayName`
    );
    if (response.status === 404) {
      throw new BuildNotFoundError(jobName, buildNumber);
    }
    const data = await this.readJson(response, `${jobName} #${buildNumber}`, BuildInfoSchema);
    const build: BuildMetadata = {
      number: data.number,
      result: data.result ?? "IN_PROGRESS",
      timestamp: new Date(data.timestamp),
      url: data.url
    };
    if (data.displayName) {
      build.displayName = data.displayName;
    }
    return build;
  }

  async getConsoleText(jobName: string, buildNumber: number): Promise<string> {
    let response: Response;
    try {
      response = await this.send(`${jobPath(jobName)}/${buildNumber}/consoleText`);
    } catch (error) {
      // transport failures on a log are per build
      throw new LogFetchError(jobName, buildNumber, { cause: error });
    }
    checkCredentials(response);
    if (!response.ok) {
      throw new LogFetchError(jobName, buildNumber, {
        cause: new Error(`HTTP ${response.status} ${response.statusText}`)
      });
    }
    try {
      return await response.text();
    } catch (error) {
      throw new LogFetchError(jobName, buildNumber, { cause: error });
    }
  }

  async listJobs(): Promise<string[]> {
    const response = await this.request("/api/json?tree=jobs[name]");
    const data = await this.readJson(response, "job list", JobListSchema);
    return data.jobs.map(job => job.name);
  }

  private send(path: string): Promise<Response> {
    return fetch(`${this.baseUrl}${path}`, {
      headers: { Authorization: this.authorization },
      signal: AbortSignal.timeout(this.timeoutMs)
    });
  }

  private async request(path: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.send(path);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConnectionConfigError(
        `Unable to reach ${this.baseUrl}: ${detail}`,
        "Check the url in your Jenkins settings file and that the server is up.",
        { cause: error }
      );
    }
    checkCredentials(response);
    return response;
  }

  private async readJson<S extends z.ZodTypeAny>(
    response: Response,
    what: string,
    schema: S
  ): Promise<z.output<S>> {
    if (!response.ok) {
      throw new FailscopeError(`Failed to fetch ${what}: HTTP ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FailscopeError(`Jenkins returned a non-JSON response for ${what}`, { cause: error });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.errors
        .map(err => `${err.path.join(".") || "(root)"}: ${err.message}`)
        .join("; ");
      throw new FailscopeError(`Unexpected response for ${what}: ${issues}`, { cause: result.error });
    }
    return result.data;
  }
}

function checkCredentials(response: Response): void {
  if (response.status === 401 || response.status === 403) {
    throw new ConnectionConfigError(
      `Jenkins rejected the credentials (HTTP ${response.status})`,
      "Check the username and password in your Jenkins settings file."
    );
  }
}

/**
 * Jenkins folders nest as /job/<folder>/job/<name>.
 */
export function jobPath(jobName: string): string {
  return jobName
    .split("/")
    .filter(Boolean)
    .map(segment => `/job/${encodeURIComponent(segment)}`)
    .join("");
}
