import { afterEach, describe, it, expect, vi } from "vitest";
import { parseCatalog } from "./classifier/catalog.js";
import { InMemoryCiServer, type StoredBuild } from "./collector/in-memory-server.js";
import { JenkinsClient } from "./collector/jenkins-client.js";
import type { Logger } from "./logger.js";
import { createRunContext, runReport } from "./report-runner.js";

const NOW = new Date("2026-01-10T12:00:00.000Z");

const catalog = parseCatalog(`
oom:
  literals: [OutOfMemoryError]
  bug:
    url: https://bugs.example.com/oom
timeout:
  literals: [Timeout]
`);

function hoursBefore(hours: number): Date {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  };
}

function exampleJob(overrides: Partial<Record<number, Partial<StoredBuild>>> = {}): StoredBuild[] {
  const builds: StoredBuild[] = [
    {
      number: 50,
      result: "SUCCESS",
      timestamp: NOW,
      url: "https://ci.example.com/job/example_job/50/",
      consoleText: "Finished: SUCCESS"
    },
    {
      number: 49,
      result: "FAILURE",
      timestamp: hoursBefore(2),
      url: "https://ci.example.com/job/example_job/49/",
      consoleText: "java.lang.OutOfMemoryError: Java heap space\nFinished: FAILURE"
    },
    {
      number: 48,
      result: "FAILURE",
      timestamp: hoursBefore(40),
      url: "https://ci.example.com/job/example_job/48/",
      consoleText: "Timeout waiting for model\nFinished: FAILURE"
    }
  ];
  return builds.map(build => ({ ...build, ...overrides[build.number] }));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runReport", () => {
  it("reports the in-window failure of example_job with its cause", async () => {
    const server = new InMemoryCiServer({ example_job: exampleJob() });
    const context = createRunContext(server, catalog, makeLogger(), NOW);

    const result = await runReport(context, { jobName: "example_job", hoursAgo: 24, includeSuccess: false });

    expect(result.rows).toEqual([
      {
        jobName: "example_job",
        buildNumber: 49,
        status: "FAILURE",
        causes: ["oom"],
        bugUrls: ["https://bugs.example.com/oom"],
        buildUrl: "https://ci.example.com/job/example_job/49/",
        buildInfo: ""
      }
    ]);
    expect(result.decisions.map(d => [d.build.number, d.included])).toEqual([
      [50, false],
      [49, true],
      [48, false]
    ]);
    expect(server.consoleCalls).toEqual([["example_job", 49]]);
    expect(result.window.cutoff.toISOString()).toBe("2026-01-09T12:00:00.000Z");
  });

  it("reports successes without fetching their logs", async () => {
    const server = new InMemoryCiServer({ example_job: exampleJob() });
    const context = createRunContext(server, catalog, makeLogger(), NOW);

    const result = await runReport(context, { jobName: "example_job", hoursAgo: 24, includeSuccess: true });

    expect(result.rows.map(row => [row.buildNumber, row.status, row.causes])).toEqual([
      [50, "SUCCESS", []],
      [49, "FAILURE", ["oom"]]
    ]);
    expect(server.consoleCalls).toEqual([["example_job", 49]]);
  });

  it("keeps a failed build whose log cannot be fetched", async () => {
    const server = new InMemoryCiServer({
      example_job: exampleJob({ 49: { consoleText: undefined } })
    });
    const logger = makeLogger();
    const context = createRunContext(server, catalog, logger, NOW);

    const result = await runReport(context, { jobName: "example_job", hoursAgo: 24, includeSuccess: false });

    expect(result.rows.map(row => [row.buildNumber, row.causes])).toEqual([[49, []]]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Console text unavailable for example_job #49; reporting without a cause"
    );
  });

  it("classifies older failures once the window reaches them", async () => {
    const server = new InMemoryCiServer({ example_job: exampleJob() });
    const context = createRunContext(server, catalog, makeLogger(), NOW);

    const result = await runReport(context, { jobName: "example_job", hoursAgo: 48, includeSuccess: false });

    expect(result.rows.map(row => [row.buildNumber, row.causes])).toEqual([
      [49, ["oom"]],
      [48, ["timeout"]]
    ]);
  });

  it("returns an empty report for a job without completed builds", async () => {
    const server = new InMemoryCiServer({ example_job: [] });
    const context = createRunContext(server, catalog, makeLogger(), NOW);

    const result = await runReport(context, { jobName: "example_job", hoursAgo: 24, includeSuccess: false });

    expect(result.rows).toEqual([]);
    expect(result.decisions).toEqual([]);
  });

  it("freezes the run context", () => {
    const context = createRunContext(new InMemoryCiServer(), catalog, makeLogger(), NOW);

    expect(Object.isFrozen(context)).toBe(true);
  });

  it("keeps the row when a console fetch times out against Jenkins", async () => {
    const builds: Record<string, unknown> = {
      "/job/app/api/json?tree=lastCompletedBuild[number,url]": { lastCompletedBuild: { number: 2 } },
      "/job/app/2/api/json?tree=number,result,timestamp,url,displayName": {
        number: 2,
        result: "FAILURE",
        timestamp: hoursBefore(1).getTime(),
        url: "http://jenkins.test/job/app/2/"
      },
      "/job/app/1/api/json?tree=number,result,timestamp,url,displayName": {
        number: 1,
        result: "FAILURE",
        timestamp: hoursBefore(48).getTime(),
        url: "http://jenkins.test/job/app/1/"
      }
    };
    vi.spyOn(globalThis, "fetch").mockImplementation(async input => {
      const path = String(input).replace("http://jenkins.test", "");
      if (path.endsWith("/consoleText")) {
        throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
      }
      return new Response(JSON.stringify(builds[path]), { status: path in builds ? 200 : 404 });
    });
    const server = new JenkinsClient({ url: "http://jenkins.test", username: "ci-bot", password: "test-secret" });
    const logger = makeLogger();
    const context = createRunContext(server, catalog, logger, NOW);

    const result = await runReport(context, { jobName: "app", hoursAgo: 24, includeSuccess: false });

    expect(result.rows.map(row => [row.buildNumber, row.causes])).toEqual([[2, []]]);
    expect(logger.warn).toHaveBeenCalledWith("Console text unavailable for app #2; reporting without a cause");
  });
});
