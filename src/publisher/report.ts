import type { SignatureCatalog } from "../classifier/catalog.js";
import type { BuildDecision } from "../collector/types.js";
import { renderTable } from "./table.js";

export interface ReportRow {
  jobName: string;
  buildNumber: number;
  status: string;
  causes: string[];
  /** One entry per cause, "" when the signature has no bug. */
  bugUrls: string[];
  buildUrl: string;
  buildInfo: string;
}

export const REPORT_HEADER = [
  "Job Name",
  "Build No.",
  "Status",
  "Cause",
  "Bug URL(s)",
  "Build URL",
  "Build Info"
];

/**
 * Join included builds with their classifications, in visit order.
 *
 * @param classifications - matched signature names keyed by build number
 */
export function assembleReport(
  jobName: string,
  decisions: readonly BuildDecision[],
  classifications: ReadonlyMap<number, ReadonlySet<string>>,
  catalog: SignatureCatalog
): ReportRow[] {
  return decisions
    .filter(decision => decision.included)
    .map(({ build }) => {
      const matched = classifications.get(build.number);
      const causes = matched ? catalog.names().filter(name => matched.has(name)) : [];
      return {
        jobName,
        buildNumber: build.number,
        status: build.result,
        causes,
        bugUrls: causes.map(name => catalog.lookup(name)?.bug?.url ?? ""),
        buildUrl: build.url,
        buildInfo: build.displayName ?? ""
      };
    });
}

export function renderReportTable(rows: readonly ReportRow[]): string {
  return renderTable(
    REPORT_HEADER,
    rows.map(row => [
      row.jobName,
      String(row.buildNumber),
      row.status,
      row.causes.join("\n"),
      row.bugUrls.join("\n"),
      row.buildUrl,
      row.buildInfo
    ])
  );
}
