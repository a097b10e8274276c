import Table from "cli-table3";
import { CounterCategory, CounterMetric } from "./types";

interface ReportRowSpec {
  label: string;
  category: CounterCategory;
  metric: CounterMetric;
  showExcluded: boolean;
}

const REPORT_ROWS: ReportRowSpec[] = [
  { label: "Containers", category: "containers", metric: "removed", showExcluded: true },
  { label: "Images", category: "images", metric: "removed", showExcluded: true },
  { label: "Volumes", category: "volumes", metric: "removed", showExcluded: true },
  { label: "Builders (Processed)", category: "builders", metric: "processed", showExcluded: true },
  { label: "Builders (Removed)", category: "builders", metric: "removed", showExcluded: false },
  { label: "Minikube Profiles", category: "minikube", metric: "removed", showExcluded: true },
  { label: "Kind Clusters", category: "kind", metric: "removed", showExcluded: true },
  { label: "Dangling Images", category: "danglingImages", metric: "removed", showExcluded: false },
  { label: "Dangling Containers", category: "danglingContainers", metric: "removed", showExcluded: false },
  { label: "Dangling Volumes", category: "danglingVolumes", metric: "removed", showExcluded: false },
  { label: "Dangling Networks", category: "danglingNetworks", metric: "removed", showExcluded: false },
  { label: "Dangling Build Cache", category: "danglingBuildCache", metric: "removed", showExcluded: false },
  { label: "Cleaned Logs", category: "logs", metric: "cleaned", showExcluded: false }
];

/** Coerces a count from command output to a non-negative integer, 0 when it is not one. */
export function sanitizeCount(value: unknown): number {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : 0;
  }
  if (typeof value !== "string") return 0;
  const trimmed = value.replace(/\s+/g, "");
  return /^[0-9]+$/.test(trimmed) ? Number(trimmed) : 0;
}

/**
 * Per-run ledger of what each category did. Counts only ever go up and
 * are read once, when the summary is rendered.
 */
export class RunReport {
  private readonly counts = new Map<string, number>();

  increment(category: CounterCategory, metric: CounterMetric, by: number | string = 1): void {
    const amount = sanitizeCount(by);
    if (amount === 0) return;
    const key = `${category}:${metric}`;
    this.counts.set(key, (this.counts.get(key) ?? 0) + amount);
  }

  get(category: CounterCategory, metric: CounterMetric): number {
    return this.counts.get(`${category}:${metric}`) ?? 0;
  }

  totalFailed(): number {
    let total = 0;
    for (const [key, value] of this.counts) {
      if (key.endsWith(":failed")) total += value;
    }
    return total;
  }

  rows(): Array<[string, string, string]> {
    return REPORT_ROWS.map((row) => [
      row.label,
      String(this.get(row.category, row.metric)),
      row.showExcluded ? String(this.get(row.category, "excluded")) : "N/A"
    ]);
  }
}

export function renderReport(report: RunReport): string {
  const table = new Table({
    head: ["Resource Type", "Removed", "Excluded"],
    style: { head: ["cyan"] },
    colWidths: [27, 12, 12]
  });

  report.rows().forEach((row) => {
    table.push(row);
  });

  return table.toString();
}
