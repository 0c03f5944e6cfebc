import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { stringify } from "csv-stringify/sync";
import type { MetricResult } from "../../core/entities/metricResult";
import type { ResultSinkPort } from "../../core/ports/outboundPorts";

const columns: Array<{ key: keyof MetricResult; header: string }> = [
  { key: "identifier", header: "identifier" },
  { key: "liquidity", header: "liquidity" },
  { key: "beta", header: "beta" },
  { key: "sharpe", header: "sharpe" },
  { key: "peRatio", header: "pe_ratio" },
  { key: "momentum", header: "momentum" },
];

/**
 * Renders results as CSV with a header row; absent metrics become empty cells.
 */
export const formatResultsCsv = (results: readonly MetricResult[]): string =>
  stringify(
    results.map((result) => ({ ...result })),
    { header: true, columns },
  );

/**
 * Writes the final export. Failures propagate: losing the output is fatal for a run.
 */
export class CsvResultSink implements ResultSinkPort {
  async write(path: string, results: readonly MetricResult[]): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, formatResultsCsv(results), "utf8");
  }
}
