/**
 * FlowReport - Plain-Text Summaries
 *
 * Console-friendly renderings of results for scripts and logs. Flow
 * figures are in MLD (megalitres per day).
 */

import type { FlowResult } from "../algorithms/AlgorithmTypes";
import type { AlgorithmComparison, SweepPoint } from "../analysis/ScenarioSweep";
import type { FlowPath } from "../analysis/FlowPaths";
import type { MinCut } from "../cut/MinCutExtractor";

const ALGORITHM_LABELS: Record<FlowResult["algorithm"], string> = {
  AUGMENTING_PATH: "Edmonds-Karp",
  BLOCKING_FLOW: "Dinic",
  PREFLOW_PUSH: "Push-Relabel",
};

export function formatFlowResult(result: FlowResult): string {
  const lines: string[] = [
    "=== Max Flow ===",
    "",
    `Algorithm:   ${ALGORITHM_LABELS[result.algorithm]} (${result.algorithm})`,
    `Max Flow:    ${result.value.toFixed(2)} MLD`,
    `Iterations:  ${result.iterations}`,
    `Termination: ${result.termination}`,
  ];

  if (result.termination !== "CONVERGED") {
    lines.push("", "  Run stopped early: the flow is valid but may not be maximal.");
  }

  return lines.join("\n");
}

export function formatMinCut(cut: MinCut): string {
  const lines: string[] = ["--- Min-Cut Report ---"];

  if (cut.edges.length === 0) {
    lines.push("  No bottlenecks detected.");
    return lines.join("\n");
  }

  for (const edge of cut.edges) {
    const note = edge.failed ? " (failed)" : "";
    lines.push(`  ${edge.from} → ${edge.to}: ${edge.capacity.toFixed(2)}${note}`);
  }
  lines.push(`  Total: ${cut.capacity.toFixed(2)} MLD`);
  lines.push(`  S side: ${cut.sourceSide.join(", ")}`);

  return lines.join("\n");
}

export function formatFlowPaths(paths: FlowPath[]): string {
  const lines: string[] = ["--- Flow Paths (S → T) ---"];

  if (paths.length === 0) {
    lines.push("  No flow paths found.");
    return lines.join("\n");
  }

  for (const path of paths) {
    lines.push(`  ${path.nodes.join(" → ")}: ${path.amount.toFixed(2)}`);
  }

  return lines.join("\n");
}

export function formatSweep(points: SweepPoint[]): string {
  const lines: string[] = ["--- Leakage Sweep ---"];
  for (const point of points) {
    const pct = (point.leakage * 100).toFixed(0).padStart(3);
    lines.push(
      `  ${pct}%: ${point.value.toFixed(2)} MLD (${(point.retained * 100).toFixed(1)}% retained)` +
        (point.termination === "CONVERGED" ? "" : ` [${point.termination}]`)
    );
  }
  return lines.join("\n");
}

export function formatComparison(comparison: AlgorithmComparison): string {
  const lines: string[] = ["--- Algorithm Comparison ---"];
  for (const run of comparison.runs) {
    lines.push(
      `  ${ALGORITHM_LABELS[run.algorithm].padEnd(12)} ${run.value.toFixed(2)} MLD, ` +
        `${run.iterations} iterations, ${run.termination}`
    );
  }
  lines.push(`  Agreement: ${comparison.agree ? "YES" : `NO (spread ${comparison.spread})`}`);
  return lines.join("\n");
}
