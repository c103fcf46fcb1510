import { expect } from "chai";
import {
  formatComparison,
  formatFlowPaths,
  formatFlowResult,
  formatMinCut,
  formatSweep,
} from "../../../src/report/FlowReport";
import type { FlowResult } from "../../../src/algorithms/AlgorithmTypes";

const RESULT: FlowResult = {
  algorithm: "AUGMENTING_PATH",
  value: 20,
  edgeFlows: new Map(),
  iterations: 2,
  termination: "CONVERGED",
  tolerance: 1e-9,
};

describe("FlowReport", () => {
  describe("formatFlowResult()", () => {
    it("should summarize a converged run", () => {
      expect(formatFlowResult(RESULT)).to.equal(
        [
          "=== Max Flow ===",
          "",
          "Algorithm:   Edmonds-Karp (AUGMENTING_PATH)",
          "Max Flow:    20.00 MLD",
          "Iterations:  2",
          "Termination: CONVERGED",
        ].join("\n")
      );
    });

    it("should flag an early stop", () => {
      const text = formatFlowResult({ ...RESULT, algorithm: "PREFLOW_PUSH", termination: "CANCELLED", value: 7.5 });
      const lines = text.split("\n");

      expect(lines[2]).to.equal("Algorithm:   Push-Relabel (PREFLOW_PUSH)");
      expect(lines[3]).to.equal("Max Flow:    7.50 MLD");
      expect(lines[lines.length - 1]).to.equal("  Run stopped early: the flow is valid but may not be maximal.");
    });
  });

  describe("formatMinCut()", () => {
    it("should list cut pipes and mark failures", () => {
      const text = formatMinCut({
        sourceSide: ["S", "A", "B"],
        sinkSide: ["T"],
        edges: [
          { edgeId: "A->T", from: "A", to: "T", capacity: 0, originalCapacity: 10, failed: true },
          { edgeId: "B->T", from: "B", to: "T", capacity: 10, originalCapacity: 10, failed: false },
        ],
        capacity: 10,
      });

      expect(text).to.equal(
        [
          "--- Min-Cut Report ---",
          "  A → T: 0.00 (failed)",
          "  B → T: 10.00",
          "  Total: 10.00 MLD",
          "  S side: S, A, B",
        ].join("\n")
      );
    });

    it("should report an empty cut", () => {
      expect(formatMinCut({ sourceSide: ["S"], sinkSide: ["T"], edges: [], capacity: 0 })).to.equal(
        "--- Min-Cut Report ---\n  No bottlenecks detected."
      );
    });
  });

  describe("formatFlowPaths()", () => {
    it("should list each path with its amount", () => {
      expect(
        formatFlowPaths([
          { nodes: ["S", "A", "T"], edgeIds: ["S->A", "A->T"], amount: 10 },
          { nodes: ["S", "B", "T"], edgeIds: ["S->B", "B->T"], amount: 2.5 },
        ])
      ).to.equal("--- Flow Paths (S → T) ---\n  S → A → T: 10.00\n  S → B → T: 2.50");
    });

    it("should say when there is no flow", () => {
      expect(formatFlowPaths([])).to.equal("--- Flow Paths (S → T) ---\n  No flow paths found.");
    });
  });

  describe("formatSweep()", () => {
    it("should print one row per leakage level", () => {
      expect(
        formatSweep([
          { leakage: 0, value: 20, retained: 1, termination: "CONVERGED" },
          { leakage: 0.25, value: 15, retained: 0.75, termination: "BUDGET_EXCEEDED" },
        ])
      ).to.equal(
        [
          "--- Leakage Sweep ---",
          "    0%: 20.00 MLD (100.0% retained)",
          "   25%: 15.00 MLD (75.0% retained) [BUDGET_EXCEEDED]",
        ].join("\n")
      );
    });
  });

  describe("formatComparison()", () => {
    it("should show each run and the agreement", () => {
      expect(
        formatComparison({
          runs: [
            { algorithm: "AUGMENTING_PATH", value: 20, iterations: 2, termination: "CONVERGED" },
            { algorithm: "BLOCKING_FLOW", value: 20, iterations: 1, termination: "CONVERGED" },
          ],
          agree: true,
          spread: 0,
        })
      ).to.equal(
        [
          "--- Algorithm Comparison ---",
          "  Edmonds-Karp 20.00 MLD, 2 iterations, CONVERGED",
          "  Dinic        20.00 MLD, 1 iterations, CONVERGED",
          "  Agreement: YES",
        ].join("\n")
      );
    });

    it("should show the spread on disagreement", () => {
      const text = formatComparison({ runs: [], agree: false, spread: 0.5 });
      expect(text).to.equal("--- Algorithm Comparison ---\n  Agreement: NO (spread 0.5)");
    });
  });
});
