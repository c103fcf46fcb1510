import { expect } from "chai";
import { compareAlgorithms, sweepLeakage } from "../../../src/analysis/ScenarioSweep";
import { FlowEngine } from "../../../src/engine/FlowEngine";
import { diamond, waterGrid } from "../fixtures/networks";

describe("ScenarioSweep", () => {
  const engine = new FlowEngine({ logLevel: "silent" });

  describe("sweepLeakage()", () => {
    it("should report value and retained share per leakage level", () => {
      const points = sweepLeakage(engine, diamond(), "AUGMENTING_PATH", [0, 0.25, 0.5]);

      expect(points).to.deep.equal([
        { leakage: 0, value: 20, retained: 1, termination: "CONVERGED" },
        { leakage: 0.25, value: 15, retained: 0.75, termination: "CONVERGED" },
        { leakage: 0.5, value: 10, retained: 0.5, termination: "CONVERGED" },
      ]);
    });

    it("should keep the base scenario's failures at every level", () => {
      const points = sweepLeakage(engine, diamond(), "BLOCKING_FLOW", [0, 0.5], {}, { failedEdges: ["A->T"] });
      expect(points.map((p) => [p.value, p.retained])).to.deep.equal([
        [10, 0.5],
        [5, 0.25],
      ]);
    });

    it("should decrease monotonically on the water grid", () => {
      const points = sweepLeakage(engine, waterGrid(), "PREFLOW_PUSH", [0, 0.1, 0.2, 0.3]);
      for (let i = 1; i < points.length; i++) {
        expect(points[i].value).to.be.below(points[i - 1].value);
      }
      expect(points[3].value).to.be.closeTo(108.5, 1e-6);
    });

    it("should pass run options through", () => {
      const points = sweepLeakage(engine, diamond(), "AUGMENTING_PATH", [0], { maxIterations: 1 });
      expect(points[0]).to.deep.equal({ leakage: 0, value: 10, retained: 1, termination: "BUDGET_EXCEEDED" });
    });
  });

  describe("compareAlgorithms()", () => {
    it("should run every algorithm and agree on the value", () => {
      const comparison = compareAlgorithms(engine, waterGrid());

      expect(comparison.runs.map((r) => [r.algorithm, r.value, r.termination])).to.deep.equal([
        ["AUGMENTING_PATH", 155, "CONVERGED"],
        ["BLOCKING_FLOW", 155, "CONVERGED"],
        ["PREFLOW_PUSH", 155, "CONVERGED"],
      ]);
      expect(comparison.agree).to.be.true;
      expect(comparison.spread).to.equal(0);
    });

    it("should compare converged runs only", () => {
      const comparison = compareAlgorithms(engine, diamond(), { maxIterations: 1 });

      expect(comparison.runs.map((r) => [r.algorithm, r.value, r.termination])).to.deep.equal([
        ["AUGMENTING_PATH", 10, "BUDGET_EXCEEDED"],
        ["BLOCKING_FLOW", 20, "CONVERGED"],
        ["PREFLOW_PUSH", 10, "BUDGET_EXCEEDED"],
      ]);
      expect(comparison.agree).to.be.true;
    });

    it("should run a chosen subset", () => {
      const comparison = compareAlgorithms(engine, diamond(), {}, ["PREFLOW_PUSH"]);
      expect(comparison.runs).to.have.length(1);
      expect(comparison.runs[0].iterations).to.equal(2);
    });
  });
});
