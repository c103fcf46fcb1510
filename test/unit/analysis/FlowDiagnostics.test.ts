import { expect } from "chai";
import { diagnoseFlow, utilizationBand } from "../../../src/analysis/FlowDiagnostics";
import { AugmentingPath } from "../../../src/algorithms/AugmentingPath";
import type { FlowResult } from "../../../src/algorithms/AlgorithmTypes";
import { budget, bottleneck, diamond } from "../fixtures/networks";

describe("FlowDiagnostics", () => {
  describe("utilizationBand()", () => {
    it("should band by ratio", () => {
      expect(utilizationBand(0)).to.equal("idle");
      expect(utilizationBand(0.2)).to.equal("partial");
      expect(utilizationBand(0.5)).to.equal("heavy");
      expect(utilizationBand(1)).to.equal("heavy");
    });
  });

  describe("diagnoseFlow()", () => {
    it("should measure a constrained pipeline", () => {
      const network = bottleneck();
      const diagnostics = diagnoseFlow(network, new AugmentingPath().run(network, budget()));

      expect(diagnostics.sourceOutflow).to.equal(4);
      expect(diagnostics.sinkInflow).to.equal(4);
      expect(diagnostics.utilization).to.deep.equal([
        { edgeId: "S->A", from: "S", to: "A", flow: 4, capacity: 10, ratio: 0.4, band: "partial", saturated: false },
        { edgeId: "A->T", from: "A", to: "T", flow: 4, capacity: 4, ratio: 1, band: "heavy", saturated: true },
      ]);
      expect(diagnostics.bands).to.deep.equal({ idle: [], partial: ["S->A"], heavy: ["A->T"] });
    });

    it("should list terminal imbalances, largest net outflow first", () => {
      const network = diamond();
      const diagnostics = diagnoseFlow(network, new AugmentingPath().run(network, budget()));

      expect(diagnostics.imbalances).to.deep.equal([
        { node: "S", inflow: 0, outflow: 20, net: 20 },
        { node: "T", inflow: 20, outflow: 0, net: -20 },
      ]);
      expect(diagnostics.bands.idle).to.deep.equal(["A->B"]);
    });

    it("should expose an intermediate node that leaks flow", () => {
      const network = diamond();
      const result: FlowResult = {
        algorithm: "BLOCKING_FLOW",
        value: 10,
        edgeFlows: new Map([
          ["S->A", 10],
          ["S->B", 0],
          ["A->T", 7],
          ["B->T", 0],
          ["A->B", 0],
        ]),
        iterations: 1,
        termination: "CONVERGED",
        tolerance: 1e-9,
      };

      const imbalanced = diagnoseFlow(network, result).imbalances.map((row) => [row.node, row.net]);
      expect(imbalanced).to.deep.equal([
        ["S", 10],
        ["A", -3],
        ["T", -7],
      ]);
    });

    it("should give zero-capacity pipes a ratio of 0", () => {
      const network = diamond().withCapacities([10, 10, 10, 10, 0]);
      const diagnostics = diagnoseFlow(network, new AugmentingPath().run(network, budget()));
      const cross = diagnostics.utilization.find((u) => u.edgeId === "A->B");

      expect(cross?.ratio).to.equal(0);
      expect(cross?.saturated).to.be.false;
    });
  });
});
