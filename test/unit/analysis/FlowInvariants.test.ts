import { expect } from "chai";
import { describeViolation, netFlows, verifyFlow } from "../../../src/analysis/FlowInvariants";
import type { FlowResult } from "../../../src/algorithms/AlgorithmTypes";
import { diamond } from "../fixtures/networks";

function resultWith(flows: Record<string, number>, value: number): FlowResult {
  return {
    algorithm: "AUGMENTING_PATH",
    value,
    edgeFlows: new Map(Object.entries(flows)),
    iterations: 0,
    termination: "CONVERGED",
    tolerance: 1e-9,
  };
}

const VALID = { "S->A": 10, "S->B": 5, "A->T": 5, "B->T": 10, "A->B": 5 };

describe("FlowInvariants", () => {
  describe("verifyFlow()", () => {
    it("should accept a valid flow", () => {
      expect(verifyFlow(diamond(), resultWith(VALID, 15))).to.deep.equal([]);
    });

    it("should report an edge above capacity", () => {
      const violations = verifyFlow(diamond(), resultWith({ ...VALID, "A->B": 6, "A->T": 4, "B->T": 11 }, 15));
      expect(violations).to.deep.include({ kind: "capacity", edgeId: "A->B", flow: 6, capacity: 5 });
      expect(violations).to.deep.include({ kind: "capacity", edgeId: "B->T", flow: 11, capacity: 10 });
    });

    it("should report negative flow", () => {
      const violations = verifyFlow(diamond(), resultWith({ ...VALID, "A->B": -1 }, 15));
      expect(violations[0]).to.deep.equal({ kind: "capacity", edgeId: "A->B", flow: -1, capacity: 5 });
    });

    it("should report a node that does not conserve flow", () => {
      const violations = verifyFlow(diamond(), resultWith({ ...VALID, "A->T": 4 }, 15));
      expect(violations).to.deep.include({ kind: "conservation", node: "A", inflow: 10, outflow: 9 });
    });

    it("should report a value that does not match the source", () => {
      const violations = verifyFlow(diamond(), resultWith(VALID, 16));
      expect(violations).to.deep.equal([{ kind: "value", reported: 16, sourceOutflow: 15, sinkInflow: 15 }]);
    });

    it("should report missing edges", () => {
      const { "A->B": _dropped, ...rest } = VALID;
      const violations = verifyFlow(diamond(), resultWith(rest, 15));
      expect(violations[0]).to.deep.equal({ kind: "missing-edge", edgeId: "A->B" });
    });

    it("should tolerate rounding within the slack", () => {
      const violations = verifyFlow(diamond(), resultWith({ ...VALID, "A->T": 5 + 1e-10 }, 15), 1e-9);
      expect(violations).to.deep.equal([]);
    });
  });

  describe("netFlows()", () => {
    it("should total inflow and outflow per node", () => {
      const totals = netFlows(diamond(), resultWith(VALID, 15));
      expect(totals.get("A")).to.deep.equal({ inflow: 10, outflow: 10 });
      expect(totals.get("B")).to.deep.equal({ inflow: 10, outflow: 10 });
      expect(totals.get("S")).to.deep.equal({ inflow: 0, outflow: 15 });
      expect(totals.get("T")).to.deep.equal({ inflow: 15, outflow: 0 });
    });
  });

  describe("describeViolation()", () => {
    it("should render each kind", () => {
      expect(describeViolation({ kind: "missing-edge", edgeId: "A->B" })).to.equal("no flow reported for edge A->B");
      expect(describeViolation({ kind: "capacity", edgeId: "A->B", flow: 6, capacity: 5 })).to.equal(
        "edge A->B carries 6 outside [0, 5]"
      );
      expect(describeViolation({ kind: "conservation", node: "A", inflow: 10, outflow: 9 })).to.equal(
        "node A has inflow 10 but outflow 9"
      );
      expect(describeViolation({ kind: "value", reported: 16, sourceOutflow: 15, sinkInflow: 15 })).to.equal(
        "reported value 16 disagrees with source outflow 15 or sink inflow 15"
      );
    });
  });
});
