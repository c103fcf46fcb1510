import { expect } from "chai";
import { FlowNetwork } from "../../../src/network/FlowNetwork";
import { createEdgeId, type NetworkDescription } from "../../../src/network/NetworkTypes";
import { InvalidNetworkError } from "../../../src/errors/FlowErrors";
import { diamond } from "../fixtures/networks";

function describeNetwork(overrides: Partial<NetworkDescription> = {}): NetworkDescription {
  return {
    nodes: [{ id: "S" }, { id: "A" }, { id: "T" }],
    edges: [
      { from: "S", to: "A", capacity: 3 },
      { from: "A", to: "T", capacity: 2 },
    ],
    source: "S",
    sink: "T",
    ...overrides,
  };
}

describe("FlowNetwork", () => {
  describe("createEdgeId()", () => {
    it("should join endpoints with an arrow", () => {
      expect(createEdgeId("P1", "Z1")).to.equal("P1->Z1");
    });
  });

  describe("constructor", () => {
    it("should assign roles and stable indices", () => {
      const network = diamond();

      expect(network.nodes.map((n) => n.role)).to.deep.equal(["SOURCE", "INTERMEDIATE", "INTERMEDIATE", "SINK"]);
      expect(network.edges.map((e) => e.index)).to.deep.equal([0, 1, 2, 3, 4]);
      expect(network.edges.map((e) => e.id)).to.deep.equal(["S->A", "S->B", "A->T", "B->T", "A->B"]);
      expect(network.indexOf("B")).to.equal(2);
      expect(network.indexOf("missing")).to.equal(-1);
    });

    it("should keep original capacity equal to capacity", () => {
      const network = diamond();
      for (const edge of network.edges) {
        expect(edge.originalCapacity).to.equal(edge.capacity);
      }
    });

    it("should infer roles when none are declared", () => {
      const network = new FlowNetwork(describeNetwork());
      expect(network.getNode("S")?.role).to.equal("SOURCE");
      expect(network.getNode("A")?.role).to.equal("INTERMEDIATE");
      expect(network.getNode("T")?.role).to.equal("SINK");
    });

    it("should honour explicit edge ids", () => {
      const network = new FlowNetwork(
        describeNetwork({
          edges: [
            { id: "main", from: "S", to: "A", capacity: 3 },
            { from: "A", to: "T", capacity: 2 },
          ],
        })
      );
      expect(network.hasEdge("main")).to.be.true;
      expect(network.hasEdge("S->A")).to.be.false;
      expect(network.getEdge("A->T")?.capacity).to.equal(2);
    });

    it("should be frozen", () => {
      const network = diamond();
      expect(Object.isFrozen(network.edges)).to.be.true;
      expect(Object.isFrozen(network.edges[0])).to.be.true;
      expect(Object.isFrozen(network.nodes)).to.be.true;
    });
  });

  describe("validation", () => {
    const cases: Array<[string, Partial<NetworkDescription>, RegExp]> = [
      ["source equal to sink", { sink: "S" }, /must differ/],
      ["missing source", { source: "X" }, /Source "X"/],
      ["missing sink", { sink: "X" }, /Sink "X"/],
      ["negative capacity", { edges: [{ from: "S", to: "A", capacity: -1 }] }, /invalid capacity -1/],
      ["NaN capacity", { edges: [{ from: "S", to: "A", capacity: NaN }] }, /invalid capacity NaN/],
      ["infinite capacity", { edges: [{ from: "S", to: "A", capacity: Infinity }] }, /invalid capacity Infinity/],
      ["self-loop", { edges: [{ from: "A", to: "A", capacity: 1 }] }, /Self-loop on "A"/],
      ["unknown node", { edges: [{ from: "S", to: "Q", capacity: 1 }] }, /unknown node/],
      [
        "duplicate pair",
        {
          edges: [
            { from: "S", to: "A", capacity: 1 },
            { from: "S", to: "A", capacity: 2 },
          ],
        },
        /Duplicate edge S -> A/,
      ],
      ["duplicate node", { nodes: [{ id: "S" }, { id: "S" }, { id: "T" }], edges: [] }, /Duplicate node "S"/],
      [
        "second source",
        { nodes: [{ id: "S" }, { id: "A", role: "SOURCE" }, { id: "T" }] },
        /Duplicate source/,
      ],
      ["second sink", { nodes: [{ id: "S" }, { id: "A", role: "SINK" }, { id: "T" }] }, /Duplicate sink/],
      [
        "source tagged intermediate",
        { nodes: [{ id: "S", role: "INTERMEDIATE" }, { id: "A" }, { id: "T" }] },
        /tagged INTERMEDIATE/,
      ],
    ];

    for (const [name, overrides, message] of cases) {
      it(`should reject ${name}`, () => {
        expect(() => new FlowNetwork(describeNetwork(overrides))).to.throw(InvalidNetworkError, message);
      });
    }

    it("should carry the InvalidNetwork kind", () => {
      try {
        new FlowNetwork(describeNetwork({ sink: "S" }));
        expect.fail("expected construction to throw");
      } catch (e) {
        if (!(e instanceof InvalidNetworkError)) throw e;
        expect(e.kind).to.equal("InvalidNetwork");
        expect(e.name).to.equal("InvalidNetworkError");
      }
    });
  });

  describe("parallel edges", () => {
    it("should merge duplicate pairs when asked", () => {
      const network = new FlowNetwork(
        describeNetwork({
          edges: [
            { from: "S", to: "A", capacity: 1 },
            { from: "A", to: "T", capacity: 2 },
            { from: "S", to: "A", capacity: 4 },
          ],
        }),
        { parallelEdges: "merge" }
      );

      expect(network.edgeCount).to.equal(2);
      expect(network.getEdge("S->A")?.capacity).to.equal(5);
      expect(network.getEdge("S->A")?.index).to.equal(0);
      expect(network.getEdge("A->T")?.index).to.equal(1);
    });
  });

  describe("fromEdges()", () => {
    it("should infer nodes in order of first appearance", () => {
      const network = FlowNetwork.fromEdges(
        [
          { from: "B", to: "T", capacity: 1 },
          { from: "S", to: "B", capacity: 1 },
        ],
        "S",
        "T"
      );
      expect(network.nodes.map((n) => n.id)).to.deep.equal(["S", "B", "T"]);
    });

    it("should include an isolated sink", () => {
      const network = FlowNetwork.fromEdges([{ from: "S", to: "A", capacity: 1 }], "S", "T");
      expect(network.hasNode("T")).to.be.true;
      expect(network.inEdges("T")).to.have.length(0);
    });
  });

  describe("adjacency", () => {
    it("should list in- and out-edges in insertion order", () => {
      const network = diamond();
      expect(network.outEdges("A").map((e) => e.id)).to.deep.equal(["A->T", "A->B"]);
      expect(network.inEdges("T").map((e) => e.id)).to.deep.equal(["A->T", "B->T"]);
      expect(network.inEdges("B").map((e) => e.id)).to.deep.equal(["S->B", "A->B"]);
    });
  });

  describe("withCapacities()", () => {
    it("should derive a new network and leave the base untouched", () => {
      const base = diamond();
      const derived = base.withCapacities([1, 2, 3, 4, 0]);

      expect(derived).to.not.equal(base);
      expect(derived.edges.map((e) => e.capacity)).to.deep.equal([1, 2, 3, 4, 0]);
      expect(derived.edges.map((e) => e.originalCapacity)).to.deep.equal([10, 10, 10, 10, 5]);
      expect(base.edges.map((e) => e.capacity)).to.deep.equal([10, 10, 10, 10, 5]);
      expect(derived.edges.map((e) => e.id)).to.deep.equal(base.edges.map((e) => e.id));
    });

    it("should reject a capacity list of the wrong length", () => {
      expect(() => diamond().withCapacities([1, 2])).to.throw(InvalidNetworkError, /does not match/);
    });

    it("should reject capacities above the original", () => {
      expect(() => diamond().withCapacities([11, 10, 10, 10, 5])).to.throw(InvalidNetworkError, /above its original/);
    });
  });

  describe("toDescription()", () => {
    it("should round-trip through the constructor", () => {
      const network = diamond();
      const copy = new FlowNetwork(network.toDescription());
      expect(copy.edges).to.deep.equal(network.edges);
      expect(copy.nodes).to.deep.equal(network.nodes);
    });
  });
});
