import { expect } from "chai";
import { BlockingFlow } from "../../../src/algorithms/BlockingFlow";
import { FlowNetwork } from "../../../src/network/FlowNetwork";
import { TraceLog } from "../../../src/trace/TraceRecorder";
import { budget, diamond, reroute } from "../fixtures/networks";

describe("BlockingFlow", () => {
  const algorithm = new BlockingFlow();

  it("should saturate the diamond in a single phase", () => {
    const log = new TraceLog();
    const result = algorithm.run(diamond(), budget(), log);

    expect(result.iterations).to.equal(1);
    expect(result.value).to.equal(20);
    expect(log.events.map((e) => e.kind)).to.deep.equal(["phase", "path", "path", "terminated"]);
  });

  it("should trace the level graph of each phase", () => {
    const log = new TraceLog();
    algorithm.run(diamond(), budget(), log);

    const [phase] = log.ofKind("phase");
    expect(phase.phase).to.equal(1);
    expect(phase.levels).to.deep.equal({ S: 0, A: 1, B: 1, T: 2 });
    expect(phase.sinkLevel).to.equal(2);
  });

  it("should tag paths with their phase", () => {
    const log = new TraceLog();
    algorithm.run(diamond(), budget(), log);

    const paths = log.ofKind("path");
    expect(paths.map((p) => [p.phase, p.iteration, p.nodes.join("")])).to.deep.equal([
      [1, 1, "SAT"],
      [1, 2, "SBT"],
    ]);
  });

  it("should need a second phase when a longer path remains", () => {
    const log = new TraceLog();
    const result = algorithm.run(reroute(), budget(), log);

    expect(result.value).to.equal(2);
    expect(result.iterations).to.equal(2);
    const phases = log.ofKind("phase");
    expect(phases.map((p) => p.sinkLevel)).to.deep.equal([3, 5]);
  });

  it("should stop before the first phase when maxIterations is 0", () => {
    const result = algorithm.run(diamond(), budget({ maxIterations: 0 }));

    expect(result.termination).to.equal("BUDGET_EXCEEDED");
    expect(result.iterations).to.equal(0);
    expect(result.value).to.equal(0);
  });

  it("should not overflow the call stack on a long pipeline", () => {
    const length = 20_000;
    const edges = Array.from({ length }, (_, i) => ({
      from: i === 0 ? "S" : `N${i}`,
      to: i === length - 1 ? "T" : `N${i + 1}`,
      capacity: 1 + (i % 3),
    }));
    const result = algorithm.run(FlowNetwork.fromEdges(edges, "S", "T"), budget());

    expect(result.value).to.equal(1);
    expect(result.iterations).to.equal(1);
  });
});
