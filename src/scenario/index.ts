export {
  type Scenario,
  NEUTRAL_SCENARIO,
  ScenarioBuilder,
  applyScenario,
  leakageFromPercent,
  parsePipeSpecifier,
} from "./Scenario";
