export {
  compare,
  describeExpectation,
  evaluateAssertion,
  evaluateGate,
  type GateOptions,
} from "./assertion-engine.ts";
