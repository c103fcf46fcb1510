export {
  type TraceRecorder,
  NOOP_RECORDER,
  TraceLog,
  TraceChannel,
} from "./TraceRecorder";
export type {
  AlgorithmEvent,
  AlgorithmEventBody,
  AlgorithmEventKind,
  ArcDirection,
  ArcStep,
  PathEvent,
  PhaseEvent,
  PushEvent,
  RelabelEvent,
  ExcessReturnEvent,
  TerminatedEvent,
} from "./AlgorithmEvent";
