export {
  buildSelector,
  buildTargetCandidates,
  describeWindowRoot,
  selectorForElement,
} from "./candidates/desktop";
export { MAX_ANCESTOR_HOPS, ancestorChain, structuralPath } from "./path/ancestry";
export { classifyKey } from "./recorder/keys";
export type { KeyKind } from "./recorder/keys";
export {
  PassiveRecorder,
  describeRecordedStep,
  recordMacro,
  recorderDefaults,
} from "./recorder/session";
export type { PassiveRecorderOptions } from "./recorder/session";
export {
  TransitionLock,
  createRecorderState,
  enterKey,
  idleTick,
  keystroke,
  pointerPress,
  specialKey,
  stopRecording,
} from "./recorder/state";
export type { RecorderPhase, RecorderState, TransitionContext } from "./recorder/state";
