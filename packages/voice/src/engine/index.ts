export {
  SpeechPlaybackCoordinator,
  type PlaybackListener,
  type SpeechErrorHandler,
  type SpeechPlaybackCoordinatorOptions,
} from "./SpeechPlaybackCoordinator";
export {
  RecordingCoordinator,
  type RecordingCoordinatorOptions,
  type RecordingListener,
  type StartRecordingOptions,
} from "./RecordingCoordinator";
export { SynthesisJob, type SynthesisJobSink } from "./SynthesisJob";
export { PLAYABLE_OPENAI_FORMATS, planSynthesis, type SynthesisPlan } from "./synthesisPlan";
