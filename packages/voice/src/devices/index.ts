export type {
  CaptureDevice,
  CaptureSession,
  CaptureStartOptions,
  ClipEvents,
  ClipPlayer,
  MicrophonePermission,
  PlaybackDevice,
} from "./IAudioDevices";
export { findExecutable } from "./executables";
export {
  SoxCaptureDevice,
  resolveCaptureCommand,
  type RecorderCommand,
  type SoxCaptureDeviceOptions,
} from "./SoxCaptureDevice";
export {
  ProcessPlaybackDevice,
  detectClipExtension,
  resolvePlayerCommand,
  type ClipExtension,
  type PlayerCommand,
  type ProcessPlaybackDeviceOptions,
} from "./ProcessPlaybackDevice";
