/**
 * Speech Playback Coordinator
 *
 * Owns the single speak session: chunked synthesis, the ordered clip queue and
 * sequential playback with pause, resume and stop.
 *
 * Every asynchronous completion (synthesized clip, loaded clip, finished clip,
 * failure) re-enters through `deliver`, which drops it unless its session is
 * still the current one.
 */

import { getLogger, type RuntimeLogger } from "@murmur/shared";
import type { ClipPlayer, PlaybackDevice } from "../devices/IAudioDevices";
import { PlaybackDecodeError, type VoiceError } from "../errors";
import type { SpeechProviderFactory } from "../providers/ISpeechProviders";
import type { PlaybackState, SynthesisConfig } from "../types";
import { SynthesisJob } from "./SynthesisJob";

export type SpeechErrorHandler = (error: VoiceError) => void;

export type PlaybackListener = (state: PlaybackState) => void;

export interface SpeechPlaybackCoordinatorOptions {
  device: PlaybackDevice;
  providers: SpeechProviderFactory;
  logger?: RuntimeLogger;
}

interface PlaybackSession {
  readonly messageId: string;
  readonly job: SynthesisJob;
  readonly queue: Uint8Array[];
  onError: SpeechErrorHandler | null;
  synthesisFinished: boolean;
  player: ClipPlayer | null;
  playerStarted: boolean;
  /** A clip is being loaded by the device */
  loading: boolean;
  /** Identifies the clip currently loading or playing */
  clipTicket: number;
}

type SessionEvent =
  | { type: "clip"; clip: Uint8Array }
  | { type: "synthesisFinished" }
  | { type: "synthesisFailed"; error: VoiceError }
  | { type: "clipLoaded"; ticket: number; player: ClipPlayer }
  | { type: "clipFinished"; ticket: number }
  | { type: "clipFailed"; ticket: number; error: VoiceError };

const IDLE: PlaybackState = { status: "idle" };

function toDecodeError(error: unknown): VoiceError {
  if (error instanceof PlaybackDecodeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PlaybackDecodeError(`Failed to decode audio: ${message}`, { cause: error });
}

export class SpeechPlaybackCoordinator {
  private readonly device: PlaybackDevice;
  private readonly providers: SpeechProviderFactory;
  private readonly logger: RuntimeLogger;
  private readonly listeners = new Set<PlaybackListener>();
  private session: PlaybackSession | null = null;
  private state: PlaybackState = IDLE;

  constructor(options: SpeechPlaybackCoordinatorOptions) {
    this.device = options.device;
    this.providers = options.providers;
    this.logger = (options.logger ?? getLogger()).child({ module: "speech" });
  }

  // ============================================================
  // OBSERVATION
  // ============================================================

  getState(): PlaybackState {
    return this.state;
  }

  subscribe(listener: PlaybackListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isActive(messageId: string): boolean {
    return this.state.status !== "idle" && this.state.messageId === messageId;
  }

  isGenerating(messageId: string): boolean {
    return this.state.status === "generating" && this.state.messageId === messageId;
  }

  isPlaying(messageId: string): boolean {
    return this.state.status === "playing" && this.state.messageId === messageId;
  }

  isPaused(messageId: string): boolean {
    return this.state.status === "paused" && this.state.messageId === messageId;
  }

  // ============================================================
  // CONTROL
  // ============================================================

  /**
   * Speak `text` for `messageId`, or toggle the session already speaking it:
   * playing → paused, paused → playing, generating → stopped.
   * Blank text is ignored without starting a session.
   */
  request(messageId: string, text: string, config: SynthesisConfig, onError: SpeechErrorHandler): void {
    if (this.isPlaying(messageId)) {
      this.pause(messageId);
      return;
    }
    if (this.isPaused(messageId)) {
      this.resume(messageId);
      return;
    }
    if (this.isGenerating(messageId)) {
      this.stop(messageId);
      return;
    }

    this.stop();

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return;
    }

    const job = new SynthesisJob({
      text: trimmed,
      config,
      providers: this.providers,
      sink: {
        onClip: (clip) => this.deliver(session, { type: "clip", clip }),
        onFinished: () => this.deliver(session, { type: "synthesisFinished" }),
        onFailed: (error) => this.deliver(session, { type: "synthesisFailed", error }),
      },
    });
    const session: PlaybackSession = {
      messageId,
      job,
      queue: [],
      onError,
      synthesisFinished: false,
      player: null,
      playerStarted: false,
      loading: false,
      clipTicket: 0,
    };

    this.session = session;
    this.setState({ status: "generating", messageId });
    job.run().catch((error: unknown) => {
      this.logger.error("Synthesis job failed", { error: String(error) });
    });
  }

  pause(messageId: string): void {
    const session = this.session;
    if (!session || !this.isPlaying(messageId)) {
      return;
    }
    if (session.player && session.playerStarted && session.player.isPlaying()) {
      session.player.pause();
    }
    this.setState({ status: "paused", messageId });
  }

  resume(messageId: string): void {
    const session = this.session;
    if (!session || !this.isPaused(messageId)) {
      return;
    }
    this.setState({ status: "playing", messageId });

    const player = session.player;
    if (player && !player.isPlaying()) {
      if (session.playerStarted) {
        player.resume();
      } else {
        session.playerStarted = true;
        player.play();
      }
    }
    this.playNextIfNeeded(session);
  }

  /**
   * Stop the session. With a message id, only a session for that message is stopped.
   */
  stop(messageId?: string): void {
    if (messageId !== undefined && !this.isActive(messageId)) {
      return;
    }
    const session = this.session;
    this.session = null;
    if (session) {
      this.release(session);
    }
    this.setState(IDLE);
  }

  // ============================================================
  // SESSION EVENTS
  // ============================================================

  private deliver(session: PlaybackSession, event: SessionEvent): void {
    if (this.session !== session) {
      if (event.type === "clipLoaded") {
        event.player.stop();
      }
      return;
    }

    switch (event.type) {
      case "clip":
        session.queue.push(event.clip);
        this.enterPlayingIfGenerating(session);
        this.playNextIfNeeded(session);
        return;

      case "synthesisFinished":
        session.synthesisFinished = true;
        this.enterPlayingIfGenerating(session);
        this.playNextIfNeeded(session);
        return;

      case "synthesisFailed":
        this.fail(session, event.error);
        return;

      case "clipLoaded":
        if (event.ticket !== session.clipTicket) {
          event.player.stop();
          return;
        }
        session.loading = false;
        session.player = event.player;
        session.playerStarted = false;
        if (this.state.status === "playing") {
          session.playerStarted = true;
          event.player.play();
        }
        return;

      case "clipFinished":
        if (event.ticket !== session.clipTicket) {
          return;
        }
        session.player = null;
        session.playerStarted = false;
        this.playNextIfNeeded(session);
        return;

      case "clipFailed":
        if (event.ticket !== session.clipTicket) {
          return;
        }
        this.fail(session, event.error);
        return;
    }
  }

  private enterPlayingIfGenerating(session: PlaybackSession): void {
    if (this.state.status === "generating") {
      this.setState({ status: "playing", messageId: session.messageId });
    }
  }

  private playNextIfNeeded(session: PlaybackSession): void {
    if (this.session !== session || this.state.status !== "playing") {
      return;
    }
    if (session.player || session.loading) {
      return;
    }

    const clip = session.queue.shift();
    if (!clip) {
      if (session.synthesisFinished) {
        this.finish(session);
      }
      return;
    }

    session.loading = true;
    session.clipTicket += 1;
    this.loadClip(session, clip, session.clipTicket).catch((error: unknown) => {
      this.logger.error("Clip load failed", { error: String(error) });
    });
  }

  private async loadClip(session: PlaybackSession, clip: Uint8Array, ticket: number): Promise<void> {
    try {
      const player = await this.device.load(clip, {
        onFinished: () => this.deliver(session, { type: "clipFinished", ticket }),
        onDecodeError: (error) =>
          this.deliver(session, { type: "clipFailed", ticket, error: toDecodeError(error) }),
      });
      this.deliver(session, { type: "clipLoaded", ticket, player });
    } catch (error) {
      this.deliver(session, { type: "clipFailed", ticket, error: toDecodeError(error) });
    }
  }

  /**
   * Report a session failure once, then tear the session down unless the
   * handler already replaced it.
   */
  private fail(session: PlaybackSession, error: VoiceError): void {
    const handler = session.onError;
    session.onError = null;
    try {
      handler?.(error);
    } catch (handlerError) {
      this.logger.warn("Speech error handler failed", { error: String(handlerError) });
    }
    if (this.session === session) {
      this.stop();
    }
  }

  private finish(session: PlaybackSession): void {
    this.session = null;
    session.onError = null;
    session.player = null;
    this.setState(IDLE);
  }

  private release(session: PlaybackSession): void {
    session.job.cancel();
    session.onError = null;
    session.clipTicket += 1;
    session.loading = false;
    session.queue.length = 0;
    const player = session.player;
    session.player = null;
    player?.stop();
  }

  private setState(next: PlaybackState): void {
    const previous = this.state;
    this.state = next;
    if (
      previous.status === next.status &&
      (previous.status === "idle" || (next.status !== "idle" && previous.messageId === next.messageId))
    ) {
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn("Playback listener failed", { error: String(error) });
      }
    }
  }
}
