/**
 * Speech Playback Coordinator Tests
 */

import { createRuntimeLogger } from "@murmur/shared";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ClipEvents, ClipPlayer, PlaybackDevice } from "../devices/IAudioDevices";
import { PlaybackDecodeError, ProviderError, type VoiceError } from "../errors";
import { SpeechPlaybackCoordinator } from "../engine/SpeechPlaybackCoordinator";
import type {
  SpeechProviderFactory,
  SpeechSynthesisProvider,
  SynthesisRequest,
  TranscriptionProvider,
} from "../providers/ISpeechProviders";
import type { PlaybackState, SynthesisConfig } from "../types";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

class FakeProviders implements SpeechProviderFactory {
  readonly requests: SynthesisRequest[] = [];
  synthesizeImpl: (request: SynthesisRequest) => Promise<Uint8Array> = async (request) =>
    encoder.encode(request.text);

  createSynthesizer(): SpeechSynthesisProvider {
    return {
      synthesize: (request) => {
        this.requests.push(request);
        return this.synthesizeImpl(request);
      },
    };
  }

  createTranscriber(): TranscriptionProvider {
    throw new Error("not used by playback");
  }
}

class FakePlayer implements ClipPlayer {
  playCount = 0;
  resumeCount = 0;
  paused = false;
  stopped = false;
  private playing = false;

  constructor(
    readonly clip: Uint8Array,
    private readonly events: ClipEvents
  ) {}

  get text(): string {
    return decoder.decode(this.clip);
  }

  play(): void {
    this.playCount += 1;
    this.playing = true;
  }

  pause(): void {
    this.playing = false;
    this.paused = true;
  }

  resume(): void {
    this.resumeCount += 1;
    this.playing = true;
    this.paused = false;
  }

  stop(): void {
    this.stopped = true;
    this.playing = false;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  finish(): void {
    if (!this.stopped) {
      this.playing = false;
      this.events.onFinished();
    }
  }

  failDecode(message: string): void {
    if (!this.stopped) {
      this.events.onDecodeError(new Error(message));
    }
  }
}

class FakePlaybackDevice implements PlaybackDevice {
  readonly players: FakePlayer[] = [];
  loadImpl: ((clip: Uint8Array) => Promise<void>) | null = null;

  async load(clip: Uint8Array, events: ClipEvents): Promise<ClipPlayer> {
    if (this.loadImpl) {
      await this.loadImpl(clip);
    }
    const player = new FakePlayer(clip, events);
    this.players.push(player);
    return player;
  }

  get texts(): string[] {
    return this.players.map((player) => player.text);
  }
}

const groq: SynthesisConfig = {
  backend: "groq",
  apiKey: "test-secret",
  baseUrl: "https://api.groq.com/openai/v1",
  model: "canopylabs/orpheus-v1-english",
  voice: "troy",
  responseFormat: "wav",
};

const paragraphs = (...letters: string[]) => letters.map((letter) => letter.repeat(150)).join("\n");

describe("SpeechPlaybackCoordinator", () => {
  let providers: FakeProviders;
  let device: FakePlaybackDevice;
  let coordinator: SpeechPlaybackCoordinator;
  let states: PlaybackState[];
  let errors: VoiceError[];
  const onError = (error: VoiceError) => {
    errors.push(error);
  };

  beforeEach(() => {
    providers = new FakeProviders();
    device = new FakePlaybackDevice();
    coordinator = new SpeechPlaybackCoordinator({
      device,
      providers,
      logger: createRuntimeLogger({ level: "silent" }),
    });
    states = [];
    errors = [];
    coordinator.subscribe((state) => {
      states.push(state);
    });
  });

  describe("lifecycle", () => {
    it("stop is a no-op when idle", () => {
      coordinator.stop();
      coordinator.stop();

      expect(coordinator.getState()).toEqual({ status: "idle" });
      expect(states).toEqual([]);
    });

    it("ignores blank text", () => {
      coordinator.request("m1", "  \n ", groq, onError);

      expect(providers.requests).toEqual([]);
      expect(states).toEqual([]);
    });

    it("moves through generating and playing back to idle", async () => {
      coordinator.request("m1", "Hello there.", groq, onError);
      expect(coordinator.isGenerating("m1")).toBe(true);

      await flush();
      expect(coordinator.isPlaying("m1")).toBe(true);
      expect(device.texts).toEqual(["Hello there."]);
      expect(device.players[0]?.playCount).toBe(1);

      device.players[0]?.finish();

      expect(states).toEqual([
        { status: "generating", messageId: "m1" },
        { status: "playing", messageId: "m1" },
        { status: "idle" },
      ]);
      expect(coordinator.isActive("m1")).toBe(false);
      expect(errors).toEqual([]);
    });

    it("sends the trimmed text to the provider", async () => {
      coordinator.request("m1", "  Hello  ", groq, onError);
      await flush();

      expect(providers.requests).toEqual([
        {
          text: "Hello",
          voice: "troy",
          model: "canopylabs/orpheus-v1-english",
          responseFormat: "wav",
        },
      ]);
    });

    it("unsubscribes listeners", () => {
      const listener = vi.fn();
      const unsubscribe = coordinator.subscribe(listener);
      unsubscribe();

      coordinator.request("m1", "Hello", groq, onError);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("ordering", () => {
    it("synthesizes one chunk at a time and plays clips in order", async () => {
      const pending: Array<{ request: SynthesisRequest; result: Deferred<Uint8Array> }> = [];
      providers.synthesizeImpl = (request) => {
        const result = deferred<Uint8Array>();
        pending.push({ request, result });
        return result.promise;
      };

      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);
      expect(pending).toHaveLength(1);

      for (let index = 0; index < 3; index++) {
        const next = pending[index];
        if (!next) {
          throw new Error(`chunk ${index} was not requested`);
        }
        next.result.resolve(encoder.encode(next.request.text));
        await flush();
        expect(pending).toHaveLength(Math.min(index + 2, 3));
        expect(device.players).toHaveLength(1);
      }

      device.players[0]?.finish();
      await flush();
      device.players[1]?.finish();
      await flush();
      device.players[2]?.finish();

      expect(device.texts).toEqual(["a".repeat(150), "b".repeat(150), "c".repeat(150)]);
      expect(device.players.map((player) => player.playCount)).toEqual([1, 1, 1]);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("plays clips in order whatever each chunk's synthesis latency", async () => {
      const delays: Record<string, number> = { a: 30, b: 5, c: 0 };
      providers.synthesizeImpl = async (request) => {
        await new Promise((resolve) => setTimeout(resolve, delays[request.text.charAt(0)] ?? 0));
        return encoder.encode(request.text);
      };

      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);

      for (const expected of ["a", "b", "c"]) {
        await vi.waitFor(() => {
          expect(device.players.at(-1)?.text).toBe(expected.repeat(150));
        });
        device.players.at(-1)?.finish();
      }

      expect(device.players).toHaveLength(3);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });
  });

  describe("control", () => {
    it("toggles pause and resume for the message already playing", async () => {
      coordinator.request("m1", "Hello", groq, onError);
      await flush();
      const player = device.players[0];

      coordinator.request("m1", "Hello", groq, onError);
      expect(coordinator.isPaused("m1")).toBe(true);
      expect(player?.paused).toBe(true);

      coordinator.request("m1", "Hello", groq, onError);
      expect(coordinator.isPlaying("m1")).toBe(true);
      expect(player?.resumeCount).toBe(1);

      await flush();
      expect(device.players).toHaveLength(1);
      expect(providers.requests).toHaveLength(1);
    });

    it("keeps the queue across a pause and continues from the paused clip", async () => {
      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);
      await flush();
      expect(device.players).toHaveLength(1);

      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);
      expect(coordinator.isPaused("m1")).toBe(true);
      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);
      expect(coordinator.isPlaying("m1")).toBe(true);

      device.players[0]?.finish();
      await flush();
      device.players[1]?.finish();
      await flush();
      device.players[2]?.finish();

      expect(device.texts).toEqual(["a".repeat(150), "b".repeat(150), "c".repeat(150)]);
      expect(device.players.map((player) => player.resumeCount)).toEqual([1, 0, 0]);
      expect(device.players.map((player) => player.playCount)).toEqual([1, 1, 1]);
      expect(providers.requests).toHaveLength(3);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("starts a clip that arrived while paused between clips on resume", async () => {
      const pending: Deferred<Uint8Array>[] = [];
      providers.synthesizeImpl = () => {
        const result = deferred<Uint8Array>();
        pending.push(result);
        return result.promise;
      };
      const complete = (index: number, letter: string) => {
        pending[index]?.resolve(encoder.encode(letter.repeat(150)));
      };

      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);
      complete(0, "a");
      await flush();
      device.players[0]?.finish();
      expect(coordinator.isPlaying("m1")).toBe(true);

      coordinator.pause("m1");
      complete(1, "b");
      await flush();
      expect(device.players).toHaveLength(1);
      expect(coordinator.isPaused("m1")).toBe(true);

      coordinator.resume("m1");
      await flush();
      expect(device.players).toHaveLength(2);
      expect(device.players[1]?.playCount).toBe(1);
      expect(device.players[1]?.resumeCount).toBe(0);

      complete(2, "c");
      await flush();
      device.players[1]?.finish();
      await flush();
      device.players[2]?.finish();

      expect(device.texts).toEqual(["a".repeat(150), "b".repeat(150), "c".repeat(150)]);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("stops when the generating message is requested again", async () => {
      const result = deferred<Uint8Array>();
      providers.synthesizeImpl = () => result.promise;

      coordinator.request("m1", "Hello", groq, onError);
      coordinator.request("m1", "Hello", groq, onError);
      expect(coordinator.getState()).toEqual({ status: "idle" });

      result.resolve(encoder.encode("Hello"));
      await flush();

      expect(device.players).toEqual([]);
      expect(errors).toEqual([]);
    });

    it("ignores a stop for a different message", async () => {
      coordinator.request("m1", "Hello", groq, onError);
      await flush();

      coordinator.stop("m2");

      expect(coordinator.isPlaying("m1")).toBe(true);
      expect(device.players[0]?.stopped).toBe(false);
    });

    it("stops the current player on stop", async () => {
      coordinator.request("m1", "Hello", groq, onError);
      await flush();

      coordinator.stop("m1");

      expect(device.players[0]?.stopped).toBe(true);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("starts a clip that loaded while paused only on resume", async () => {
      const loaded = deferred<void>();
      device.loadImpl = () => loaded.promise;

      coordinator.request("m1", "Hello", groq, onError);
      await flush();
      expect(coordinator.isPlaying("m1")).toBe(true);

      coordinator.pause("m1");
      loaded.resolve();
      await flush();
      expect(device.players[0]?.playCount).toBe(0);

      coordinator.resume("m1");
      expect(device.players[0]?.playCount).toBe(1);
      expect(device.players[0]?.resumeCount).toBe(0);
    });

    it("preempts the previous message without playing its late clips", async () => {
      const first = deferred<Uint8Array>();
      providers.synthesizeImpl = async (request) =>
        request.text === "First message" ? first.promise : encoder.encode(request.text);

      coordinator.request("a", "First message", groq, onError);
      coordinator.request("b", "Second message", groq, onError);
      await flush();

      first.resolve(encoder.encode("First message"));
      await flush();

      expect(device.texts).toEqual(["Second message"]);
      expect(coordinator.isPlaying("b")).toBe(true);
      expect(coordinator.isActive("a")).toBe(false);
      expect(errors).toEqual([]);
    });

    it("stops a player that finishes loading after the session ended", async () => {
      const loaded = deferred<void>();
      device.loadImpl = () => loaded.promise;

      coordinator.request("m1", "Hello", groq, onError);
      await flush();
      coordinator.stop();

      loaded.resolve();
      await flush();

      expect(device.players).toHaveLength(1);
      expect(device.players[0]?.stopped).toBe(true);
      expect(device.players[0]?.playCount).toBe(0);
    });
  });

  describe("failures", () => {
    it("reports a provider error once and returns to idle", async () => {
      const failure = new ProviderError("500", "Provider error (500): boom", { status: 500 });
      providers.synthesizeImpl = () => Promise.reject(failure);

      coordinator.request("m1", "Hello", groq, onError);
      await flush();

      expect(errors).toEqual([failure]);
      expect(errors[0]).toBe(failure);
      expect(states).toEqual([{ status: "generating", messageId: "m1" }, { status: "idle" }]);
    });

    it("stops playback when a later chunk fails", async () => {
      providers.synthesizeImpl = async (request) => {
        if (request.text.startsWith("b")) {
          throw new ProviderError("rate_limited", "Rate limit exceeded.");
        }
        return encoder.encode(request.text);
      };

      coordinator.request("m1", paragraphs("a", "b", "c"), groq, onError);
      await flush();

      expect(errors.map((error) => error.message)).toEqual(["Rate limit exceeded."]);
      expect(providers.requests).toHaveLength(2);
      expect(device.players.every((player) => player.stopped)).toBe(true);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("rejects an unplayable OpenAI format before any provider call", () => {
      coordinator.request(
        "m1",
        "Hello",
        {
          backend: "openai",
          apiKey: "test-secret",
          baseUrl: "https://api.openai.com/v1",
          model: "gpt-4o-mini-tts",
          voice: "alloy",
          responseFormat: "opus",
        },
        onError
      );

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({
        providerCode: "invalid_request",
        message: 'Invalid request: OpenAI format "opus" is not playable. Choose mp3, wav, aac, flac, or pcm.',
      });
      expect(providers.requests).toEqual([]);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("reports a clip the device cannot load as a decode error", async () => {
      device.loadImpl = () => Promise.reject(new Error("corrupt"));

      coordinator.request("m1", "Hello", groq, onError);
      await flush();

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(PlaybackDecodeError);
      expect(errors[0]?.message).toBe("Failed to decode audio: corrupt");
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("reports a decode error raised during playback", async () => {
      coordinator.request("m1", "Hello", groq, onError);
      await flush();

      device.players[0]?.failDecode("corrupt");

      expect(errors.map((error) => error.message)).toEqual(["Failed to decode audio: corrupt"]);
      expect(device.players[0]?.stopped).toBe(true);
      expect(coordinator.getState()).toEqual({ status: "idle" });
    });

    it("does not report errors after the session is stopped", async () => {
      const result = deferred<Uint8Array>();
      providers.synthesizeImpl = () => result.promise;

      coordinator.request("m1", "Hello", groq, onError);
      coordinator.stop();
      result.reject(new ProviderError("500", "Provider error (500): boom"));
      await flush();

      expect(errors).toEqual([]);
    });

    it("keeps a session the error handler starts", async () => {
      providers.synthesizeImpl = async (request) => {
        if (request.text === "Broken") {
          throw new ProviderError("500", "Provider error (500): boom");
        }
        return encoder.encode(request.text);
      };

      coordinator.request("a", "Broken", groq, () => {
        coordinator.request("b", "Recovered", groq, onError);
      });
      await flush();

      expect(coordinator.isPlaying("b")).toBe(true);
      expect(device.texts).toEqual(["Recovered"]);
      expect(errors).toEqual([]);
    });
  });

  describe("callbacks that throw", () => {
    it("keeps playing when a state listener throws", async () => {
      coordinator.subscribe(() => {
        throw new Error("listener broke");
      });

      coordinator.request("m1", paragraphs("a", "b"), groq, onError);
      await flush();
      device.players[0]?.finish();
      await flush();
      device.players[1]?.finish();

      expect(device.texts).toEqual(["a".repeat(150), "b".repeat(150)]);
      expect(states.at(-1)).toEqual({ status: "idle" });
      expect(errors).toEqual([]);
    });

    it("still tears the session down when the error handler throws", async () => {
      providers.synthesizeImpl = () => Promise.reject(new ProviderError("500", "Provider error (500): boom"));

      coordinator.request("m1", "Hello", groq, () => {
        throw new Error("handler broke");
      });
      await flush();

      expect(coordinator.getState()).toEqual({ status: "idle" });
      providers.synthesizeImpl = async (request) => encoder.encode(request.text);
      coordinator.request("m2", "Again", groq, onError);
      await flush();
      expect(coordinator.isPlaying("m2")).toBe(true);
    });
  });

  describe("clip containers", () => {
    it("wraps headerless OpenAI pcm in a WAV container", async () => {
      coordinator.request(
        "m1",
        "Hi",
        {
          backend: "openai",
          apiKey: "test-secret",
          baseUrl: "https://api.openai.com/v1",
          model: "gpt-4o-mini-tts",
          voice: "alloy",
          responseFormat: " PCM ",
        },
        onError
      );
      await flush();

      const clip = device.players[0]?.clip;
      expect(clip?.byteLength).toBe(46);
      expect(decoder.decode(clip?.subarray(0, 4))).toBe("RIFF");
      expect(decoder.decode(clip?.subarray(44))).toBe("Hi");
      expect(providers.requests[0]?.responseFormat).toBe("pcm");
    });
  });
});
