/**
 * Synthesis Job
 *
 * Synthesizes one message chunk by chunk, strictly in order. Cancellation is
 * cooperative: the flag is checked before each provider call and after it
 * returns, and a call already in flight is never aborted.
 */

import { toPlayableClip } from "../audio/wavContainer";
import { toVoiceError, type VoiceError } from "../errors";
import type { SpeechProviderFactory } from "../providers/ISpeechProviders";
import { packChunks } from "../text/chunkPacker";
import type { SynthesisConfig } from "../types";
import { planSynthesis } from "./synthesisPlan";

export interface SynthesisJobSink {
  onClip(clip: Uint8Array): void;
  onFinished(): void;
  onFailed(error: VoiceError): void;
}

export class SynthesisJob {
  private readonly text: string;
  private readonly config: SynthesisConfig;
  private readonly providers: SpeechProviderFactory;
  private readonly sink: SynthesisJobSink;
  private cancelled = false;

  constructor(options: {
    text: string;
    config: SynthesisConfig;
    providers: SpeechProviderFactory;
    sink: SynthesisJobSink;
  }) {
    this.text = options.text;
    this.config = options.config;
    this.providers = options.providers;
    this.sink = options.sink;
  }

  cancel(): void {
    this.cancelled = true;
  }

  /**
   * Run to completion. Never rejects: the outcome is reported to the sink,
   * and nothing is reported once the job is cancelled.
   */
  async run(): Promise<void> {
    let failure: VoiceError | null = null;
    try {
      const plan = planSynthesis(this.config);
      const synthesizer = this.providers.createSynthesizer(this.config);
      const chunks = packChunks(this.text, plan.maxChunkChars);

      for (const chunk of chunks) {
        if (this.cancelled) {
          return;
        }
        const clip = await synthesizer.synthesize(plan.buildRequest(chunk));
        if (this.cancelled) {
          return;
        }
        this.sink.onClip(toPlayableClip(plan.backend, plan.declaredFormat, clip));
      }
    } catch (error) {
      failure = toVoiceError(error);
    }

    if (this.cancelled) {
      return;
    }
    if (failure) {
      this.sink.onFailed(failure);
    } else {
      this.sink.onFinished();
    }
  }
}
