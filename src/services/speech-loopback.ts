/**
 * Loopback speech peer.
 *
 * Answers every TTS_GENERATE_REQUEST with SPEECH_SYNTHESIS_ENDED after a
 * fixed delay. Used by the CLI to run plans without a speech engine.
 */

import { TtsGenerateRequestPayload } from '../domain/payloads';
import { EventTopics } from '../domain/topics';
import { BaseService, ServiceOptions } from './base-service';

export class SpeechLoopback extends BaseService {
  readonly latencyMs: number;

  constructor(options: Omit<ServiceOptions, 'name'> & { name?: string; latencyMs: number }) {
    super({ ...options, name: options.name ?? 'speech_loopback' });
    this.latencyMs = options.latencyMs;
  }

  protected async onStart(): Promise<void> {
    this.subscribe(EventTopics.TTS_GENERATE_REQUEST, this.handleRequest);
  }

  private handleRequest = (request: TtsGenerateRequestPayload): void => {
    this.tasks.spawn(`speak:${request.clip_id}`, async (signal) => {
      await this.clock.sleep(this.latencyMs, signal);
      this.log.debug('Simulated speech finished', { clipId: request.clip_id });
      await this.bus.publish(EventTopics.SPEECH_SYNTHESIS_ENDED, {
        clip_id: request.clip_id,
        step_id: request.step_id,
      });
    });
  };
}
