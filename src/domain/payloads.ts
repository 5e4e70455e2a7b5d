/**
 * Event payload model.
 *
 * Payloads travel as string-keyed maps. Topics the core knows about have a
 * typed shape registered in TopicPayloadMap; every other topic falls back to
 * the generic Payload map so peers can add topics without touching the core.
 */

import { Layer, PlanEndStatus, StepOutcome } from './plan';
import { ServiceStatus, Severity } from './service';
import { EventTopics } from './topics';

/** Generic payload for topics without a registered shape. */
export type Payload = Record<string, unknown>;

export function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Flag carried by verification probes; external handlers never see these. */
export const PROBE_FLAG = '__probe';

export function isProbe(payload: Payload): boolean {
  return payload[PROBE_FLAG] === true;
}

export type PlanReadyPayload = {
  plan_id?: string;
  layer: string;
  steps: Payload[];
};

export type PlanStartedPayload = {
  plan_id: string;
  layer: Layer;
};

export type PlanEndedPayload = {
  plan_id: string;
  layer: Layer;
  status: PlanEndStatus;
  reason?: string;
};

export type PlanCancelRequestPayload = {
  plan_id: string;
};

export type StepReadyPayload = {
  plan_id: string;
  step_id: string;
};

export type StepExecutedPayload = {
  plan_id: string;
  step_id: string;
  status: StepOutcome;
  details?: Payload;
};

export type AudioDuckingStartPayload = {
  level: number;
  fade_ms: number;
};

export type AudioDuckingStopPayload = {
  fade_ms: number;
};

export type TtsGenerateRequestPayload = {
  text: string;
  clip_id: string;
  step_id: string;
  plan_id: string;
};

export type SpeechSynthesisEndedPayload = {
  clip_id?: string;
  step_id?: string;
};

export type SpeechGenerationCompletePayload = {
  clip_id?: string;
};

export type VoiceListeningStartedPayload = {
  source?: string;
};

/** A conversational reply. Fillers bridge latency and do not duck the music. */
export type LlmResponsePayload = {
  text: string;
  response_type?: string;
  is_complete?: boolean;
};

export type MusicCommandPayload = {
  action: 'play' | 'stop';
  song_query?: string;
  source?: string;
};

export type MusicPlaybackStartedPayload = {
  track?: Payload;
  source?: string;
  mode?: string;
};

export type MusicPlaybackStoppedPayload = {
  reason?: string;
};

export type EyeCommandPayload = {
  pattern: string;
  color: string;
};

export type MotionCommandPayload = {
  motion: string;
};

export type ServiceStatusPayload = {
  service_name: string;
  status: ServiceStatus;
  message: string;
  severity?: Severity;
  uptime?: string;
  last_update?: string;
};

export type ServiceStatusRequestPayload = {
  service_name?: string;
};

export type ServiceReadyPayload = {
  service_name: string;
  timestamp: string;
};

/** Typed payload shape for each known topic. */
export type TopicPayloadMap = {
  [EventTopics.PLAN_READY]: PlanReadyPayload;
  [EventTopics.PLAN_STARTED]: PlanStartedPayload;
  [EventTopics.PLAN_ENDED]: PlanEndedPayload;
  [EventTopics.PLAN_CANCEL_REQUEST]: PlanCancelRequestPayload;
  [EventTopics.STEP_READY]: StepReadyPayload;
  [EventTopics.STEP_EXECUTED]: StepExecutedPayload;
  [EventTopics.AUDIO_DUCKING_START]: AudioDuckingStartPayload;
  [EventTopics.AUDIO_DUCKING_STOP]: AudioDuckingStopPayload;
  [EventTopics.TTS_GENERATE_REQUEST]: TtsGenerateRequestPayload;
  [EventTopics.SPEECH_SYNTHESIS_ENDED]: SpeechSynthesisEndedPayload;
  [EventTopics.SPEECH_GENERATION_COMPLETE]: SpeechGenerationCompletePayload;
  [EventTopics.VOICE_LISTENING_STARTED]: VoiceListeningStartedPayload;
  [EventTopics.LLM_RESPONSE]: LlmResponsePayload;
  [EventTopics.MUSIC_COMMAND]: MusicCommandPayload;
  [EventTopics.MUSIC_PLAYBACK_STARTED]: MusicPlaybackStartedPayload;
  [EventTopics.MUSIC_PLAYBACK_STOPPED]: MusicPlaybackStoppedPayload;
  [EventTopics.EYE_COMMAND]: EyeCommandPayload;
  [EventTopics.MOTION_COMMAND]: MotionCommandPayload;
  [EventTopics.SERVICE_STATUS_UPDATE]: ServiceStatusPayload;
  [EventTopics.SERVICE_STATUS_REQUEST]: ServiceStatusRequestPayload;
  [EventTopics.SERVICE_READY]: ServiceReadyPayload;
};

/** Payload type for a topic: the registered shape, or the generic map. */
export type PayloadFor<T extends string> = T extends keyof TopicPayloadMap ? TopicPayloadMap[T] : Payload;

export type EventHandler<P = Payload> = (payload: P) => void | Promise<void>;
