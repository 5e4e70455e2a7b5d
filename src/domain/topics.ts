/**
 * Event topics used by the orchestration core.
 *
 * Topics are plain strings, hierarchical by convention. Peers outside the
 * core (speech engine, music player, LED and motion controllers) publish and
 * consume the device topics; the timeline topics are owned by the executor.
 */

export const EventTopics = {
  // Service lifecycle
  SERVICE_STATUS_UPDATE: '/service/status/update',
  SERVICE_STATUS_REQUEST: '/service/status/request',
  SERVICE_READY: '/service/ready',

  // Timeline
  PLAN_READY: '/timeline/plan/ready',
  PLAN_STARTED: '/timeline/plan/started',
  PLAN_ENDED: '/timeline/plan/ended',
  PLAN_CANCEL_REQUEST: '/timeline/plan/cancel_request',
  STEP_READY: '/timeline/step/ready',
  STEP_EXECUTED: '/timeline/step/executed',

  // Audio
  AUDIO_DUCKING_START: '/audio/ducking/start',
  AUDIO_DUCKING_STOP: '/audio/ducking/stop',

  // Speech
  TTS_GENERATE_REQUEST: '/speech/tts/generate_request',
  SPEECH_SYNTHESIS_ENDED: '/speech/synthesis/ended',
  SPEECH_GENERATION_COMPLETE: '/speech/generation/complete',

  // Voice input and conversation
  VOICE_LISTENING_STARTED: '/voice/listening/started',
  LLM_RESPONSE: '/llm/response/complete',

  // Devices
  MUSIC_COMMAND: '/music/command',
  MUSIC_PLAYBACK_STARTED: '/music/playback/started',
  MUSIC_PLAYBACK_STOPPED: '/music/playback/stopped',
  EYE_COMMAND: '/eyes/command',
  MOTION_COMMAND: '/motion/command',
} as const;

export type KnownTopic = (typeof EventTopics)[keyof typeof EventTopics];
