/**
 * Timeline executor.
 *
 * Runs Plans on three priority layers. Each layer holds at most one plan
 * task; a new plan on a layer replaces the one running there. An override
 * plan cancels the layers below it, and a foreground plan pauses ambient
 * until it finishes. Speech steps duck the music, request synthesis and
 * wait for the clip to end before releasing the duck.
 *
 * Admission never waits on a running plan. The layer tables change at once,
 * the replaced tasks are cancelled, and the new task holds its PLAN_STARTED
 * until they have finished.
 */

import { Deferred, createDeferred, throwIfAborted, withTimeout } from '../clock';
import { DEFAULT_CONFIG, TimelineConfig } from '../config';
import {
  CancellationError,
  LifecycleError,
  TimeoutError,
  ValidationError,
  createTypedError,
  isCancellation,
  speechTimeoutError,
} from '../domain/errors';
import {
  LlmResponsePayload,
  MusicPlaybackStartedPayload,
  MusicPlaybackStoppedPayload,
  PlanCancelRequestPayload,
  PlanReadyPayload,
  SpeechGenerationCompletePayload,
  SpeechSynthesisEndedPayload,
  VoiceListeningStartedPayload,
} from '../domain/payloads';
import {
  Layer,
  Plan,
  PlanEndStatus,
  PlanRecord,
  PlanStep,
  STOP_MUSIC_GENRE,
  StepResult,
  lowerLayers,
} from '../domain/plan';
import { EventTopics } from '../domain/topics';
import { describeError } from '../logger';
import { BaseService, ServiceOptions } from '../services/base-service';
import { Gate } from './gate';
import { parsePlan } from './plan-validator';
import { SupervisedTask, TaskOutcome } from './task-supervisor';

export interface TimelineExecutorOptions extends Omit<ServiceOptions, 'name'> {
  name?: string;
  config?: Partial<TimelineConfig>;
}

interface LayerTask {
  plan: Plan;
  task: SupervisedTask;
}

interface SpeechWaiter {
  clipId: string;
  stepId: string;
  done: Deferred<void>;
}

export interface LayerSnapshot {
  planId?: string;
  status?: PlanRecord['status'];
  gateOpen: boolean;
  taskActive: boolean;
}

export const EYE_COMMAND_COLOR = '#FFFFFF';
export const DEFAULT_EYE_PATTERN = 'default';

export class TimelineExecutor extends BaseService {
  readonly config: TimelineConfig;
  private layerTasks = new Map<Layer, LayerTask>();
  private activePlans = new Map<Layer, PlanRecord>();
  private gates: Record<Layer, Gate> = {
    [Layer.Ambient]: new Gate(),
    [Layer.Foreground]: new Gate(),
    [Layer.Override]: new Gate(),
  };
  private speechWaiters: SpeechWaiter[] = [];
  private musicPlaying = false;
  /** Duck taken for the microphone or a direct reply, released on SPEECH_GENERATION_COMPLETE. */
  private conversationDuckHeld = false;

  constructor(options: TimelineExecutorOptions) {
    super({ ...options, name: options.name ?? 'timeline_executor' });
    this.config = { ...DEFAULT_CONFIG.timeline, ...options.config };
  }

  protected async onStart(): Promise<void> {
    this.subscribe(EventTopics.PLAN_READY, this.handlePlanReady);
    this.subscribe(EventTopics.PLAN_CANCEL_REQUEST, this.handleCancelRequest);
    this.subscribe(EventTopics.SPEECH_SYNTHESIS_ENDED, this.handleSpeechEnded);
    this.subscribe(EventTopics.VOICE_LISTENING_STARTED, this.handleVoiceListening);
    this.subscribe(EventTopics.LLM_RESPONSE, this.handleLlmResponse);
    this.subscribe(EventTopics.SPEECH_GENERATION_COMPLETE, this.handleGenerationComplete);
    this.subscribe(EventTopics.MUSIC_PLAYBACK_STARTED, this.handleMusicStarted);
    this.subscribe(EventTopics.MUSIC_PLAYBACK_STOPPED, this.handleMusicStopped);
  }

  protected async onStop(): Promise<void> {
    const running = [...this.layerTasks.values()];
    for (const { task } of running) task.cancel('shutdown');
    await Promise.all(running.map(({ task }) => task.done));

    for (const waiter of this.speechWaiters) waiter.done.reject(new CancellationError('shutdown'));
    this.speechWaiters = [];
    this.activePlans.clear();
    for (const gate of Object.values(this.gates)) gate.open();
  }

  /**
   * Validate and admit a plan. Resolves once its task is spawned, without
   * waiting for the plans it replaces; throws ValidationError for a
   * malformed plan.
   */
  async submitPlan(payload: unknown): Promise<Plan> {
    if (!this.isRunning) {
      throw new LifecycleError(
        createTypedError({
          code: 'SERVICE.NOT_RUNNING',
          message: `${this.name} is not running (status ${this.status})`,
          details: { status: this.status },
        }),
      );
    }
    const plan = parsePlan(payload);
    this.admit(plan);
    return plan;
  }

  /** Cancel the plan with `planId` and wait for it to finish. Returns false if it is not active. */
  async cancelPlan(planId: string): Promise<boolean> {
    const entry = this.findTask(planId);
    if (!entry) return false;
    entry.task.cancel('cancelled');
    await entry.task.done;
    return true;
  }

  getActivePlans(): PlanRecord[] {
    return [...this.activePlans.values()].map((record) => ({ plan: record.plan, status: record.status }));
  }

  getLayerSnapshot(): Record<Layer, LayerSnapshot> {
    const snapshot = (layer: Layer): LayerSnapshot => {
      const record = this.activePlans.get(layer);
      return {
        planId: record?.plan.plan_id,
        status: record?.status,
        gateOpen: this.gates[layer].isOpen(),
        taskActive: this.layerTasks.has(layer),
      };
    };
    return {
      [Layer.Ambient]: snapshot(Layer.Ambient),
      [Layer.Foreground]: snapshot(Layer.Foreground),
      [Layer.Override]: snapshot(Layer.Override),
    };
  }

  // --- Admission ---

  private admit(plan: Plan): void {
    const { layer } = plan;
    this.log.info('Admitting plan', { planId: plan.plan_id, layer, steps: plan.steps.length });

    const predecessors: Promise<unknown>[] = [];
    const replaced = this.cancelLayer(layer, 'preempted');
    if (replaced) predecessors.push(replaced);

    if (layer === Layer.Override) {
      for (const lower of lowerLayers(layer)) {
        const cancelled = this.cancelLayer(lower, 'preempted');
        if (cancelled) predecessors.push(cancelled);
        this.gates[lower].open();
      }
    }

    if (layer === Layer.Foreground) {
      this.gates[Layer.Ambient].close();
      const ambient = this.activePlans.get(Layer.Ambient);
      if (ambient && ambient.status === 'running') {
        ambient.status = 'paused';
        predecessors.push(this.publishEnded(ambient.plan, 'paused'));
      }
    }

    const status = this.gates[layer].isOpen() ? 'running' : 'paused';
    this.activePlans.set(layer, { plan, status });
    this.launch(plan, Promise.all(predecessors));
  }

  /** Cancel the task on `layer`, if any, and hand back its completion. */
  private cancelLayer(layer: Layer, reason: 'preempted' | 'restart'): Promise<TaskOutcome> | undefined {
    const entry = this.layerTasks.get(layer);
    if (!entry) return undefined;
    entry.task.cancel(reason);
    return entry.task.done;
  }

  private launch(plan: Plan, predecessors: Promise<unknown>): void {
    const task = this.tasks.spawn(`plan:${plan.plan_id}`, (signal) => this.runPlan(plan, signal, predecessors));
    this.layerTasks.set(plan.layer, { plan, task });
  }

  /** Restart a paused ambient plan from its first step once nothing above it is active. */
  private resumeAmbient(): void {
    if (!this.isRunning) return;
    if (this.layerTasks.has(Layer.Foreground) || this.layerTasks.has(Layer.Override)) return;

    const record = this.activePlans.get(Layer.Ambient);
    if (record && record.status === 'paused') {
      const retired = this.cancelLayer(Layer.Ambient, 'restart');
      this.gates[Layer.Ambient].open();
      record.status = 'running';
      this.log.info('Resuming ambient plan from the first step', { planId: record.plan.plan_id });
      this.launch(record.plan, retired ?? Promise.resolve());
    } else {
      this.gates[Layer.Ambient].open();
    }
  }

  private findTask(planId: string): LayerTask | undefined {
    return [...this.layerTasks.values()].find((entry) => entry.plan.plan_id === planId);
  }

  // --- Step loop ---

  private async runPlan(plan: Plan, signal: AbortSignal, predecessors: Promise<unknown>): Promise<void> {
    const { plan_id: planId, layer } = plan;
    const log = this.log.child({ planId, layer });
    let ending: { status: PlanEndStatus; reason?: string } | undefined;
    let cancellation: CancellationError | undefined;

    // Settles without rejecting: task completions and a publish that logs its own failure.
    await predecessors;
    try {
      await this.bus.publish(EventTopics.PLAN_STARTED, { plan_id: planId, layer });
      ending = { status: 'completed' };
      for (const step of plan.steps) {
        throwIfAborted(signal);
        if (step.delay !== undefined && step.delay > 0) {
          await this.clock.sleep(step.delay * 1000, signal);
        }
        if (step.event !== undefined) {
          // Pass-through: the named event is recorded, not awaited.
          log.debug('Step event is not awaited', { stepId: step.id, event: step.event });
        }
        await this.gates[layer].wait(signal);

        await this.bus.publish(EventTopics.STEP_READY, { plan_id: planId, step_id: step.id });
        throwIfAborted(signal);
        const result = await this.executeStep(plan, step, signal);
        await this.bus.publish(EventTopics.STEP_EXECUTED, {
          plan_id: planId,
          step_id: step.id,
          status: result.success ? 'success' : 'failure',
          details: result.details,
        });

        if (!result.success) {
          log.warn('Step failed, aborting plan', { stepId: step.id });
          ending = { status: 'failed', reason: `Step ${step.id} failed` };
          break;
        }
      }
    } catch (err) {
      if (isCancellation(err)) {
        cancellation = err;
        ending = err.reason === 'restart' ? undefined : { status: 'cancelled', reason: err.reason };
      } else {
        await this.reportError(`Error executing plan ${planId}: ${describeError(err)}`);
        ending = { status: 'failed', reason: describeError(err) };
      }
    }

    // A restarted plan shares its Plan with the task it replaces, so match on the signal.
    if (this.layerTasks.get(layer)?.task.signal === signal) this.layerTasks.delete(layer);
    if (ending) {
      if (this.activePlans.get(layer)?.plan === plan) this.activePlans.delete(layer);
      await this.publishEnded(plan, ending.status, ending.reason);
      log.info('Plan ended', { status: ending.status });
      if (layer === Layer.Foreground && this.shouldResumeAmbient(ending.status, cancellation)) {
        this.resumeAmbient();
      }
    }
    if (cancellation) throw cancellation;
  }

  /** Foreground endings that hand the stage back to ambient. Preemption and shutdown do not. */
  private shouldResumeAmbient(status: PlanEndStatus, cancellation?: CancellationError): boolean {
    if (status === 'completed' || status === 'failed') return true;
    return status === 'cancelled' && cancellation?.reason === 'cancelled';
  }

  private async publishEnded(plan: Plan, status: PlanEndStatus, reason?: string): Promise<void> {
    try {
      await this.bus.publish(EventTopics.PLAN_ENDED, {
        plan_id: plan.plan_id,
        layer: plan.layer,
        status,
        ...(reason === undefined ? {} : { reason }),
      });
    } catch (err) {
      this.log.error('Failed to publish plan end', { planId: plan.plan_id, status, error: describeError(err) });
    }
  }

  /** Dispatch one step. Failures other than cancellation become a failed result. */
  private async executeStep(plan: Plan, step: PlanStep, signal: AbortSignal): Promise<StepResult> {
    try {
      switch (step.type) {
        case 'speak':
          return await this.speak(plan, step, signal);
        case 'play_music':
          return await this.playMusic(step);
        case 'eye_pattern': {
          const pattern = step.pattern ?? DEFAULT_EYE_PATTERN;
          await this.bus.publish(EventTopics.EYE_COMMAND, { pattern, color: EYE_COMMAND_COLOR });
          return { success: true, details: { pattern } };
        }
        case 'move': {
          if (step.motion === undefined) return missingField(step, 'motion');
          await this.bus.publish(EventTopics.MOTION_COMMAND, { motion: step.motion });
          return { success: true, details: { motion: step.motion } };
        }
        case 'delay':
        case 'wait_for_event':
          return { success: true, details: {} };
      }
    } catch (err) {
      if (isCancellation(err)) throw err;
      const message = `Error executing step ${step.id} in plan ${plan.plan_id}: ${describeError(err)}`;
      await this.reportError(message);
      return { success: false, details: { error: describeError(err) } };
    }
  }

  private async playMusic(step: PlanStep): Promise<StepResult> {
    if (step.genre === undefined) return missingField(step, 'genre');
    if (step.genre === STOP_MUSIC_GENRE) {
      await this.bus.publish(EventTopics.MUSIC_COMMAND, { action: 'stop' });
      this.musicPlaying = false;
      return { success: true, details: { action: 'stop' } };
    }
    await this.bus.publish(EventTopics.MUSIC_COMMAND, { action: 'play', song_query: step.genre, source: 'voice' });
    this.musicPlaying = true;
    return { success: true, details: { action: 'play', genre: step.genre } };
  }

  /**
   * Duck, request synthesis, wait for the clip to end, unduck. The duck is
   * released on every path out of this method.
   */
  private async speak(plan: Plan, step: PlanStep, signal: AbortSignal): Promise<StepResult> {
    if (step.text === undefined) return missingField(step, 'text');
    const clipId = step.clip_id ?? step.id;
    const waiter: SpeechWaiter = { clipId, stepId: step.id, done: createDeferred<void>() };
    const log = this.log.child({ planId: plan.plan_id, stepId: step.id, clipId });

    await this.bus.publish(EventTopics.AUDIO_DUCKING_START, {
      level: this.config.duckingLevel,
      fade_ms: this.config.duckingFadeMs,
    });
    this.speechWaiters.push(waiter);
    try {
      await this.clock.sleep(this.config.duckSettleMs, signal);
      await this.bus.publish(EventTopics.TTS_GENERATE_REQUEST, {
        text: step.text,
        clip_id: clipId,
        step_id: step.id,
        plan_id: plan.plan_id,
      });

      const timeoutMs = this.config.speechWaitTimeoutMs;
      try {
        await withTimeout(
          waiter.done.promise,
          timeoutMs,
          this.clock,
          () => new TimeoutError(speechTimeoutError(plan.plan_id, step.id, timeoutMs)),
          signal,
        );
      } catch (err) {
        if (!(err instanceof TimeoutError)) throw err;
        await this.reportError(err.message);
        return { success: false, details: { clip_id: clipId, error: err.message, code: err.code } };
      }
      log.debug('Speech completed');
      return { success: true, details: { clip_id: clipId } };
    } finally {
      this.speechWaiters = this.speechWaiters.filter((entry) => entry !== waiter);
      await this.unduck(signal);
    }
  }

  private async unduck(signal: AbortSignal): Promise<void> {
    if (!signal.aborted) {
      try {
        await this.clock.sleep(this.config.unduckSettleMs, signal);
      } catch (err) {
        if (!isCancellation(err)) throw err;
        this.log.debug('Skipping unduck settle after cancellation');
      }
    }
    // This release also covers a conversation duck taken before the step.
    this.conversationDuckHeld = false;
    await this.bus.publish(EventTopics.AUDIO_DUCKING_STOP, { fade_ms: this.config.duckingFadeMs });
  }

  private async duckForConversation(cause: string): Promise<void> {
    if (!this.musicPlaying || this.conversationDuckHeld || this.speechWaiters.length > 0) return;
    this.conversationDuckHeld = true;
    this.log.info('Ducking music', { cause });
    await this.bus.publish(EventTopics.AUDIO_DUCKING_START, {
      level: this.config.duckingLevel,
      fade_ms: this.config.duckingFadeMs,
    });
  }

  // --- Bus handlers ---

  private handlePlanReady = async (payload: PlanReadyPayload): Promise<void> => {
    try {
      await this.submitPlan(payload);
    } catch (err) {
      if (err instanceof ValidationError || err instanceof LifecycleError) {
        await this.reportError(`Rejected plan: ${err.message}`);
        return;
      }
      throw err;
    }
  };

  private handleCancelRequest = (payload: PlanCancelRequestPayload): void => {
    const entry = this.findTask(payload.plan_id);
    if (!entry) {
      this.log.warn('Cancel request for unknown plan', { planId: payload.plan_id });
      return;
    }
    entry.task.cancel('cancelled');
  };

  private handleSpeechEnded = (payload: SpeechSynthesisEndedPayload): void => {
    const pending = this.speechWaiters.filter((waiter) => !waiter.done.settled);
    let waiter =
      (payload.clip_id !== undefined ? pending.find((entry) => entry.clipId === payload.clip_id) : undefined) ??
      (payload.step_id !== undefined ? pending.find((entry) => entry.stepId === payload.step_id) : undefined);

    if (!waiter && this.config.speechEndFallback && pending.length > 0) {
      waiter = pending[0];
      this.log.warn('Speech end matched no clip or step; completing the oldest waiter', {
        clipId: payload.clip_id,
        stepId: payload.step_id,
        resolvedClipId: waiter.clipId,
      });
    }
    if (!waiter) {
      this.log.debug('Speech end with no pending waiter', { clipId: payload.clip_id, stepId: payload.step_id });
      return;
    }
    waiter.done.resolve();
  };

  private handleVoiceListening = async (_payload: VoiceListeningStartedPayload): Promise<void> => {
    await this.duckForConversation('microphone');
  };

  private handleLlmResponse = async (payload: LlmResponsePayload): Promise<void> => {
    if (payload.response_type === 'filler') {
      this.log.debug('Filler response, music stays up');
      return;
    }
    await this.duckForConversation('reply');
  };

  private handleGenerationComplete = async (_payload: SpeechGenerationCompletePayload): Promise<void> => {
    if (!this.conversationDuckHeld) return;
    this.conversationDuckHeld = false;
    await this.bus.publish(EventTopics.AUDIO_DUCKING_STOP, { fade_ms: this.config.duckingFadeMs });
  };

  private handleMusicStarted = (payload: MusicPlaybackStartedPayload): void => {
    this.musicPlaying = true;
    this.log.debug('Music playback started', { source: payload.source });
  };

  private handleMusicStopped = (_payload: MusicPlaybackStoppedPayload): void => {
    this.musicPlaying = false;
  };
}

function missingField(step: PlanStep, field: keyof PlanStep): StepResult {
  return { success: false, details: { error: `Step ${step.id} (${step.type}) is missing "${field}"` } };
}
