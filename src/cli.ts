#!/usr/bin/env node
/**
 * cuebus command line.
 *
 *   cuebus run <plan.json> [--simulate-speech <ms>] [--timeout <ms>]
 *
 * Boots the core, submits the plan file and prints each executed step and
 * the way the plan ended. Exits non-zero unless the plan completed.
 */

import { readFile } from 'fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { version } from '../package.json';
import { Clock } from './clock';
import { ConfigOverrides, loadConfig } from './config';
import { ValidationError, createTypedError, validationError } from './domain/errors';
import { PlanEndStatus, isPlanEndStatus } from './domain/plan';
import { EventTopics } from './domain/topics';
import { parsePlan } from './engine/plan-validator';
import { describeError, setLogLevel } from './logger';
import { createCoreContext, shutdownCore, startCore } from './runtime';
import { SpeechLoopback } from './services/speech-loopback';

export const DEFAULT_RUN_TIMEOUT_MS = 120_000;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface RunPlanOptions {
  /** Answer speech requests after this many milliseconds. */
  simulateSpeech?: number;
  timeoutMs?: number;
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
  clock?: Clock;
  io?: CliIO;
}

export interface StepReport {
  stepId: string;
  status: string;
}

export interface RunPlanReport {
  planId: string;
  status: PlanEndStatus;
  reason?: string;
  steps: StepReport[];
}

export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative whole number of milliseconds.');
  }
  return parsed;
}

async function readPlanDocument(file: string): Promise<unknown> {
  const raw = await readFile(file, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(validationError(`${file} is not valid JSON: ${describeError(err)}`, { file }));
  }
}

/** Run one plan file to its end and report the outcome. */
export async function runPlanFile(file: string, options: RunPlanOptions = {}): Promise<RunPlanReport> {
  const io = options.io ?? consoleIO;
  const plan = parsePlan(await readPlanDocument(file));
  const config = loadConfig(options.env ?? process.env, options.overrides);
  setLogLevel(config.logLevel);

  const context = createCoreContext({ config, clock: options.clock });
  if (options.simulateSpeech !== undefined) {
    context.services.register(
      new SpeechLoopback({ bus: context.bus, clock: context.clock, latencyMs: options.simulateSpeech }),
    );
  }

  await startCore(context);
  try {
    const { synchronizer, executor } = context;
    await synchronizer.watch([EventTopics.PLAN_ENDED, EventTopics.STEP_EXECUTED]);
    await executor.submitPlan(plan);

    const ended = await synchronizer.waitForEvent(EventTopics.PLAN_ENDED, {
      timeoutMs: options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS,
      condition: (payload) => payload.plan_id === plan.plan_id && payload.status !== 'paused',
    });
    const status = ended.status;
    if (!isPlanEndStatus(status)) {
      throw new ValidationError(
        createTypedError({
          code: 'TIMELINE.UNKNOWN_END',
          message: `Plan ${plan.plan_id} ended with unknown status ${String(status)}`,
          planId: plan.plan_id,
        }),
      );
    }

    const steps = synchronizer
      .getEvents(EventTopics.STEP_EXECUTED)
      .filter((payload) => payload.plan_id === plan.plan_id)
      .map((payload) => ({ stepId: String(payload.step_id), status: String(payload.status) }));
    for (const step of steps) io.out(`step ${step.stepId}: ${step.status}`);

    const report: RunPlanReport = { planId: plan.plan_id, status, steps };
    if (typeof ended.reason === 'string') report.reason = ended.reason;
    io.out(`plan ${plan.plan_id}: ${status}${report.reason ? ` (${report.reason})` : ''}`);
    return report;
  } finally {
    const failures = await shutdownCore(context);
    for (const failure of failures) io.err(`failed to stop ${failure.service}: ${failure.error}`);
  }
}

export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();
  program
    .name('cuebus')
    .description('Layered cue engine for event-driven show control')
    .version(version);

  program
    .command('run <plan>')
    .description('Run a plan file and report how it ended')
    .option('--simulate-speech <ms>', 'answer speech requests after <ms> milliseconds', parseMilliseconds)
    .option('--timeout <ms>', 'stop waiting for the plan after <ms> milliseconds', parseMilliseconds)
    .action(async (file: string, options: { simulateSpeech?: number; timeout?: number }) => {
      const report = await runPlanFile(file, {
        simulateSpeech: options.simulateSpeech,
        timeoutMs: options.timeout,
        io,
      });
      if (report.status !== 'completed') process.exitCode = 1;
    });

  return program;
}

async function main(argv: string[]): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    consoleIO.err(`error: ${describeError(err)}`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main(process.argv).catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
