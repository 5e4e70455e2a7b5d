import { TaskSupervisor } from '../../src/engine/task-supervisor';
import { systemClock } from '../../src/clock';
import { CancellationError } from '../../src/domain/errors';

describe('TaskSupervisor', () => {
  let supervisor: TaskSupervisor;

  beforeEach(() => {
    supervisor = new TaskSupervisor();
  });

  afterEach(async () => {
    await supervisor.shutdown(100);
  });

  test('starts the task after spawn returns and forgets it once done', async () => {
    let started = false;
    const task = supervisor.spawn('quick', async () => {
      started = true;
    });

    expect(started).toBe(false);
    expect(supervisor.size).toBe(1);
    expect(supervisor.list().map((entry) => entry.name)).toEqual(['quick']);

    await expect(task.done).resolves.toBe('completed');
    expect(started).toBe(true);
    expect(supervisor.size).toBe(0);
  });

  test('cancel aborts the signal with the given reason', async () => {
    const task = supervisor.spawn('sleeper', (signal) => systemClock.sleep(1_000, signal));
    task.cancel('preempted');

    await expect(task.done).resolves.toBe('cancelled');
    expect(task.signal.aborted).toBe(true);
    expect(task.signal.reason).toBeInstanceOf(CancellationError);
    expect(task.signal.reason).toMatchObject({ reason: 'preempted' });
  });

  test('a throwing task settles as failed', async () => {
    const task = supervisor.spawn('broken', async () => {
      throw new Error('boom');
    });
    await expect(task.done).resolves.toBe('failed');
  });

  test('cancelAll and join settle every task', async () => {
    const first = supervisor.spawn('a', (signal) => systemClock.sleep(1_000, signal));
    const second = supervisor.spawn('b', (signal) => systemClock.sleep(1_000, signal));

    supervisor.cancelAll('shutdown');
    await expect(supervisor.join()).resolves.toBe(true);
    await expect(first.done).resolves.toBe('cancelled');
    await expect(second.done).resolves.toBe('cancelled');
    expect(supervisor.size).toBe(0);
  });

  test('join reports false when a task ignores cancellation past the bound', async () => {
    const stuck = supervisor.spawn('stuck', () => new Promise<void>(() => undefined));
    stuck.cancel();

    await expect(supervisor.join(20)).resolves.toBe(false);
    expect(supervisor.size).toBe(1);
  });

  test('shutdown cancels and joins', async () => {
    const task = supervisor.spawn('sleeper', (signal) => systemClock.sleep(1_000, signal));
    await expect(supervisor.shutdown(200)).resolves.toBe(true);
    await expect(task.done).resolves.toBe('cancelled');
  });
});
