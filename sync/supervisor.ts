import { AuthError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';

export type CancellableTask = (signal: AbortSignal) => Promise<void>;

export interface SuperviseOptions {
  name: string;
  cooldownMs: number;
  signal: AbortSignal;
  logger: Logger;
  sleep?: Sleep;
  onRestart?: (err: unknown) => void;
}

/**
 * Runs `task` until it returns or `signal` aborts. A failed run is retried
 * after `cooldownMs`; an AuthError ends supervision since retrying cannot fix it.
 */
export async function superviseWithCooldown(task: CancellableTask, options: SuperviseOptions): Promise<void> {
  const { name, cooldownMs, signal, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  while (!signal.aborted) {
    try {
      await task(signal);
      return;
    } catch (err) {
      if (err instanceof AuthError) {
        logger.error(`[${name}] Credentials rejected, not restarting: ${err.message}`);
        throw err;
      }
      logger.error(`[${name}] Run failed: ${errorMessage(err)}`);
      options.onRestart?.(err);
      if (signal.aborted) return;
      logger.info(`[${name}] Restarting in ${Math.round(cooldownMs / 1000)}s`);
      await sleep(cooldownMs, signal);
    }
  }
}

export interface SupervisedStatus {
  running: boolean;
  restarts: number;
  lastError: string | null;
}

/** Owns one supervised long-running task: start once, stop cooperatively. */
export class SupervisedService {
  private controller: AbortController | null = null;
  private done: Promise<void> | null = null;
  private readonly state: SupervisedStatus = { running: false, restarts: 0, lastError: null };

  constructor(
    private readonly task: CancellableTask,
    private readonly options: Omit<SuperviseOptions, 'signal' | 'onRestart'>,
  ) {}

  start(): void {
    if (this.state.running) return;
    const controller = new AbortController();
    this.controller = controller;
    this.state.running = true;
    this.done = superviseWithCooldown(this.task, {
      ...this.options,
      signal: controller.signal,
      onRestart: (err) => {
        this.state.restarts++;
        this.state.lastError = errorMessage(err);
      },
    })
      .catch((err) => {
        this.state.lastError = errorMessage(err);
      })
      .finally(() => {
        this.state.running = false;
      });
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.done;
    this.controller = null;
    this.done = null;
  }

  status(): SupervisedStatus {
    return { ...this.state };
  }
}
