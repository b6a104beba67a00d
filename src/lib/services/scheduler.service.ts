/**
 * Component: Polling Scheduler Service
 * Documentation: documentation/operations.md
 *
 * Single cooperative loop: apply a pending reload, run every group's cleanup
 * then retry cycle, then wait for the refresh timer, a config change or a stop
 * request. A running cycle is never interrupted.
 */

import type { AppConfig, ConfigurationService, GroupConfig } from './config.service';
import { createGroupControllers, type CycleController, type GroupControllers } from './controller-factory.service';
import { IntegrationError } from '../utils/errors';
import { AppLogger, describeError } from '../utils/logger';

const logger = AppLogger.create('Scheduler');

export interface SchedulerOptions {
  configService: Pick<ConfigurationService, 'load' | 'watch'>;
  createControllers?: (group: GroupConfig, index: number) => GroupControllers;
}

type WakeReason = 'timer' | 'reload' | 'stop';

export class SchedulerService {
  private groups: GroupControllers[] = [];
  private refreshInterval: number;
  private reloadPending = false;
  private stopping = false;
  private cycles = 0;
  private wake: ((reason: WakeReason) => void) | null = null;
  private readonly configService: SchedulerOptions['configService'];
  private readonly createControllers: (group: GroupConfig, index: number) => GroupControllers;

  /**
   * @throws when the initial configuration cannot be turned into controllers
   */
  constructor(config: AppConfig, options: SchedulerOptions) {
    this.configService = options.configService;
    this.createControllers = options.createControllers ?? ((group, index) => createGroupControllers(group, index));
    this.groups = this.buildGroups(config);
    this.refreshInterval = config.refreshInterval;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  get interval(): number {
    return this.refreshInterval;
  }

  /**
   * Run until stop() is called. Resolves after the in-flight cycle has finished.
   */
  async run(): Promise<void> {
    const stopWatching = this.configService.watch(() => this.requestReload());
    logger.info(`Scheduler started, polling every ${this.refreshInterval}s`);

    try {
      while (!this.stopping) {
        if (this.reloadPending) {
          await this.reload();
        }

        await this.runCycle();

        if (this.stopping) {
          break;
        }

        const reason = await this.waitForNextTick();
        logger.debug(`Woken by ${reason}`);
      }
    } finally {
      stopWatching();
    }

    logger.info('Scheduler stopped');
  }

  requestReload(): void {
    this.reloadPending = true;
    this.wake?.('reload');
  }

  stop(): void {
    if (!this.stopping) {
      logger.info('Stop requested, finishing current cycle...');
    }
    this.stopping = true;
    this.wake?.('stop');
  }

  /**
   * Run every group's cleanup then retry. Failures are logged and never stop the loop.
   */
  async runCycle(): Promise<void> {
    this.cycles++;

    for (const group of this.groups) {
      await this.runController(group.label, 'cleanup', group.cleanup);
      await this.runController(group.label, 'retry', group.retry);
    }
  }

  private async runController(label: string, task: string, controller: CycleController | null): Promise<void> {
    if (!controller) {
      return;
    }

    try {
      const result = await controller.execute();
      logger.debug(`Group '${label}' ${task}: ${result.message}`);
    } catch (error) {
      logger.error(
        `Group '${label}' ${task} cycle failed: ${describeError(error)}`,
        error instanceof IntegrationError ? { service: error.service, status: error.status } : undefined
      );
    }
  }

  /**
   * Swap in controllers built from the current config file. An invalid file
   * keeps the previous controllers running.
   */
  private async reload(): Promise<void> {
    this.reloadPending = false;

    try {
      const config = await this.configService.load();
      const groups = this.buildGroups(config);
      this.groups = groups;
      this.refreshInterval = config.refreshInterval;
      logger.info(`Configuration reloaded, polling every ${this.refreshInterval}s`);
    } catch (error) {
      logger.error(`Configuration reload failed, keeping previous settings: ${describeError(error)}`);
    }
  }

  private buildGroups(config: AppConfig): GroupControllers[] {
    return config.groups.map((group, index) => this.createControllers(group, index));
  }

  private waitForNextTick(): Promise<WakeReason> {
    if (this.stopping) {
      return Promise.resolve('stop');
    }
    if (this.reloadPending) {
      return Promise.resolve('reload');
    }

    let timer: NodeJS.Timeout | undefined;
    const signalled = new Promise<WakeReason>((resolve) => {
      this.wake = resolve;
    });
    const elapsed = new Promise<WakeReason>((resolve) => {
      timer = setTimeout(() => resolve('timer'), this.refreshInterval * 1000);
    });

    return Promise.race([signalled, elapsed]).finally(() => {
      clearTimeout(timer);
      this.wake = null;
    });
  }
}
