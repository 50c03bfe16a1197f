import cron, { ScheduledTask } from 'node-cron';
import { createModuleLogger } from '../../utils/logger';

const logger = createModuleLogger('scheduler');

// Orchestrator interface
export interface SchedulerOrchestrator {
  sweepExpiredSessions(): Promise<number>;
}

let orchestrator: SchedulerOrchestrator | null = null;

const scheduledJobs: ScheduledTask[] = [];

/**
 * Initialize scheduler with dependencies
 */
export function initScheduler(orch: SchedulerOrchestrator): void {
  orchestrator = orch;
  logger.info('Scheduler initialized');
}

/**
 * Run the idle-session sweep; failures are logged, never thrown into the cron loop
 */
export async function runSessionSweep(): Promise<void> {
  if (!orchestrator) {
    throw new Error('Scheduler not initialized. Call initScheduler first.');
  }

  logger.info('Running session sweep job');
  try {
    const purged = await orchestrator.sweepExpiredSessions();
    logger.info('Session sweep completed', { purged });
  } catch (error) {
    logger.error('Session sweep failed', { error });
  }
}

/**
 * Start the periodic sweep. Without a cron expression sessions are only swept when a new one starts.
 */
export function startScheduler(expression?: string): void {
  if (!orchestrator) {
    throw new Error('Scheduler not initialized. Call initScheduler first.');
  }

  if (!expression) {
    logger.info('No sweep schedule configured, skipping scheduler');
    return;
  }

  if (!cron.validate(expression)) {
    throw new Error(`Invalid session sweep schedule: ${expression}`);
  }

  logger.info('Starting scheduler...', { expression });

  const sweep = cron.schedule(expression, runSessionSweep);
  scheduledJobs.push(sweep);

  logger.info(`Started ${scheduledJobs.length} scheduled jobs`);
}

/**
 * Stop all scheduled jobs
 */
export function stopScheduler(): void {
  logger.info('Stopping scheduler...');

  for (const job of scheduledJobs) {
    job.stop();
  }

  scheduledJobs.length = 0;
  logger.info('Scheduler stopped');
}

/**
 * Get scheduler status
 */
export function getSchedulerStatus(): { isRunning: boolean; jobCount: number } {
  return {
    isRunning: scheduledJobs.length > 0,
    jobCount: scheduledJobs.length,
  };
}

export default {
  initScheduler,
  startScheduler,
  stopScheduler,
  runSessionSweep,
  getSchedulerStatus,
};
