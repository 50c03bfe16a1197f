export { initScheduler, startScheduler, stopScheduler, runSessionSweep, getSchedulerStatus } from './jobs';
export type { SchedulerOrchestrator } from './jobs';
