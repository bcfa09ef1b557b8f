/**
 * Monitoring components exports
 */

export { icmpProbe, buildPingCommand, classifyPingOutput, parseLatency } from './probe';
export { dispatch, computeStatistics } from './dispatcher';
export {
  TimeoutTracker,
  TimeoutTrackerOptions,
  TimeoutStateStore,
  HIGH_TIMEOUT_COUNT
} from './timeout-tracker';
export {
  CycleScheduler,
  CycleSchedulerOptions,
  CycleTracker,
  CycleFailedEvent,
  CycleSkippedEvent,
  ResultSink,
  SchedulerState,
  SchedulerStatus
} from './cycle-scheduler';
