export { TokenMaintenanceScheduler } from './token-maintenance-scheduler.js';
export type { MaintenanceRunResult } from './token-maintenance-scheduler.js';
