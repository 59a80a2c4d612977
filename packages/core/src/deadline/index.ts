// packages/core/src/deadline/index.ts -- barrel re-export

export { Deadline, toDeadline } from './deadline.js';
export type { DeadlineTarget } from './deadline.js';
