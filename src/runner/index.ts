export { runRequests } from './RequestRunner';
export type { RunOptions, RunResult } from './RequestRunner';
