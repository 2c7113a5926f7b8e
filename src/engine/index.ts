export * from './state-machine';
export * from './semaphore';
export * from './step-runner';
export * from './job-runner';
export * from './executor';
