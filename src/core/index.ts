export * from "./scope.js";
export * from "./signal.js";
export * from "./dev.js";

export { batch, schedule, scheduleMicrotask, configureScheduler, getSchedulerConfig } from "./scheduler.js";
