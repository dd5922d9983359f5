export { planLaunch, executeLaunch, launch } from "./launch.js";
export type { LaunchPlan, PlanOptions, ExecuteOptions } from "./launch.js";
export {
    buildEnvironment,
    mergeEnvironment,
    describeEnvironment,
    LAUNCH_ENV_KEYS,
} from "./environment.js";
export type { LaunchEnvironment } from "./environment.js";
export {
    resolveInvocation,
    selectArgumentSource,
    argumentToken,
    formatCommandLine,
} from "./invocation.js";
export type { Invocation } from "./invocation.js";
export { runChild, exitCodeFor, SPAWN_FAILURE_EXIT_CODE } from "./process.js";
export type { ChildResult, RunChildOptions } from "./process.js";
export { Logger } from "./logger.js";
