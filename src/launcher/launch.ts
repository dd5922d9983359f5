import type * as child_process from "node:child_process";
import type { LaunchConfig, Preset } from "../config/types.js";
import { CONFIG_DEFAULTS } from "../config/types.js";
import { findPreset } from "../config/loader.js";
import {
    buildEnvironment,
    describeEnvironment,
    mergeEnvironment,
    type LaunchEnvironment,
} from "./environment.js";
import { formatCommandLine, resolveInvocation, type Invocation } from "./invocation.js";
import { runChild, type ChildResult } from "./process.js";
import type { Logger } from "./logger.js";

export interface PlanOptions {
    /** Preset name (defaults to "inference") */
    preset?: string;
    /** Caller tokens, forwarded according to the preset */
    args?: readonly string[];
    /** Working directory of the child (defaults to cwd) */
    cwd?: string;
    /** Environment to inherit (defaults to process.env) */
    inheritedEnv?: NodeJS.ProcessEnv;
}

/**
 * A fully resolved launch: nothing is decided after this point.
 */
export interface LaunchPlan {
    preset: Preset;
    invocation: Invocation;
    /** The five launch variables */
    environment: LaunchEnvironment;
    /** Inherited environment with the launch variables applied */
    env: NodeJS.ProcessEnv;
}

export interface ExecuteOptions {
    logger?: Logger;
    stdio?: child_process.StdioOptions;
}

/**
 * Resolve preset, environment and invocation. Throws only for an unknown preset.
 */
export function planLaunch(config: LaunchConfig, options: PlanOptions = {}): LaunchPlan {
    const preset = findPreset(config, options.preset ?? CONFIG_DEFAULTS.defaultPreset);
    const environment = buildEnvironment(config, preset);
    const invocation = resolveInvocation(config, preset, options.args ?? [], options.cwd);

    return {
        preset,
        invocation,
        environment,
        env: mergeEnvironment(options.inheritedEnv ?? process.env, environment),
    };
}

/**
 * Run a planned launch and resolve with the child's result.
 */
export async function executeLaunch(
    plan: LaunchPlan,
    options: ExecuteOptions = {},
): Promise<ChildResult> {
    const { logger } = options;
    const { invocation } = plan;

    logger?.info(`Launching preset "${plan.preset.name}" in ${invocation.cwd}`);
    logger?.info(`Command: ${formatCommandLine(invocation)}`);
    for (const line of describeEnvironment(plan.environment)) {
        logger?.info(`  ${line}`);
    }

    const result = await runChild({
        command: invocation.command,
        args: invocation.args,
        cwd: invocation.cwd,
        env: plan.env,
        stdio: options.stdio,
    });

    if (result.error) {
        logger?.error(`Failed to start ${invocation.command}: ${result.error.message}`);
    } else if (result.signal) {
        logger?.warn(`Child terminated by ${result.signal} (exit code ${result.exitCode})`);
    } else {
        logger?.info(`Child exited with code ${result.exitCode}`);
    }

    return result;
}

/**
 * Plan and run in one step.
 */
export function launch(
    config: LaunchConfig,
    options: PlanOptions & ExecuteOptions = {},
): Promise<ChildResult> {
    return executeLaunch(planLaunch(config, options), options);
}
