import type { LaunchConfig, Preset } from "../config/types.js";

/**
 * The five variables the numerical backend reads once at process start.
 */
export interface LaunchEnvironment {
    readonly KMP_BLOCKTIME: string;
    readonly OMP_NUM_THREADS: string;
    readonly KMP_SETTINGS: string;
    readonly KMP_AFFINITY: string;
    readonly TF_XLA_FLAGS: string;
}

export const LAUNCH_ENV_KEYS = [
    "KMP_BLOCKTIME",
    "OMP_NUM_THREADS",
    "KMP_SETTINGS",
    "KMP_AFFINITY",
    "TF_XLA_FLAGS",
] as const satisfies readonly (keyof LaunchEnvironment)[];

/**
 * Build the frozen environment record for a preset.
 */
export function buildEnvironment(config: LaunchConfig, preset: Preset): LaunchEnvironment {
    return Object.freeze({
        KMP_BLOCKTIME: String(config.blockTime),
        OMP_NUM_THREADS: String(preset.numThreads),
        KMP_SETTINGS: config.settingsReport ? "TRUE" : "FALSE",
        KMP_AFFINITY: preset.affinity,
        TF_XLA_FLAGS: config.jitFlags,
    });
}

/**
 * Overlay the launch variables on an inherited environment.
 * Only the five launch keys are replaced; everything else passes through.
 * The inherited object is not modified.
 */
export function mergeEnvironment(
    inherited: NodeJS.ProcessEnv,
    overrides: LaunchEnvironment,
): NodeJS.ProcessEnv {
    return { ...inherited, ...overrides };
}

/**
 * `KEY=value` lines in a fixed order, for logs and dry runs.
 */
export function describeEnvironment(env: LaunchEnvironment): string[] {
    return LAUNCH_ENV_KEYS.map((key) => `${key}=${env[key]}`);
}
