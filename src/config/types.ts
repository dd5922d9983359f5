/**
 * A named launch preset: which runner to start, where its arguments come from,
 * and the threading knobs that differ between jobs.
 */
export interface Preset {
    /** Preset name used on the command line */
    name: string;
    /** Optional one-line label shown by `list` */
    description?: string;
    /** Runner script path, passed to the interpreter as given (relative to the working directory) */
    runner: string;
    /** Argument file used when no caller token selects one */
    defaultArgsFile: string;
    /** When false, caller tokens are ignored and the default args file is always used */
    forwardArgs: boolean;
    /** Number of compute threads (OMP_NUM_THREADS) */
    numThreads: number;
    /** Thread affinity policy (KMP_AFFINITY) */
    affinity: string;
}

/**
 * Top-level launcher configuration (maps to .trainlaunch.yml).
 */
export interface LaunchConfig {
    /** Interpreter executable, looked up on PATH */
    interpreter: string;
    /** Debugger module run through `-m`, or null to run the runner directly */
    debugger: string | null;
    /** Prefix telling the runner to read extra arguments from a file */
    argumentMarker: string;
    /** Thread block time in ms (KMP_BLOCKTIME) */
    blockTime: number;
    /** Whether the numerical backend prints its settings at startup (KMP_SETTINGS) */
    settingsReport: boolean;
    /** JIT compiler flags (TF_XLA_FLAGS) */
    jitFlags: string;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
    /** Presets, unique by name */
    presets: Preset[];
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    interpreter: "ipython3",
    debugger: "pudb",
    argumentMarker: "@",
    blockTime: 1,
    settingsReport: true,
    jitFlags: "--tf_xla_auto_jit=2 --tf_xla_cpu_global_jit",
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    defaultPreset: "inference",
    configFileName: ".trainlaunch.yml",
} as const;

export const BUILTIN_PRESETS: readonly Preset[] = [
    {
        name: "inference",
        description: "Run inference with a caller-supplied argument file",
        runner: "../l2hmc-qcd/run.py",
        defaultArgsFile: "./inference_args.txt",
        forwardArgs: true,
        numThreads: 16,
        affinity: "granularity=fine,verbose,compact,1,0",
    },
    {
        name: "train-eager",
        description: "Train the gauge model in eager mode",
        runner: "../main_eager.py",
        defaultArgsFile: "./gauge_args_eager.txt",
        forwardArgs: false,
        numThreads: 64,
        affinity: "granularity=fine,verbose,compact,1,0",
    },
];
