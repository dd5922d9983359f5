import type { LaunchConfig, Preset } from "../config/types.js";

/**
 * Everything needed to start the child process, resolved before spawning.
 */
export interface Invocation {
    /** Runner script path as configured */
    runner: string;
    /** Argument file path, from the caller or the preset default */
    argumentSource: string;
    /** Marker + argument source, e.g. "@./inference_args.txt" */
    argumentToken: string;
    /** Caller tokens after the argument source, appended as literal arguments */
    extraArgs: string[];
    /** Executable to spawn */
    command: string;
    /** Full argument vector for the executable */
    args: string[];
    /** Working directory of the child */
    cwd: string;
}

/**
 * Prefix a path with the argument-file marker. The file itself is never read;
 * the runner's own argument parser expands it.
 */
export function argumentToken(marker: string, source: string): string {
    return `${marker}${source}`;
}

/**
 * Pick the argument source for a preset. A forwarding preset takes the first
 * caller token as the file and keeps the rest as extra arguments; otherwise
 * the default file is used and caller tokens are dropped.
 */
export function selectArgumentSource(
    preset: Preset,
    callerArgs: readonly string[],
): { source: string; extra: string[] } {
    if (preset.forwardArgs && callerArgs.length > 0) {
        const [source, ...extra] = callerArgs;
        return { source, extra };
    }
    return { source: preset.defaultArgsFile, extra: [] };
}

/**
 * Resolve the invocation descriptor: `<interpreter> -m <debugger> <runner> <marker><file> [extra...]`.
 * No path is checked for existence.
 */
export function resolveInvocation(
    config: LaunchConfig,
    preset: Preset,
    callerArgs: readonly string[],
    cwd: string = process.cwd(),
): Invocation {
    const { source, extra } = selectArgumentSource(preset, callerArgs);
    const token = argumentToken(config.argumentMarker, source);

    const args: string[] = [];
    if (config.debugger !== null) {
        args.push("-m", config.debugger);
    }
    args.push(preset.runner, token, ...extra);

    return {
        runner: preset.runner,
        argumentSource: source,
        argumentToken: token,
        extraArgs: extra,
        command: config.interpreter,
        args,
        cwd,
    };
}

/**
 * Render an invocation as a single shell-like line for display.
 */
export function formatCommandLine(invocation: Invocation): string {
    return [invocation.command, ...invocation.args]
        .map((part) => (part === "" || /[\s"'$`\\]/.test(part) ? JSON.stringify(part) : part))
        .join(" ");
}
