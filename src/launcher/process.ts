/**
 * Foreground child process execution.
 *
 * Spawns one child with the terminal's stdio, waits for it, and maps the way
 * it ended onto a shell-style exit code.
 */
import * as child_process from "node:child_process";
import * as os from "node:os";

/** Exit code a shell reports when the command cannot be found or executed */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Signals relayed to the child while it runs. SIGINT reaches it through the terminal. */
const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGHUP"];

export interface ChildResult {
    /** Exit code the launcher should exit with */
    exitCode: number;
    /** Signal that terminated the child, if any */
    signal: NodeJS.Signals | null;
    /** Spawn error (e.g. ENOENT for a missing interpreter) */
    error?: Error;
}

export interface RunChildOptions {
    command: string;
    args: string[];
    cwd: string;
    env: NodeJS.ProcessEnv;
    /** Defaults to "inherit" */
    stdio?: child_process.StdioOptions;
}

/**
 * Map a child's termination to an exit code: the code itself, or 128 + signal
 * number when it was killed by a signal.
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
    if (code !== null) {
        return code;
    }
    if (signal !== null) {
        const signum: number | undefined = os.constants.signals[signal];
        if (typeof signum === "number") {
            return 128 + signum;
        }
    }
    return 1;
}

/**
 * Run a child process in the foreground and resolve once it has exited.
 * Never rejects: spawn failures resolve with exit code 127.
 */
export function runChild(options: RunChildOptions): Promise<ChildResult> {
    return new Promise<ChildResult>((resolve) => {
        let settled = false;

        const child = child_process.spawn(options.command, options.args, {
            cwd: options.cwd,
            env: options.env,
            stdio: options.stdio ?? "inherit",
        });

        const relay = (signal: NodeJS.Signals): void => {
            child.kill(signal);
        };
        // SIGINT is delivered to the whole foreground process group; the launcher
        // only has to stay alive until the child decides what to do with it.
        const holdInterrupt = (): void => undefined;

        for (const signal of FORWARDED_SIGNALS) {
            process.on(signal, relay);
        }
        process.on("SIGINT", holdInterrupt);

        const finish = (result: ChildResult): void => {
            if (settled) return;
            settled = true;
            for (const signal of FORWARDED_SIGNALS) {
                process.off(signal, relay);
            }
            process.off("SIGINT", holdInterrupt);
            resolve(result);
        };

        child.on("error", (error) => {
            finish({ exitCode: SPAWN_FAILURE_EXIT_CODE, signal: null, error });
        });

        child.on("close", (code, signal) => {
            finish({ exitCode: exitCodeFor(code, signal), signal });
        });
    });
}
