import { loadConfig } from "../../config/loader.js";
import type { LaunchConfig } from "../../config/types.js";
import { describeEnvironment } from "../../launcher/environment.js";
import { formatCommandLine } from "../../launcher/invocation.js";
import { executeLaunch, planLaunch, type LaunchPlan } from "../../launcher/launch.js";
import { Logger } from "../../launcher/logger.js";

interface RunOptions {
    preset?: string;
    config?: string;
    dryRun?: boolean;
}

/**
 * Lines printed by `--dry-run`: the command line followed by the environment overrides.
 */
export function formatDryRun(plan: LaunchPlan): string[] {
    return [
        formatCommandLine(plan.invocation),
        ...describeEnvironment(plan.environment),
    ];
}

export async function runCommand(args: string[], options: RunOptions): Promise<void> {
    let config: LaunchConfig;
    let plan: LaunchPlan;

    try {
        config = loadConfig(options.config);
        plan = planLaunch(config, { preset: options.preset, args });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }

    if (options.dryRun) {
        for (const line of formatDryRun(plan)) {
            console.log(line);
        }
        return;
    }

    const logger = new Logger({
        maxLogSizeMB: config.maxLogSizeMB,
        maxLogFiles: config.maxLogFiles,
    });

    const result = await executeLaunch(plan, { logger });

    // A shell would report a missing interpreter itself; nothing else is printed here
    if (result.error) {
        console.error(`trainlaunch: ${plan.invocation.command}: ${result.error.message}`);
    }

    process.exit(result.exitCode);
}
