import { getConfigPath, loadConfig } from "../../config/loader.js";
import { CONFIG_DEFAULTS } from "../../config/types.js";
import type { LaunchConfig } from "../../config/types.js";

interface ListOptions {
    config?: string;
}

/**
 * Render the preset table printed by `trainlaunch list`.
 */
export function formatPresets(config: LaunchConfig): string[] {
    const lines: string[] = [];
    const launcher = config.debugger === null
        ? config.interpreter
        : `${config.interpreter} -m ${config.debugger}`;
    lines.push(`Launcher: ${launcher}`);
    lines.push("");
    lines.push("Presets:");

    for (const preset of config.presets) {
        const marker = preset.name === CONFIG_DEFAULTS.defaultPreset ? " (default)" : "";
        lines.push(`  ${preset.name}${marker}`);
        if (preset.description) {
            lines.push(`    ${preset.description}`);
        }
        lines.push(`    runner:    ${preset.runner}`);
        lines.push(
            `    args file: ${preset.defaultArgsFile}` +
            (preset.forwardArgs ? " (overridable)" : " (fixed)"),
        );
        lines.push(`    threads:   ${preset.numThreads}`);
        lines.push(`    affinity:  ${preset.affinity}`);
    }

    return lines;
}

export function listCommand(options: ListOptions = {}): void {
    try {
        const config = loadConfig(options.config);
        console.log(`Config: ${getConfigPath(options.config)}`);
        for (const line of formatPresets(config)) {
            console.log(line);
        }
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
