import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import type { LaunchConfig, Preset } from "./types.js";
import { BUILTIN_PRESETS, CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the trainlaunch home directory: ~/.trainlaunch
 * Launch logs are written below it.
 */
export function getConfigHome(): string {
    return path.join(os.homedir(), ".trainlaunch");
}

/**
 * Built-in configuration, used when no config file exists.
 */
export function defaultConfig(): LaunchConfig {
    return {
        interpreter: CONFIG_DEFAULTS.interpreter,
        debugger: CONFIG_DEFAULTS.debugger,
        argumentMarker: CONFIG_DEFAULTS.argumentMarker,
        blockTime: CONFIG_DEFAULTS.blockTime,
        settingsReport: CONFIG_DEFAULTS.settingsReport,
        jitFlags: CONFIG_DEFAULTS.jitFlags,
        maxLogSizeMB: CONFIG_DEFAULTS.maxLogSizeMB,
        maxLogFiles: CONFIG_DEFAULTS.maxLogFiles,
        presets: BUILTIN_PRESETS.map((preset) => ({ ...preset })),
    };
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === "string" && value.trim() !== "";
}

function validatePreset(value: unknown, index: number): Preset {
    if (typeof value !== "object" || value === null) {
        throw new Error(`presets[${index}] must be an object`);
    }
    const p = value as Record<string, unknown>;

    if (!isNonEmptyString(p.name)) {
        throw new Error(`presets[${index}].name must be a non-empty string`);
    }
    const name = p.name.trim();

    // Later presets may override a built-in by name, so only the name and the
    // fields it supplies are required; the rest fall back to the built-in.
    const base = BUILTIN_PRESETS.find((b) => b.name === name);

    const runner = p.runner ?? base?.runner;
    if (!isNonEmptyString(runner)) {
        throw new Error(`presets[${index}].runner must be a non-empty string`);
    }

    const defaultArgsFile = p.defaultArgsFile ?? base?.defaultArgsFile;
    if (!isNonEmptyString(defaultArgsFile)) {
        throw new Error(`presets[${index}].defaultArgsFile must be a non-empty string`);
    }

    const forwardArgs = p.forwardArgs ?? base?.forwardArgs ?? true;
    if (typeof forwardArgs !== "boolean") {
        throw new Error(`presets[${index}].forwardArgs must be a boolean`);
    }

    const numThreads = p.numThreads ?? base?.numThreads;
    if (typeof numThreads !== "number" || numThreads <= 0 || !Number.isInteger(numThreads)) {
        throw new Error(`presets[${index}].numThreads must be a positive integer`);
    }

    const affinity = p.affinity ?? base?.affinity;
    if (!isNonEmptyString(affinity)) {
        throw new Error(`presets[${index}].affinity must be a non-empty string`);
    }

    const preset: Preset = { name, runner, defaultArgsFile, forwardArgs, numThreads, affinity };

    const description = p.description ?? base?.description;
    if (isNonEmptyString(description)) {
        preset.description = description.trim();
    }

    return preset;
}

/**
 * Validate a loaded configuration object and merge it over the built-in
 * defaults. Throws on invalid config.
 */
export function validateConfig(config: unknown): LaunchConfig {
    // An empty file parses to null and means "all defaults"
    if (config === null || config === undefined) {
        return defaultConfig();
    }
    if (typeof config !== "object" || Array.isArray(config)) {
        throw new Error("Configuration must be a YAML object");
    }

    const raw = config as Record<string, unknown>;
    const result = defaultConfig();

    if ("interpreter" in raw) {
        if (!isNonEmptyString(raw.interpreter)) {
            throw new Error("interpreter must be a non-empty string");
        }
        result.interpreter = raw.interpreter;
    }

    if ("debugger" in raw) {
        const debuggerModule = raw.debugger;
        if (debuggerModule === null) {
            result.debugger = null;
        } else if (isNonEmptyString(debuggerModule)) {
            result.debugger = debuggerModule;
        } else {
            throw new Error("debugger must be a non-empty string or null");
        }
    }

    if ("argumentMarker" in raw) {
        if (typeof raw.argumentMarker !== "string" || raw.argumentMarker.length !== 1) {
            throw new Error("argumentMarker must be a single character");
        }
        result.argumentMarker = raw.argumentMarker;
    }

    if ("blockTime" in raw) {
        const blockTime = raw.blockTime;
        if (typeof blockTime !== "number" || blockTime < 0 || !Number.isInteger(blockTime)) {
            throw new Error("blockTime must be a non-negative integer");
        }
        result.blockTime = blockTime;
    }

    if ("settingsReport" in raw) {
        if (typeof raw.settingsReport !== "boolean") {
            throw new Error("settingsReport must be a boolean");
        }
        result.settingsReport = raw.settingsReport;
    }

    if ("jitFlags" in raw) {
        if (typeof raw.jitFlags !== "string") {
            throw new Error("jitFlags must be a string");
        }
        result.jitFlags = raw.jitFlags;
    }

    if ("maxLogSizeMB" in raw) {
        if (typeof raw.maxLogSizeMB !== "number" || raw.maxLogSizeMB <= 0) {
            throw new Error("maxLogSizeMB must be a positive number");
        }
        result.maxLogSizeMB = raw.maxLogSizeMB;
    }

    if ("maxLogFiles" in raw) {
        const maxLogFiles = raw.maxLogFiles;
        if (typeof maxLogFiles !== "number" || maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
            throw new Error("maxLogFiles must be a positive integer");
        }
        result.maxLogFiles = maxLogFiles;
    }

    // null means the key exists but has no items (e.g. "presets:" with only commented examples below)
    const rawPresets = raw.presets ?? [];
    if (!Array.isArray(rawPresets)) {
        throw new Error("presets must be an array");
    }

    const seen = new Set<string>();
    rawPresets.forEach((value: unknown, index: number) => {
        const preset = validatePreset(value, index);
        if (seen.has(preset.name)) {
            throw new Error(`presets[${index}].name "${preset.name}" is defined more than once`);
        }
        seen.add(preset.name);

        const existing = result.presets.findIndex((p) => p.name === preset.name);
        if (existing === -1) {
            result.presets.push(preset);
        } else {
            result.presets[existing] = preset;
        }
    });

    return result;
}

/**
 * Path of the config file inside a config directory.
 * @param configDir Directory containing the config file (defaults to cwd)
 */
export function getConfigPath(configDir?: string): string {
    return path.join(configDir ?? process.cwd(), CONFIG_DEFAULTS.configFileName);
}

/**
 * Load and validate the launcher config. A missing file yields the built-in defaults.
 * @param configDir Directory containing the config file (defaults to cwd)
 */
export function loadConfig(configDir?: string): LaunchConfig {
    const configPath = getConfigPath(configDir);

    if (!fs.existsSync(configPath)) {
        return defaultConfig();
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    let parsed: unknown;
    try {
        parsed = yaml.parse(raw);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Cannot parse ${configPath}: ${message}`);
    }
    return validateConfig(parsed);
}

/**
 * Look up a preset by name.
 */
export function findPreset(config: LaunchConfig, name: string): Preset {
    const preset = config.presets.find((p) => p.name === name);
    if (!preset) {
        const names = config.presets.map((p) => p.name).join(", ");
        throw new Error(`Unknown preset "${name}". Available presets: ${names}`);
    }
    return preset;
}

/**
 * Write a default .trainlaunch.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to cwd)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? process.cwd();
    const configPath = getConfigPath(dir);

    if (fs.existsSync(configPath)) {
        throw new Error(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const presetLines = BUILTIN_PRESETS.flatMap((preset) => [
        `  - name: ${preset.name}`,
        `    description: ${preset.description ?? ""}`,
        `    runner: ${preset.runner}`,
        `    defaultArgsFile: ${preset.defaultArgsFile}`,
        `    forwardArgs: ${preset.forwardArgs}`,
        `    numThreads: ${preset.numThreads}`,
        `    affinity: "${preset.affinity}"`,
    ]);

    const template = [
        "# trainlaunch configuration",
        "",
        "# Interpreter and debugger module: <interpreter> -m <debugger> <runner> @<args file>",
        "# Set debugger to null to run the runner without a debugger.",
        `interpreter: ${CONFIG_DEFAULTS.interpreter}`,
        `debugger: ${CONFIG_DEFAULTS.debugger}`,
        `argumentMarker: "${CONFIG_DEFAULTS.argumentMarker}"`,
        "",
        "# Numerical backend knobs shared by every preset",
        `blockTime: ${CONFIG_DEFAULTS.blockTime}         # KMP_BLOCKTIME`,
        `settingsReport: ${CONFIG_DEFAULTS.settingsReport}  # KMP_SETTINGS`,
        `jitFlags: "${CONFIG_DEFAULTS.jitFlags}"  # TF_XLA_FLAGS`,
        "",
        "# Log rotation settings (optional)",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
        "",
        "# Presets replace a built-in preset of the same name or add a new one.",
        "presets:",
        ...presetLines,
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
