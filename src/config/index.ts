export {
    loadConfig,
    writeDefaultConfig,
    validateConfig,
    defaultConfig,
    findPreset,
    getConfigHome,
    getConfigPath,
} from "./loader.js";
export type { LaunchConfig, Preset } from "./types.js";
export { CONFIG_DEFAULTS, BUILTIN_PRESETS } from "./types.js";
