import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { listCommand } from "./commands/list.js";
import { runCommand } from "./commands/run.js";
import { CONFIG_DEFAULTS } from "../config/types.js";

/**
 * Build the trainlaunch command tree. `run` is the default command, so a bare
 * argument file launches the default preset.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name("trainlaunch")
        .description("Launch training runners under a debugger with a fixed numerical-backend environment")
        .version("0.1.0")
        .enablePositionalOptions();

    program
        .command("run", { isDefault: true })
        .description("Launch a preset's runner; the first token selects the argument file")
        .argument("[args...]", "Argument file, followed by extra runner arguments")
        .option("-p, --preset <name>", "Preset to launch", CONFIG_DEFAULTS.defaultPreset)
        .option("--config <dir>", "Directory containing .trainlaunch.yml (defaults to the current directory)")
        .option("--dry-run", "Print the command line and environment instead of launching")
        .allowUnknownOption()
        .passThroughOptions()
        .action(runCommand);

    program
        .command("list")
        .description("List the available presets")
        .option("--config <dir>", "Directory containing .trainlaunch.yml (defaults to the current directory)")
        .action(listCommand);

    program
        .command("init")
        .description("Create a .trainlaunch.yml configuration file")
        .option("--config <dir>", "Directory to write the config file to (defaults to the current directory)")
        .action(initCommand);

    return program;
}
