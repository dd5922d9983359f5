import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { defaultConfig, loadConfig, writeDefaultConfig } from "../src/config/loader.js";
import { planLaunch } from "../src/launcher/launch.js";
import { formatPresets } from "../src/cli/commands/list.js";
import { formatDryRun, runCommand } from "../src/cli/commands/run.js";
import { createProgram } from "../src/cli/program.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "trainlaunch-cli-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

describe("CLI Integration Tests", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
        vi.restoreAllMocks();
    });

    describe("init command", () => {
        it("should create .trainlaunch.yml in the specified directory", () => {
            const configPath = writeDefaultConfig(tempDir);
            expect(fs.existsSync(configPath)).toBe(true);
            expect(loadConfig(tempDir).presets).toHaveLength(2);
        });
    });

    describe("list command", () => {
        it("should describe every preset", () => {
            expect(formatPresets(defaultConfig())).toEqual([
                "Launcher: ipython3 -m pudb",
                "",
                "Presets:",
                "  inference (default)",
                "    Run inference with a caller-supplied argument file",
                "    runner:    ../l2hmc-qcd/run.py",
                "    args file: ./inference_args.txt (overridable)",
                "    threads:   16",
                "    affinity:  granularity=fine,verbose,compact,1,0",
                "  train-eager",
                "    Train the gauge model in eager mode",
                "    runner:    ../main_eager.py",
                "    args file: ./gauge_args_eager.txt (fixed)",
                "    threads:   64",
                "    affinity:  granularity=fine,verbose,compact,1,0",
            ]);
        });

        it("should show the bare interpreter when no debugger is configured", () => {
            const lines = formatPresets({ ...defaultConfig(), debugger: null });
            expect(lines[0]).toBe("Launcher: ipython3");
        });
    });

    describe("run command", () => {
        it("should format a dry run as the command line and environment", () => {
            const plan = planLaunch(defaultConfig(), { args: ["./a.txt"], inheritedEnv: {} });
            expect(formatDryRun(plan)).toEqual([
                "ipython3 -m pudb ../l2hmc-qcd/run.py @./a.txt",
                "KMP_BLOCKTIME=1",
                "OMP_NUM_THREADS=16",
                "KMP_SETTINGS=TRUE",
                "KMP_AFFINITY=granularity=fine,verbose,compact,1,0",
                "TF_XLA_FLAGS=--tf_xla_auto_jit=2 --tf_xla_cpu_global_jit",
            ]);
        });

        it("should print a dry run without launching", async () => {
            const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

            await runCommand([], { preset: "train-eager", config: tempDir, dryRun: true });

            expect(log.mock.calls.map((call) => call[0])).toEqual([
                "ipython3 -m pudb ../main_eager.py @./gauge_args_eager.txt",
                "KMP_BLOCKTIME=1",
                "OMP_NUM_THREADS=64",
                "KMP_SETTINGS=TRUE",
                "KMP_AFFINITY=granularity=fine,verbose,compact,1,0",
                "TF_XLA_FLAGS=--tf_xla_auto_jit=2 --tf_xla_cpu_global_jit",
            ]);
        });

        it("should exit with 1 for an unknown preset", async () => {
            const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
            vi.spyOn(process, "exit").mockImplementation((code?: number | string | null) => {
                throw new Error(`exit ${code}`);
            });

            await expect(runCommand([], { preset: "nope", config: tempDir })).rejects.toThrow("exit 1");
            expect(error).toHaveBeenCalledWith(
                'Error: Unknown preset "nope". Available presets: inference, train-eager',
            );
        });

        it("should exit with 1 for an invalid config file", async () => {
            fs.writeFileSync(path.join(tempDir, ".trainlaunch.yml"), "blockTime: -5\n", "utf-8");
            const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
            vi.spyOn(process, "exit").mockImplementation((code?: number | string | null) => {
                throw new Error(`exit ${code}`);
            });

            await expect(runCommand([], { config: tempDir })).rejects.toThrow("exit 1");
            expect(error).toHaveBeenCalledWith("Error: blockTime must be a non-negative integer");
        });
    });

    describe("argument parsing", () => {
        const ENV_LINES = [
            "KMP_BLOCKTIME=1",
            "KMP_SETTINGS=TRUE",
            "KMP_AFFINITY=granularity=fine,verbose,compact,1,0",
            "TF_XLA_FLAGS=--tf_xla_auto_jit=2 --tf_xla_cpu_global_jit",
        ];

        async function parse(argv: string[]): Promise<string[]> {
            const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
            await createProgram().parseAsync(argv, { from: "user" });
            return log.mock.calls.map((call) => String(call[0]));
        }

        it("should register run, list and init", () => {
            const names = createProgram().commands.map((cmd) => cmd.name());
            expect(names).toEqual(["run", "list", "init"]);
        });

        it("should dispatch to run when no command is named", async () => {
            const lines = await parse(["--config", tempDir, "--dry-run"]);
            expect(lines[0]).toBe("ipython3 -m pudb ../l2hmc-qcd/run.py @./inference_args.txt");
            expect(lines).toContain("OMP_NUM_THREADS=16");
            expect(lines).toEqual(expect.arrayContaining(ENV_LINES));
        });

        it("should accept a preset on the default command", async () => {
            const lines = await parse(["-p", "train-eager", "--config", tempDir, "--dry-run"]);
            expect(lines[0]).toBe("ipython3 -m pudb ../main_eager.py @./gauge_args_eager.txt");
            expect(lines).toContain("OMP_NUM_THREADS=64");
        });

        it("should pass options after the argument file through to the runner", async () => {
            const lines = await parse(["--config", tempDir, "--dry-run", "./a.txt", "--beta", "4"]);
            expect(lines[0]).toBe("ipython3 -m pudb ../l2hmc-qcd/run.py @./a.txt --beta 4");
        });

        it("should accept the explicit run command", async () => {
            const lines = await parse(["run", "--config", tempDir, "--dry-run", "./b.txt"]);
            expect(lines[0]).toBe("ipython3 -m pudb ../l2hmc-qcd/run.py @./b.txt");
        });

        it("should exit with 1 for an unknown preset", async () => {
            const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
            vi.spyOn(process, "exit").mockImplementation((code?: number | string | null) => {
                throw new Error(`exit ${code}`);
            });

            await expect(parse(["--preset", "nope", "--config", tempDir, "--dry-run"])).rejects.toThrow("exit 1");
            expect(error).toHaveBeenCalledWith(
                'Error: Unknown preset "nope". Available presets: inference, train-eager',
            );
        });
    });
});
