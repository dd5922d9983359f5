import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigHome } from "../config/loader.js";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
}

/**
 * Launch log. Writes to a rotating file only, never to the terminal the child shares.
 */
export class Logger {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? path.join(getConfigHome(), "logs");
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.logFile = path.join(this.logDir, "trainlaunch.log");
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: string, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        // A launch never fails because its log cannot be written
        try {
            fs.mkdirSync(this.logDir, { recursive: true });
            this.rotateIfNeeded();
            fs.appendFileSync(this.logFile, line, "utf-8");
        } catch {
            return;
        }
    }

    private rotatedPath(index: number): string {
        return path.join(this.logDir, `trainlaunch.${index}.log`);
    }

    /**
     * Roll the live log into trainlaunch.1.log once it is over the size limit.
     * At most maxLogFiles files exist afterwards, the live one included.
     */
    private rotateIfNeeded(): void {
        if (!fs.existsSync(this.logFile) || fs.statSync(this.logFile).size < this.maxLogSize) {
            return;
        }

        const kept = this.maxLogFiles - 1;
        if (kept < 1) {
            fs.truncateSync(this.logFile, 0);
            return;
        }

        fs.rmSync(this.rotatedPath(kept), { force: true });
        for (let index = kept - 1; index >= 1; index--) {
            if (fs.existsSync(this.rotatedPath(index))) {
                fs.renameSync(this.rotatedPath(index), this.rotatedPath(index + 1));
            }
        }
        fs.renameSync(this.logFile, this.rotatedPath(1));
    }
}
