#!/usr/bin/env node
import { createProgram } from "./program.js";

createProgram().parseAsync().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
});
