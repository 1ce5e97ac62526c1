import { execFile } from "node:child_process";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { PipelineConfig } from "../types";
import { sanitizeFileName } from "./decomposer";
import type { Validator } from "./types";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** The process was killed for writing more than MAX_OUTPUT_BYTES. */
  outputLimited: boolean;
}

export type CommandRunner = (
  file: string,
  args: string[],
  opts: { cwd: string; timeoutMs: number; signal?: AbortSignal },
) => Promise<CommandResult>;

/** The parts of an execFile error this module reads. */
export interface ProcessFailure {
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

export const SIMULATION_TIMEOUT_LOG =
  "ERROR: Simulation timed out. The testbench may have an infinite loop or is not finishing with `$finish`.";

export const SIMULATION_OUTPUT_LIMIT_LOG =
  "ERROR: Simulation timed out: output exceeded the capture limit. The testbench may have an infinite loop or is not finishing with `$finish`.";

export const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;
const OUTPUT_LIMIT_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";
const TAIL_LINES = 20;

const COMPILED_IMAGE = "design.vvp";

/**
 * Maps an execFile outcome to a CommandResult. Throws only when the process
 * never ran to an exit status of its own: spawn failures such as ENOENT, and
 * aborts.
 */
export function settleCommand(error: (Error & ProcessFailure) | null, stdout: string, stderr: string): CommandResult {
  if (!error) return { code: 0, stdout, stderr, timedOut: false, outputLimited: false };
  if (error.code === OUTPUT_LIMIT_CODE) return { code: 1, stdout, stderr, timedOut: false, outputLimited: true };
  if (typeof error.code === "string") throw error;
  return {
    code: typeof error.code === "number" ? error.code : 1,
    stdout,
    stderr,
    timedOut: error.killed === true && error.signal === "SIGTERM",
    outputLimited: false,
  };
}

export const runCommand: CommandRunner = (file, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { cwd: opts.cwd, timeout: opts.timeoutMs, signal: opts.signal, maxBuffer: MAX_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        try {
          resolve(settleCommand(error, stdout, stderr));
        } catch (failure) {
          reject(failure);
        }
      },
    );
  });

function tail(output: string): string {
  return output.trimEnd().split("\n").slice(-TAIL_LINES).join("\n");
}

/**
 * Compiles every `.v` artifact with iverilog and runs the image with vvp in a
 * throwaway directory. Simulation output that mentions ERROR fails the run
 * even when vvp exits cleanly.
 */
export function createIcarusValidator(
  config: PipelineConfig["validator"],
  runner: CommandRunner = runCommand,
): Validator {
  return {
    async validate(artifacts, ctx) {
      const scratch = await mkdtemp(path.join(tmpdir(), "hdl-autofix-"));
      try {
        const sources: string[] = [];
        for (const [name, content] of Object.entries(artifacts)) {
          const fileName = sanitizeFileName(name);
          await writeFile(path.join(scratch, fileName), content, "utf-8");
          if (fileName.endsWith(".v")) sources.push(fileName);
        }
        if (sources.length === 0) {
          return { passed: false, log: "ERROR: No Verilog files found." };
        }

        const options = { cwd: scratch, timeoutMs: config.commandTimeoutMs, signal: ctx.signal };
        const compile = await runner(config.iverilogPath, ["-o", COMPILED_IMAGE, ...sources], options);
        if (compile.timedOut) return { passed: false, log: "ERROR: Compilation timed out." };
        if (compile.outputLimited) {
          return { passed: false, log: `ERROR during compilation:\n${tail(compile.stderr || compile.stdout)}` };
        }
        if (compile.code !== 0) {
          const detail = compile.stderr || compile.stdout || "Unknown compilation error.";
          return { passed: false, log: `ERROR during compilation:\n${detail}` };
        }

        const simulate = await runner(config.vvpPath, [COMPILED_IMAGE], options);
        if (simulate.timedOut) return { passed: false, log: SIMULATION_TIMEOUT_LOG };
        if (simulate.outputLimited) {
          return { passed: false, log: `${SIMULATION_OUTPUT_LIMIT_LOG}\nLast output:\n${tail(simulate.stdout)}` };
        }
        if (simulate.code !== 0) {
          const detail = simulate.stderr || simulate.stdout || "Unknown simulation error.";
          return { passed: false, log: `ERROR during simulation:\n${detail}` };
        }
        if (simulate.stdout.includes("ERROR")) {
          return { passed: false, log: simulate.stdout };
        }
        return { passed: true, log: simulate.stdout };
      } finally {
        await rm(scratch, { recursive: true, force: true });
      }
    },
  };
}
