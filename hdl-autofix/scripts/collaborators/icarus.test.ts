import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { classify } from "../classifier";
import type { PipelineConfig } from "../types";
import {
  createIcarusValidator,
  settleCommand,
  SIMULATION_OUTPUT_LIMIT_LOG,
  SIMULATION_TIMEOUT_LOG,
  type CommandResult,
  type CommandRunner,
} from "./icarus";
import type { CallContext } from "./types";

const config: PipelineConfig["validator"] = { iverilogPath: "iverilog", vvpPath: "vvp", commandTimeoutMs: 1000 };
const ctx: CallContext = { runId: "run-1", query: "2-input AND gate", stage: "validate" };
const ok: CommandResult = { code: 0, stdout: "", stderr: "", timedOut: false, outputLimited: false };

const design = {
  "and_gate.v": "module and_gate; endmodule",
  "defs.vh": "`define W 1",
  "and_gate_tb.v": "module and_gate_tb; endmodule",
};

function fakeRunner(results: CommandResult[], calls: Array<{ file: string; args: string[]; cwd: string }>): CommandRunner {
  return async (file, args, opts) => {
    calls.push({ file, args, cwd: opts.cwd });
    const next = results.shift();
    if (!next) throw new Error("unexpected command");
    return next;
  };
}

test("compiles Verilog sources, simulates, and cleans up the scratch directory", async () => {
  const calls: Array<{ file: string; args: string[]; cwd: string }> = [];
  let header = "";
  const runner: CommandRunner = async (file, args, opts) => {
    calls.push({ file, args, cwd: opts.cwd });
    if (file === "iverilog") {
      header = await readFile(path.join(opts.cwd, "defs.vh"), "utf-8");
      return ok;
    }
    return { ...ok, stdout: "PASS y=1\n" };
  };

  const result = await createIcarusValidator(config, runner).validate(design, ctx);

  assert.deepEqual(result, { passed: true, log: "PASS y=1\n" });
  assert.deepEqual(
    calls.map((call) => [call.file, call.args]),
    [
      ["iverilog", ["-o", "design.vvp", "and_gate.v", "and_gate_tb.v"]],
      ["vvp", ["design.vvp"]],
    ],
  );
  assert.equal(header, "`define W 1");
  assert.equal(existsSync(calls[0].cwd), false);
});

test("compile failures and timeouts produce failing logs", async () => {
  const failed = createIcarusValidator(
    config,
    fakeRunner([{ ...ok, code: 1, stderr: "and_gate.v:2: syntax error" }], []),
  );
  assert.deepEqual(await failed.validate(design, ctx), {
    passed: false,
    log: "ERROR during compilation:\nand_gate.v:2: syntax error",
  });

  const slow = createIcarusValidator(config, fakeRunner([{ ...ok, code: 1, timedOut: true }], []));
  assert.deepEqual(await slow.validate(design, ctx), { passed: false, log: "ERROR: Compilation timed out." });
});

test("simulation timeouts, failures and ERROR output fail validation", async () => {
  const hung = createIcarusValidator(config, fakeRunner([ok, { ...ok, code: 1, timedOut: true }], []));
  assert.deepEqual(await hung.validate(design, ctx), { passed: false, log: SIMULATION_TIMEOUT_LOG });

  const crashed = createIcarusValidator(config, fakeRunner([ok, { ...ok, code: 2 }], []));
  assert.deepEqual(await crashed.validate(design, ctx), {
    passed: false,
    log: "ERROR during simulation:\nUnknown simulation error.",
  });

  const mismatch = createIcarusValidator(config, fakeRunner([ok, { ...ok, stdout: "ERROR: expected 1 got 0\n" }], []));
  assert.deepEqual(await mismatch.validate(design, ctx), { passed: false, log: "ERROR: expected 1 got 0\n" });
});

test("no Verilog sources means no commands", async () => {
  const calls: Array<{ file: string; args: string[]; cwd: string }> = [];
  const validator = createIcarusValidator(config, fakeRunner([], calls));
  assert.deepEqual(await validator.validate({ "defs.vh": "`define W 1" }, ctx), {
    passed: false,
    log: "ERROR: No Verilog files found.",
  });
  assert.equal(calls.length, 0);
});

test("a missing simulator binary is a collaborator failure", async () => {
  const validator = createIcarusValidator(config, async () => {
    throw new Error("spawn iverilog ENOENT");
  });
  await assert.rejects(validator.validate(design, ctx), /ENOENT/);
});

test("a testbench flooding stdout fails with a harness log instead of an error", async () => {
  const flood = Array.from({ length: 50 }, (_, index) => `tick ${index}`).join("\n");
  const validator = createIcarusValidator(config, fakeRunner([ok, { ...ok, code: 1, stdout: flood, outputLimited: true }], []));

  const result = await validator.validate(design, ctx);

  const lastLines = Array.from({ length: 20 }, (_, index) => `tick ${index + 30}`).join("\n");
  assert.deepEqual(result, {
    passed: false,
    log: `${SIMULATION_OUTPUT_LIMIT_LOG}\nLast output:\n${lastLines}`,
  });
  assert.equal(
    classify(result.log, [
      { name: "and_gate.v", role: "primary", content: design["and_gate.v"] },
      { name: "and_gate_tb.v", role: "companion", content: design["and_gate_tb.v"] },
    ]),
    "COMPANION",
  );
});

test("settleCommand keeps output-limit kills and rejects only processes that never ran", () => {
  const overflow = Object.assign(new Error("stdout maxBuffer length exceeded"), {
    code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER",
  });
  assert.deepEqual(settleCommand(overflow, "tick\n", ""), {
    code: 1,
    stdout: "tick\n",
    stderr: "",
    timedOut: false,
    outputLimited: true,
  });

  const killed = Object.assign(new Error("killed"), { code: null, killed: true, signal: "SIGTERM" as const });
  assert.equal(settleCommand(killed, "", "").timedOut, true);

  const exited = Object.assign(new Error("exit 2"), { code: 2 });
  assert.deepEqual(settleCommand(exited, "", "boom"), {
    code: 2,
    stdout: "",
    stderr: "boom",
    timedOut: false,
    outputLimited: false,
  });

  const missing = Object.assign(new Error("spawn vvp ENOENT"), { code: "ENOENT" });
  assert.throws(() => settleCommand(missing, "", ""), /ENOENT/);
  assert.deepEqual(settleCommand(null, "ok", ""), {
    code: 0,
    stdout: "ok",
    stderr: "",
    timedOut: false,
    outputLimited: false,
  });
});
