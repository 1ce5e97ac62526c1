import assert from "node:assert/strict";
import { test } from "node:test";
import type { PromptPair } from "../prompts";
import { createLlmDecomposer, fallbackToMonolith, toDecomposeResult } from "./decomposer";
import type { CallContext, Generator } from "./types";

const ctx: CallContext = { runId: "run-1", query: "4-bit ALU", stage: "decompose" };

function scripted(response: string, prompts: PromptPair[] = []): Generator {
  return {
    async generate(prompt) {
      prompts.push(prompt);
      return response;
    },
  };
}

test("a file map becomes one artifact per file with the primary first", async () => {
  const response = [
    "```json",
    JSON.stringify({
      top_module_name: "alu",
      files: {
        "alu_defs.vh": "`define W 4",
        "adder.v": "module adder; endmodule",
        "alu.v": "module alu; adder u(); endmodule",
      },
    }),
    "```",
  ].join("\n");
  const prompts: PromptPair[] = [];
  const decomposer = createLlmDecomposer(scripted(response, prompts));

  const result = await decomposer.decompose("module alu; endmodule", "4-bit ALU", ctx);

  assert.equal(result.primaryName, "alu.v");
  assert.deepEqual(
    result.artifacts.map((entry) => [entry.name, entry.role]),
    [
      ["alu.v", "primary"],
      ["alu_defs.vh", "dependency"],
      ["adder.v", "dependency"],
    ],
  );
  assert.deepEqual(JSON.parse(prompts[0].userPrompt), {
    request: "4-bit ALU",
    monolithic_code: "module alu; endmodule",
  });
});

test("an unusable answer falls back to the monolithic candidate", async () => {
  const reasons: string[] = [];
  const decomposer = createLlmDecomposer(scripted("I cannot split this."), {
    onFallback: (reason) => reasons.push(reason),
  });

  const result = await decomposer.decompose(
    "```verilog\nmodule and_gate(input a, input b, output y); endmodule\n```",
    "2-input AND gate",
    ctx,
  );

  assert.deepEqual(reasons, ["No JSON object found in response"]);
  assert.deepEqual(result, {
    primaryName: "and_gate.v",
    artifacts: [
      { name: "and_gate.v", role: "primary", content: "module and_gate(input a, input b, output y); endmodule" },
    ],
  });
});

test("fallbackToMonolith needs a module declaration", () => {
  assert.throws(() => fallbackToMonolith("no hardware here"), /declares no module/);
});

test("toDecomposeResult sanitizes names and picks the first Verilog file when the top is missing", () => {
  const result = toDecomposeResult("top", { "defs.vh": "`define X 1", "core unit.v": "module core; endmodule" });
  assert.equal(result.primaryName, "core_unit.v");
  assert.deepEqual(
    result.artifacts.map((entry) => entry.name),
    ["core_unit.v", "defs.vh"],
  );
  assert.throws(() => toDecomposeResult("top", { "defs.vh": "`define X 1" }), /no Verilog file for top module top/);
});
