import assert from "node:assert/strict";
import { test } from "node:test";
import type { PromptPair } from "../prompts";
import { createLlmCompanionGenerator } from "./companion";
import type { CallContext, Generator } from "./types";

const ctx: CallContext = { runId: "run-1", query: "4-bit ALU", stage: "generate_companion" };
const TB = "module alu_tb;\n  alu dut();\nendmodule";

function scripted(response: string, prompts: PromptPair[] = []): Generator {
  return {
    async generate(prompt) {
      prompts.push(prompt);
      return response;
    },
  };
}

test("the companion is read from the JSON answer", async () => {
  const prompts: PromptPair[] = [];
  const companion = createLlmCompanionGenerator(scripted(JSON.stringify({ "alu_tb.v": TB }), prompts));

  const result = await companion.generateCompanion("alu.v", "module alu; endmodule", "4-bit ALU", ctx, {
    includeFiles: ["alu_defs.vh"],
  });

  assert.deepEqual(result, { companionName: "alu_tb.v", companionContent: TB });
  assert.ok(prompts[0].systemPrompt.includes('`include "alu_defs.vh"'));
});

test("blank keys get the conventional name and odd keys are sanitized", async () => {
  const blank = createLlmCompanionGenerator(scripted(JSON.stringify({ " ": TB })));
  assert.equal((await blank.generateCompanion("alu.v", "module alu; endmodule", "g", ctx)).companionName, "alu_tb.v");

  const spaced = createLlmCompanionGenerator(scripted(JSON.stringify({ "tb/alu tb.v": TB })));
  assert.equal(
    (await spaced.generateCompanion("alu.v", "module alu; endmodule", "g", ctx)).companionName,
    "tb_alu_tb.v",
  );
});

test("empty or unparsable answers are errors", async () => {
  const empty = createLlmCompanionGenerator(scripted(JSON.stringify({ "alu_tb.v": "   " })));
  await assert.rejects(
    empty.generateCompanion("alu.v", "module alu; endmodule", "g", ctx),
    /Companion generator returned an empty testbench/,
  );

  const prose = createLlmCompanionGenerator(scripted("Here is a testbench for you."));
  await assert.rejects(prose.generateCompanion("alu.v", "module alu; endmodule", "g", ctx), /No JSON object found/);
});
