import { z } from "zod";
import { declaredName } from "./artifactStore";

export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

export const FileMapSchema = z.record(z.string());

export const DecompositionSchema = z.object({
  top_module_name: z.string().min(1),
  files: FileMapSchema.refine((files) => Object.keys(files).length > 0, "files must not be empty"),
});

export type Decomposition = z.infer<typeof DecompositionSchema>;

const FENCE_PATTERN = /```[a-zA-Z]*\n?([\s\S]*?)```/;

/** Returns the first fenced block's body, or the whole text when unfenced. */
export function extractCodeBlock(text: string): string {
  const match = FENCE_PATTERN.exec(text);
  const body = match ? match[1] : text.replace(/```[a-zA-Z]*/g, "");
  return body.trim();
}

export function extractFirstJsonObject(text: string): unknown {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first < 0 || last <= first) throw new Error("No JSON object found in response");
  return JSON.parse(text.slice(first, last + 1));
}

export function parseFileMap(text: string): Record<string, string> {
  const files = FileMapSchema.parse(extractFirstJsonObject(text));
  if (Object.keys(files).length === 0) throw new Error("Response file map is empty");
  return files;
}

export function buildGenerationPrompt(query: string): PromptPair {
  return {
    systemPrompt: [
      "You are an expert Verilog HDL designer.",
      "Generate the complete, monolithic Verilog code for the request.",
      "Put any `define macros or shared parameters at the top.",
      "Output only the Verilog code inside a single ```verilog fenced block.",
    ].join(" "),
    userPrompt: `REQUEST:\n${query}`,
  };
}

export function buildDecompositionPrompt(candidateText: string, query: string): PromptPair {
  return {
    systemPrompt: [
      "You are a Verilog refactoring tool.",
      "Identify the top-level module and put every module in its own `<module_name>.v` file.",
      "Move `define macros and shared parameters into one `.vh` header and add `include lines where they are used.",
      'Return only a JSON object: {"top_module_name": string, "files": {"<file name>": "<code>"}}.',
    ].join(" "),
    userPrompt: JSON.stringify({ request: query, monolithic_code: candidateText }, null, 2),
  };
}

export function buildCompanionPrompt(params: {
  primaryName: string;
  primaryContent: string;
  goal: string;
  includeFiles: string[];
}): PromptPair {
  const top = declaredName(params.primaryName);
  const rules = [
    `The testbench module MUST be named \`${top}_tb\`.`,
    "Instantiate the DUT, drive realistic stimuli, print results with $display or $monitor.",
    "Generate a clock if the design needs one and end the simulation with $finish.",
    `Start the initial block with $dumpfile("design.vcd"); and $dumpvars(0, ${top}_tb);`,
    "Print a line containing ERROR for every failed check.",
  ];
  for (const file of params.includeFiles) {
    rules.push(`Include the header with \`include "${file}".`);
  }
  return {
    systemPrompt: [
      "You are an expert in Verilog testbench design.",
      ...rules,
      `Return only a JSON object with one key, "${top}_tb.v", whose value is the complete testbench code.`,
      "Do not include the DUT code.",
    ].join(" "),
    userPrompt: JSON.stringify(
      { goal: params.goal, top_module: top, top_module_file: params.primaryName, top_module_code: params.primaryContent },
      null,
      2,
    ),
  };
}

export function buildPrimaryCorrectionPrompt(params: {
  artifactName: string;
  content: string;
  validationLog: string;
}): PromptPair {
  return {
    systemPrompt: [
      "You are an expert Verilog debugger.",
      "The module below failed compilation or simulation.",
      "Find the bug from the error log and return a corrected version of only this file.",
      "Output only the complete corrected code inside a single ```verilog fenced block.",
    ].join(" "),
    userPrompt: [
      `FAULTY FILE (${params.artifactName}):`,
      "```verilog",
      params.content,
      "```",
      "",
      "VALIDATION LOG:",
      "```",
      params.validationLog,
      "```",
    ].join("\n"),
  };
}

export function buildCompanionCorrectionPrompt(params: {
  artifactName: string;
  content: string;
  validationLog: string;
  primaryName: string;
  primaryContent: string;
}): PromptPair {
  const top = declaredName(params.primaryName);
  return {
    systemPrompt: [
      "You are an expert Verilog testbench debugger.",
      "The testbench below failed during simulation.",
      "Fix only the testbench; the device under test is read-only context and must not change.",
      `Keep $dumpfile("design.vcd"); and $dumpvars(0, ${top}_tb); in the corrected testbench.`,
      `Return only a JSON object with one key, "${params.artifactName}", whose value is the corrected testbench code.`,
    ].join(" "),
    userPrompt: [
      "VALIDATION LOG:",
      "```",
      params.validationLog,
      "```",
      "",
      `FAULTY TESTBENCH (${params.artifactName}):`,
      "```verilog",
      params.content,
      "```",
      "",
      `DEVICE UNDER TEST (${params.primaryName}, read-only):`,
      "```verilog",
      params.primaryContent,
      "```",
    ].join("\n"),
  };
}
