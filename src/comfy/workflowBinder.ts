import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { LoraSelection, WorkflowParameters } from "../queue/types.js";
import { logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface BindOk {
  ok: true;
  workflow: Record<string, unknown>;
}

export interface BindError {
  ok: false;
  reason: string; // safe to surface to Discord user
}

export type BindResult = BindOk | BindError;

// ---------------------------------------------------------------------------
// Workflow binding rules (node ids are fixed by workflows/txt2img.json)
//
//  Node | Field(s) written
//  -----|---------------------------------------------------------
//  "1"  | inputs.ckpt_name            (only when COMFY_CHECKPOINT is set)
//  "2"  | inputs.text                 (positive prompt)
//  "3"  | inputs.text                 (negative prompt)
//  "4"  | inputs.width, inputs.height (latent size)
//  "5"  | inputs.seed                 (sampler seed)
//  "7"  | inputs.scale_by             (1 = no upscale)
//
//  LoRAs are chained as LoraLoader nodes "1001".."1004" between "1" and
//  every node that consumed its MODEL / CLIP outputs.
// ---------------------------------------------------------------------------

const CHECKPOINT_NODE = "1";

const REQUIRED_FIELDS: Record<string, string[]> = {
  "1": ["ckpt_name"],
  "2": ["text"],
  "3": ["text"],
  "4": ["width", "height"],
  "5": ["seed"],
  "7": ["scale_by"],
};

export const MAX_LORAS = 4;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function inputsOf(workflow: Record<string, unknown>, nodeId: string): Record<string, unknown> | null {
  const n = workflow[nodeId];
  if (!isRecord(n)) return null;
  const inp = n["inputs"];
  return isRecord(inp) ? inp : null;
}

function setField(workflow: Record<string, unknown>, nodeId: string, field: string, value: unknown): void {
  const inp = inputsOf(workflow, nodeId);
  if (inp) inp[field] = value;
}

// ---------------------------------------------------------------------------
// Load template from disk
// ---------------------------------------------------------------------------

const _cache = new Map<string, string>();

export function loadWorkflow(path: string): Record<string, unknown> {
  const abs = resolve(path);
  let raw = _cache.get(abs);
  if (raw === undefined) {
    raw = readFileSync(abs, "utf-8");
    _cache.set(abs, raw);
    logger.debug({ wfPath: abs }, "Workflow template loaded from disk");
  }
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) throw new Error(`${path} is not a JSON object`);
  return parsed;
}

// ---------------------------------------------------------------------------
// LoRA injection
// ---------------------------------------------------------------------------

/**
 * Chain one LoraLoader per selection after the checkpoint node, then re-point
 * every other node that read MODEL (output 0) or CLIP (output 1) from the
 * checkpoint at the last LoRA in the chain.
 */
function injectLoras(wf: Record<string, unknown>, loras: readonly LoraSelection[]): void {
  const active = loras.slice(0, MAX_LORAS);
  if (active.length === 0) return;

  const loraNodeIds = active.map((_, i) => String(1001 + i));

  active.forEach((lora, i) => {
    const prevId = i === 0 ? CHECKPOINT_NODE : loraNodeIds[i - 1];
    wf[loraNodeIds[i]] = {
      class_type: "LoraLoader",
      inputs: {
        model: [prevId, 0],
        clip: [prevId, 1],
        lora_name: lora.file,
        strength_model: lora.strength,
        strength_clip: lora.strength,
      },
    };
  });

  const lastLoraId = loraNodeIds[loraNodeIds.length - 1];

  for (const [nodeId, nodeData] of Object.entries(wf)) {
    if (loraNodeIds.includes(nodeId) || !isRecord(nodeData)) continue;
    const inp = nodeData["inputs"];
    if (!isRecord(inp)) continue;
    for (const [field, val] of Object.entries(inp)) {
      if (!Array.isArray(val) || val.length < 2 || val[0] !== CHECKPOINT_NODE) continue;
      if (val[1] === 0 || val[1] === 1) inp[field] = [lastLoraId, val[1]];
    }
  }
}

// ---------------------------------------------------------------------------
// validate()
// ---------------------------------------------------------------------------

/**
 * Check that the workflow has every node and field the binder writes.
 * Returns the first problem found.
 */
export function validate(workflow: unknown): BindResult {
  if (!isRecord(workflow)) {
    return { ok: false, reason: "Workflow is not a plain object." };
  }

  for (const [nodeId, fields] of Object.entries(REQUIRED_FIELDS)) {
    if (!isRecord(workflow[nodeId])) {
      return { ok: false, reason: `Workflow is missing required node "${nodeId}".` };
    }
    const inp = inputsOf(workflow, nodeId);
    if (!inp) {
      return { ok: false, reason: `Node "${nodeId}" is missing an "inputs" object.` };
    }
    for (const field of fields) {
      if (inp[field] === undefined || inp[field] === null) {
        return { ok: false, reason: `Node "${nodeId}" inputs.${field} is missing or null.` };
      }
    }
  }

  return { ok: true, workflow };
}

// ---------------------------------------------------------------------------
// bind()
// ---------------------------------------------------------------------------

/** Copy the template and write every parameter into it. */
export function bind(
  template: Record<string, unknown>,
  params: WorkflowParameters,
  checkpoint = "",
): BindResult {
  const result = validate(template);
  if (!result.ok) return result;

  if (params.loras.length > MAX_LORAS) {
    return { ok: false, reason: `At most ${MAX_LORAS} LoRAs can be applied.` };
  }
  if (params.width % 8 !== 0 || params.height % 8 !== 0) {
    return { ok: false, reason: `Resolution ${params.width}x${params.height} must be a multiple of 8.` };
  }

  const wf = structuredClone(template);

  injectLoras(wf, params.loras);

  if (checkpoint) setField(wf, CHECKPOINT_NODE, "ckpt_name", checkpoint);
  setField(wf, "2", "text", params.prompt);
  setField(wf, "3", "text", params.negativePrompt);
  setField(wf, "4", "width", params.width);
  setField(wf, "4", "height", params.height);
  setField(wf, "5", "seed", params.seed);
  setField(wf, "7", "scale_by", params.upscaleFactor);

  return { ok: true, workflow: wf };
}
