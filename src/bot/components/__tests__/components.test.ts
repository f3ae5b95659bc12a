import { ButtonStyle, ComponentType } from "discord.js";
import { buildCatalog } from "../../../catalog.js";
import type { JobSnapshot } from "../../../queue/types.js";
import type { DraftParams } from "../../requestParser.js";
import { CUSTOM_ID, buildFormPayload, deleteDraft, getDraft, initDraft, mergeDraft } from "../formEmbed.js";
import { parseStrengths, strengthFieldId } from "../loraModal.js";
import { buildPromptModal } from "../promptModal.js";
import { buildResultMessage, queuedMessage, statusLine } from "../resultEmbed.js";

const catalog = buildCatalog(
  [{ key: "1024x1024", label: "Square (1:1)", width: 1024, height: 1024 }],
  [
    { name: "Ink", file: "ink.safetensors", defaultStrength: 0.8 },
    { name: "Film", file: "film.safetensors", defaultStrength: 1 },
  ],
  "1024x1024",
);

function draft(overrides: Partial<DraftParams> = {}): DraftParams {
  return { prompt: "", creativity: "", seed: "", resolution: "1024x1024", loras: [], upscale: false, ...overrides };
}

function customIds(payload: ReturnType<typeof buildFormPayload>): string[][] {
  return payload.components.map((row) =>
    row.toJSON().components.map((c) => ("custom_id" in c ? c.custom_id : "")),
  );
}

describe("draft store", () => {
  it("creates, merges and deletes a user's draft", () => {
    expect(initDraft("user-1", catalog)).toEqual(draft());
    expect(mergeDraft("user-1", { prompt: "a heron" }).prompt).toBe("a heron");
    expect(getDraft("user-1")?.prompt).toBe("a heron");
    deleteDraft("user-1");
    expect(getDraft("user-1")).toBeUndefined();
    expect(() => mergeDraft("user-1", {})).toThrow("No draft found for user user-1");
  });
});

describe("buildFormPayload", () => {
  it("lays out the selects and buttons", () => {
    const payload = buildFormPayload(draft({ prompt: "a heron" }), catalog, true);
    expect(customIds(payload)).toEqual([
      [CUSTOM_ID.SELECT_RESOLUTION],
      [CUSTOM_ID.SELECT_LORAS],
      [CUSTOM_ID.BTN_EDIT_PROMPT, CUSTOM_ID.BTN_LORA_STRENGTH, CUSTOM_ID.BTN_TOGGLE_UPSCALE, CUSTOM_ID.BTN_GENERATE],
    ]);
  });

  it("disables Generate until there is a prompt and hides Upscale when it is off", () => {
    const buttons = buildFormPayload(draft(), catalog, false).components[2]?.toJSON().components ?? [];
    expect(buttons.map((b) => ("custom_id" in b ? b.custom_id : ""))).toEqual([
      CUSTOM_ID.BTN_EDIT_PROMPT,
      CUSTOM_ID.BTN_LORA_STRENGTH,
      CUSTOM_ID.BTN_GENERATE,
    ]);
    expect(buttons.map((b) => b.disabled)).toEqual([undefined, true, true]);
  });
});

describe("buildPromptModal", () => {
  it("asks for creativity only when an enhancer is configured", () => {
    const fields = (enhancer: boolean) =>
      buildPromptModal(draft(), enhancer)
        .toJSON()
        .components.map((row) => row.components[0]?.custom_id);

    expect(fields(true)).toEqual([CUSTOM_ID.MODAL_FIELD_PROMPT, CUSTOM_ID.MODAL_FIELD_CREATIVITY, CUSTOM_ID.MODAL_FIELD_SEED]);
    expect(fields(false)).toEqual([CUSTOM_ID.MODAL_FIELD_PROMPT, CUSTOM_ID.MODAL_FIELD_SEED]);
  });
});

describe("parseStrengths", () => {
  const picked = draft({
    loras: [
      { file: "ink.safetensors", strength: 0.8 },
      { file: "film.safetensors", strength: 1 },
    ],
  });

  it("returns the new strengths in selection order", () => {
    const values: Record<string, string> = { [strengthFieldId(0)]: "1.5", [strengthFieldId(1)]: "0" };
    expect(parseStrengths(picked, (id) => values[id] ?? "")).toEqual({
      ok: true,
      loras: [
        { file: "ink.safetensors", strength: 1.5 },
        { file: "film.safetensors", strength: 0 },
      ],
    });
  });

  it("lists each field that is out of range or not a number", () => {
    const values: Record<string, string> = { [strengthFieldId(0)]: "2.5", [strengthFieldId(1)]: "lots" };
    expect(parseStrengths(picked, (id) => values[id] ?? "")).toEqual({
      ok: false,
      issues: ["LoRA 1: Maximum strength is 2.", "LoRA 2: Strength must be a number."],
    });
  });
});

describe("status text", () => {
  it("describes the queue position", () => {
    expect(queuedMessage(1)).toBe("⏳ Queued — you're next! I'll update this message as your job runs.");
    expect(queuedMessage(3)).toBe("⏳ Queued — position **3** in the queue. I'll update this message as your job runs.");
  });

  const snapshot = (overrides: Partial<JobSnapshot>): JobSnapshot => ({
    id: "job-9",
    request: {
      requesterId: "user-1",
      guildId: "guild-1",
      channelId: "channel-1",
      prompt: "a heron, ukiyo-e",
      originalPrompt: "a heron",
      resolution: { key: "1024x1024", label: "Square (1:1)", width: 1024, height: 1024 },
      loras: [{ name: "Ink", file: "ink.safetensors", strength: 0.8 }],
      upscale: false,
      creativity: 5,
      seed: 77,
    },
    status: "running",
    progress: 0.42,
    progressMessage: "Step 8/20",
    backendToken: "p-1",
    result: null,
    error: null,
    createdAt: 0,
    submittedAt: 0,
    startedAt: 0,
    completedAt: null,
    ...overrides,
  });

  it("shows progress with the backend's step message", () => {
    expect(statusLine(snapshot({}))).toBe("🔄 Generating… 42% (Step 8/20)");
    expect(statusLine(snapshot({ progressMessage: null }))).toBe("🔄 Generating… 42%");
  });

  it("builds the result post with follow-up buttons", () => {
    const message = buildResultMessage(
      snapshot({ status: "succeeded", result: [{ filename: "heron.png", data: Buffer.from("png") }] }),
      "Tester",
      true,
    );
    const embed = message.embeds[0]?.toJSON();

    expect(message.content).toBe("<@user-1>");
    expect(embed?.title).toBe("Image generated by Tester");
    expect(embed?.image?.url).toBe("attachment://heron.png");
    expect(embed?.footer?.text).toBe("Job ID: job-9");
    expect(embed?.fields?.find((f) => f.name === "Original prompt")?.value).toBe("a heron");
    expect(embed?.fields?.find((f) => f.name === "LoRAs")?.value).toBe("Ink (0.80)");

    const buttons = message.components[0]?.toJSON().components ?? [];
    expect(buttons.map((b) => ("custom_id" in b ? b.custom_id : ""))).toEqual([
      "img_reroll:job-9",
      "img_upscale:job-9",
      "img_delete:job-9",
    ]);
    expect(buttons.map((b) => b.type)).toEqual([ComponentType.Button, ComponentType.Button, ComponentType.Button]);
    expect(buttons.map((b) => b.style)).toEqual([ButtonStyle.Primary, ButtonStyle.Success, ButtonStyle.Danger]);
  });

  it("leaves out Upscale for upscaled images", () => {
    const message = buildResultMessage(snapshot({ status: "succeeded", request: { ...snapshot({}).request, upscale: true } }), "Tester", true);
    const ids = (message.components[0]?.toJSON().components ?? []).map((b) => ("custom_id" in b ? b.custom_id : ""));
    expect(ids).toEqual(["img_reroll:job-9", "img_delete:job-9"]);
  });
});
