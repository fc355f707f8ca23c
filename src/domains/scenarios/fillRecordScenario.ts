import { z } from "zod";
import { runChecks } from "../evaluation/checks";
import { combineMin, scoredOutcome, type HelperOutcome } from "../evaluation/outcome";
import type { BrowserSurface } from "../browser-automation/surface";
import { loadHtml, navigateTo, runSetupActions, setCookies } from "../setup/pageSetup";
import { ChecksSchema, CookieSchema, HttpUrlSchema, SetupActionsSchema } from "./commonArgs";
import { defineScenario } from "./scenarioTypes";

const FieldValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const fillRecordScenario = defineScenario({
  name: "fill-record",
  description: "Have the agent fill in a form; selected fields are read back and compared.",
  argsSchema: z
    .object({
      url: HttpUrlSchema.optional(),
      html: z.string().min(1).optional(),
      prompt: z.string().min(1),
      fields: z.record(z.string(), FieldValueSchema).default({}),
      verify: z.record(z.string().min(1), z.string()).default({}),
      cookies: z.array(CookieSchema).default([]),
      setup_actions: SetupActionsSchema,
      checks: ChecksSchema
    })
    .refine((args) => (args.url === undefined) !== (args.html === undefined), {
      message: "exactly one of url or html is required"
    }),
  setup: async (args, ctx) => {
    await setCookies(ctx.surface, args.cookies);
    if (args.html !== undefined) {
      await loadHtml(ctx.surface, args.html);
    } else if (args.url !== undefined) {
      await navigateTo(ctx.surface, args.url, { timeoutMs: ctx.timeoutMs });
    }
    await runSetupActions(ctx.surface, args.setup_actions, ctx.timeoutMs);
    return { prompt: renderPrompt(args.prompt, args.fields) };
  },
  evaluate: async (args, ctx) => {
    const fields = await verifyFields(ctx.surface, args.verify);
    if (args.checks.length === 0) {
      return fields;
    }
    return combineMin([{ name: "fields", outcome: fields }, ...(await runChecks(args.checks, ctx.surface, ctx.history))]);
  }
});

export function renderPrompt(prompt: string, fields: Record<string, string | number | boolean>): string {
  const entries = Object.entries(fields);
  if (entries.length === 0) {
    return prompt;
  }
  const lines = entries.map(([name, value]) => `- ${name}: ${String(value)}`);
  return `${prompt}\n\nUse these values:\n${lines.join("\n")}`;
}

/** Read-back of each selector; input value first, text content otherwise. */
export async function verifyFields(surface: BrowserSurface, verify: Record<string, string>): Promise<HelperOutcome> {
  const selectors = Object.keys(verify);
  if (selectors.length === 0) {
    return scoredOutcome(1, { matched: [], mismatched: [] });
  }
  const matched: string[] = [];
  const mismatched: Array<{ selector: string; expected: string; actual: string | null }> = [];
  for (const selector of selectors) {
    const actual = await surface.readFieldValue(selector);
    if (actual !== null && actual.trim() === verify[selector].trim()) {
      matched.push(selector);
    } else {
      mismatched.push({ selector, expected: verify[selector], actual });
    }
  }
  return scoredOutcome(matched.length / selectors.length, { matched, mismatched }, "FIELD_MISMATCH");
}
