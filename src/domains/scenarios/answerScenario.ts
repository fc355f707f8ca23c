import { z } from "zod";
import { COMPARE_MODES, compareAnswers } from "../evaluation/answerCompare";
import { runChecks } from "../evaluation/checks";
import { combineMin } from "../evaluation/outcome";
import { navigateTo, runSetupActions, setCookies } from "../setup/pageSetup";
import { ChecksSchema, CookieSchema, HttpUrlSchema, SetupActionsSchema } from "./commonArgs";
import { defineScenario } from "./scenarioTypes";

export const answerScenario = defineScenario({
  name: "answer",
  description: "Open a page and ask the agent a question; the submitted answer is compared with the expected one.",
  argsSchema: z.object({
    url: HttpUrlSchema,
    prompt: z.string().min(1),
    expected: z.unknown().optional(),
    compare_mode: z.enum(COMPARE_MODES).default("exact"),
    cookies: z.array(CookieSchema).default([]),
    setup_actions: SetupActionsSchema,
    checks: ChecksSchema
  }),
  setup: async (args, ctx) => {
    await setCookies(ctx.surface, args.cookies);
    await navigateTo(ctx.surface, args.url, { timeoutMs: ctx.timeoutMs });
    await runSetupActions(ctx.surface, args.setup_actions, ctx.timeoutMs);
    return {
      prompt: `${args.prompt}\n\nWhen you are done, submit your final answer with evaluate_task.`
    };
  },
  evaluate: async (args, ctx) => {
    const answer = compareAnswers(ctx.answer, args.expected, args.compare_mode);
    if (args.checks.length === 0) {
      return answer;
    }
    return combineMin([{ name: "answer", outcome: answer }, ...(await runChecks(args.checks, ctx.surface, ctx.history))]);
  }
});
