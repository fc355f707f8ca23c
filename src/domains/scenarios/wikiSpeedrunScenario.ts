import { z } from "zod";
import { countPageChanges, isWikiArticle, scoreClickCount } from "../evaluation/clickScore";
import { navigateTo } from "../setup/pageSetup";
import { defineScenario } from "./scenarioTypes";

export const WIKI_BASE_URL = "https://en.wikipedia.org/wiki/";

const ArticleSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !value.includes("/"), { message: "article titles must not contain '/'" });

export function wikiArticleUrl(title: string): string {
  return `${WIKI_BASE_URL}${encodeURIComponent(title.replace(/ /g, "_"))}`;
}

export function defaultSpeedrunPrompt(start: string, target: string, maxClicks: number): string {
  return [
    `You are on the Wikipedia article "${start}". Reach the article "${target}" by clicking links inside articles.`,
    "Do not use the search box, the address bar or the back button.",
    `You may click at most ${maxClicks} links; fewer is better. Call evaluate_task when you arrive.`
  ].join(" ");
}

export const wikiSpeedrunScenario = defineScenario({
  name: "wiki-speedrun",
  description: "Reach a target Wikipedia article from a start article in as few link clicks as possible.",
  argsSchema: z
    .object({
      start_page: ArticleSchema,
      target_page: ArticleSchema,
      max_clicks: z.number().int().positive().default(10),
      min_clicks: z.number().int().nonnegative().default(1),
      prompt: z.string().min(1).optional()
    })
    .refine((args) => args.min_clicks <= args.max_clicks, { message: "min_clicks must not exceed max_clicks" }),
  budget: (args) => ({
    limit: args.max_clicks,
    unit: "clicks",
    measure: (progress) => countPageChanges(progress.history.navigations, progress.startUrl)
  }),
  setup: async (args, ctx) => {
    await navigateTo(ctx.surface, wikiArticleUrl(args.start_page), { waitUntil: "domcontentloaded", timeoutMs: ctx.timeoutMs });
    return {
      prompt: args.prompt ?? defaultSpeedrunPrompt(args.start_page, args.target_page, args.max_clicks),
      detail: { target: wikiArticleUrl(args.target_page) }
    };
  },
  evaluate: async (args, ctx) =>
    scoreClickCount({
      reachedTarget: isWikiArticle(ctx.surface.currentUrl(), args.target_page),
      clicks: countPageChanges(ctx.history.navigations, ctx.startUrl),
      maxClicks: args.max_clicks,
      minClicks: args.min_clicks
    })
});
