import { z } from "zod";
import { combineMin, scoredOutcome, type HelperOutcome } from "../evaluation/outcome";
import { evaluateSheetCells, evaluateSheetContains } from "../evaluation/sheetReader";
import { createSheetFromFile, openGoogleSheet } from "../setup/sheetSetup";
import { ExpectedCellsSchema, HttpUrlSchema } from "./commonArgs";
import { defineScenario } from "./scenarioTypes";

const SHEET_PROMPT_SUFFIX = "Put your results on the ANSWER tab when the sheet has one, then call evaluate_task.";

export const completeSheetTaskScenario = defineScenario({
  name: "complete-sheet-task",
  description: "Work in an existing Google Sheet; expected cell values are checked afterwards.",
  argsSchema: z.object({
    prompt: z.string().min(1),
    sheet_url: HttpUrlSchema,
    expected_cells: ExpectedCellsSchema,
    partial_rewarding: z.boolean().default(true)
  }),
  setup: async (args, ctx) => {
    await openGoogleSheet(ctx.surface, args.sheet_url, { timeoutMs: ctx.timeoutMs });
    return { prompt: `${args.prompt}\n\n${SHEET_PROMPT_SUFFIX}` };
  },
  evaluate: (args, ctx) => evaluateSheetCells(ctx.surface, args.expected_cells, args.partial_rewarding)
});

export const sheetFromFileScenario = defineScenario({
  name: "sheet-from-file",
  description: "Upload a workbook as a new Google Sheet, let the agent work in it, then check cells and text.",
  argsSchema: z
    .object({
      prompt: z.string().min(1),
      file_url: HttpUrlSchema.optional(),
      file_bytes: z.string().min(1).optional(),
      sheet_name: z.string().min(1).default("Worksheet"),
      expected_cells: ExpectedCellsSchema.default({}),
      expected_text: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
      partial_rewarding: z.boolean().default(true)
    })
    .refine((args) => args.file_url !== undefined || args.file_bytes !== undefined, {
      message: "file_url or file_bytes is required"
    }),
  setup: async (args, ctx) => {
    const sheetUrl = await createSheetFromFile(
      ctx.drive,
      ctx.http,
      ctx.surface,
      { fileUrl: args.file_url, fileBytes: args.file_bytes, sheetName: args.sheet_name },
      { timeoutMs: ctx.timeoutMs }
    );
    return { prompt: `${args.prompt}\n\n${SHEET_PROMPT_SUFFIX}`, detail: { sheetUrl } };
  },
  evaluate: async (args, ctx) => {
    const parts: Array<{ name: string; outcome: HelperOutcome }> = [];
    if (Object.keys(args.expected_cells).length > 0) {
      parts.push({ name: "cells", outcome: await evaluateSheetCells(ctx.surface, args.expected_cells, args.partial_rewarding) });
    }
    const terms = args.expected_text === undefined ? [] : Array.isArray(args.expected_text) ? args.expected_text : [args.expected_text];
    if (terms.length > 0) {
      parts.push({ name: "text", outcome: await evaluateSheetContains(ctx.surface, terms) });
    }
    return parts.length === 0 ? scoredOutcome(1, {}) : combineMin(parts);
  }
});
