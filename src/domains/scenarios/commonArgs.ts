import { z } from "zod";
import { isHttpUrl } from "../../config/validateConfig";
import { CheckSchema } from "../evaluation/checks";
import { isCellReference } from "../evaluation/sheetCells";

export const HttpUrlSchema = z.string().refine(isHttpUrl, { message: "must be an absolute http(s) URL" });

export const CookieSchema = z
  .object({
    name: z.string().min(1),
    value: z.string(),
    url: z.string().optional(),
    domain: z.string().optional(),
    path: z.string().optional(),
    expires: z.number().optional(),
    httpOnly: z.boolean().optional(),
    secure: z.boolean().optional(),
    sameSite: z.enum(["Strict", "Lax", "None"]).optional()
  })
  .refine((cookie) => cookie.url !== undefined || cookie.domain !== undefined, {
    message: "cookie needs either url or domain"
  });

const SelectorSchema = z.string().min(1);

/** Page preparation run after the start page loads and before the agent takes over. */
export const SetupActionsSchema = z
  .array(
    z.discriminatedUnion("action", [
      z.object({ action: z.literal("click"), selector: SelectorSchema }),
      z.object({ action: z.literal("fill"), selector: SelectorSchema, text: z.string() }),
      z.object({ action: z.literal("select"), selector: SelectorSchema, value: z.string() }),
      z.object({ action: z.literal("clear_cookies") })
    ])
  )
  .default([]);

export const ExpectedCellsSchema = z.record(
  z.string().refine(isCellReference, { message: "keys must be cell references like A1" }),
  z.union([z.string(), z.number()])
);

export const ChecksSchema = z.array(CheckSchema).default([]);
