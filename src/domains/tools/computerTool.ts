import { z } from "zod";
import type { Size } from "../../config/types";
import type { BrowserSurface, MouseButton } from "../browser-automation/surface";
import { normalizeCombo, normalizeKey } from "./keyMap";
import { scalePoint, type Point } from "./coordinates";
import { browserStep, defineTool, imageContent, textContent, type ToolContext } from "./toolRuntime";

const PointSchema = z.object({
  x: z.number().min(0),
  y: z.number().min(0)
});

const ComputerActionSchema = z.enum(["click", "double_click", "move", "scroll", "drag", "type", "key", "wait", "screenshot"]);

const POINTER_ACTIONS = new Set(["click", "double_click", "move", "scroll"]);

export const MAX_WAIT_MS = 10_000;

const ComputerArgsSchema = z
  .object({
    action: ComputerActionSchema,
    x: z.number().min(0).optional(),
    y: z.number().min(0).optional(),
    button: z.enum(["left", "right", "middle"]).default("left"),
    hold_keys: z.array(z.string().min(1)).default([]),
    scroll_x: z.number().default(0),
    scroll_y: z.number().default(0),
    path: z.array(PointSchema).optional(),
    text: z.string().optional(),
    enter_after: z.boolean().default(false),
    keys: z.string().min(1).optional(),
    ms: z.number().int().positive().max(MAX_WAIT_MS).optional(),
    resolution: z
      .object({
        width: z.number().int().positive(),
        height: z.number().int().positive()
      })
      .optional()
  })
  .superRefine((args, ctx) => {
    if (POINTER_ACTIONS.has(args.action) && (args.x === undefined || args.y === undefined)) {
      ctx.addIssue({ code: "custom", message: `${args.action} requires x and y`, path: ["x"] });
    }
    if (args.action === "drag" && (args.path === undefined || args.path.length < 2)) {
      ctx.addIssue({ code: "custom", message: "drag requires a path of at least 2 points", path: ["path"] });
    }
    if (args.action === "type" && args.text === undefined) {
      ctx.addIssue({ code: "custom", message: "type requires text", path: ["text"] });
    }
    if (args.action === "key" && args.keys === undefined) {
      ctx.addIssue({ code: "custom", message: "key requires keys", path: ["keys"] });
    }
  });

type ComputerArgs = z.output<typeof ComputerArgsSchema>;

export const computerTool = defineTool({
  name: "computer",
  description:
    "Coordinate-based mouse and keyboard control. Points are in the screenshot's coordinate space " +
    "(the display size, or `resolution` when the caller resized the image). Returns a screenshot.",
  countsAsStep: true,
  schema: ComputerArgsSchema,
  run: async (args, ctx) => {
    const from: Size = args.resolution ?? ctx.session.displaySize();
    const result = await browserStep(ctx, { type: `computer.${args.action}`, details: describe(args) }, async (surface) => {
      const summary = await perform(surface, args, from, ctx);
      return { summary, png: await surface.screenshot(false), url: surface.currentUrl() };
    });
    return {
      content: [textContent(`${result.summary}; page is ${result.url}`), imageContent(result.png)],
      structured: { action: args.action, url: result.url }
    };
  }
});

async function perform(surface: BrowserSurface, args: ComputerArgs, from: Size, ctx: ToolContext): Promise<string> {
  const to = ctx.session.viewportSize();
  const target = (point: Point): Point => scalePoint(point, from, to);

  switch (args.action) {
    case "click":
    case "double_click": {
      const point = target(requirePoint(args));
      const clickCount = args.action === "double_click" ? 2 : 1;
      await withHeldKeys(surface, args.hold_keys, () =>
        surface.mouseClick(point.x, point.y, { button: args.button, clickCount })
      );
      return `${args.action} at (${point.x}, ${point.y})`;
    }
    case "move": {
      const point = target(requirePoint(args));
      await surface.mouseMove(point.x, point.y);
      return `moved to (${point.x}, ${point.y})`;
    }
    case "scroll": {
      const point = target(requirePoint(args));
      await surface.mouseMove(point.x, point.y);
      await withHeldKeys(surface, args.hold_keys, () => surface.wheel(args.scroll_x, args.scroll_y));
      return `scrolled (${args.scroll_x}, ${args.scroll_y}) at (${point.x}, ${point.y})`;
    }
    case "drag": {
      const points = (args.path ?? []).map(target);
      await withHeldKeys(surface, args.hold_keys, () => drag(surface, points, args.button));
      return `dragged through ${points.length} points`;
    }
    case "type": {
      const text = args.text ?? "";
      await surface.typeText(text);
      if (args.enter_after) {
        await surface.pressKey("Enter");
      }
      return `typed ${text.length} characters${args.enter_after ? " and pressed Enter" : ""}`;
    }
    case "key": {
      const combo = normalizeCombo(args.keys ?? "");
      await surface.pressKey(combo);
      return `pressed ${combo}`;
    }
    case "wait": {
      const ms = args.ms ?? 1000;
      await surface.wait(ms);
      return `waited ${ms}ms`;
    }
    case "screenshot":
      return "captured screenshot";
  }
}

async function drag(surface: BrowserSurface, points: Point[], button: MouseButton): Promise<void> {
  const [first, ...rest] = points;
  await surface.mouseMove(first.x, first.y);
  await surface.mouseDown(button);
  for (const point of rest) {
    await surface.mouseMove(point.x, point.y);
  }
  await surface.mouseUp(button);
}

async function withHeldKeys(surface: BrowserSurface, keys: string[], work: () => Promise<void>): Promise<void> {
  const held: string[] = [];
  try {
    for (const key of keys) {
      const normalized = normalizeKey(key);
      await surface.keyDown(normalized);
      held.push(normalized);
    }
    await work();
  } finally {
    for (const key of held.reverse()) {
      await surface.keyUp(key);
    }
  }
}

function requirePoint(args: ComputerArgs): Point {
  return { x: args.x ?? 0, y: args.y ?? 0 };
}

function describe(args: ComputerArgs): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  if (args.x !== undefined && args.y !== undefined) {
    details.x = args.x;
    details.y = args.y;
  }
  if (args.text !== undefined) {
    details.text = args.text;
  }
  if (args.keys !== undefined) {
    details.keys = args.keys;
  }
  if (args.path !== undefined) {
    details.path = args.path;
  }
  if (args.hold_keys.length > 0) {
    details.holdKeys = args.hold_keys;
  }
  return details;
}
