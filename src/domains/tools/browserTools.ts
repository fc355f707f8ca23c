import { z } from "zod";
import { isHttpUrl } from "../../config/validateConfig";
import { browserStep, defineTool, imageContent, textContent, type RegisteredTool } from "./toolRuntime";

const LoadStateSchema = z.enum(["load", "domcontentloaded", "networkidle", "commit"]);
const MouseButtonSchema = z.enum(["left", "right", "middle"]);

export const navigateTool = defineTool({
  name: "navigate",
  description: "Open a URL in the browser and wait for it to load.",
  countsAsStep: true,
  schema: z.object({
    url: z.string().refine(isHttpUrl, { message: "url must be an absolute http(s) URL" }),
    wait_until: LoadStateSchema.default("load")
  }),
  run: async (args, ctx) => {
    const page = await browserStep(
      ctx,
      { type: "navigate", details: { url: args.url }, failureCode: "NAVIGATION_FAILED" },
      async (surface) => {
        await surface.navigate(args.url, { waitUntil: args.wait_until, timeoutMs: ctx.timeoutMs });
        return { url: surface.currentUrl(), title: await surface.title() };
      }
    );
    return {
      content: [textContent(`Navigated to ${page.url} (title: ${JSON.stringify(page.title)})`)],
      structured: page
    };
  }
});

export const clickTool = defineTool({
  name: "click",
  description: "Click the first element matching a CSS or text selector.",
  countsAsStep: true,
  schema: z.object({
    selector: z.string().min(1),
    button: MouseButtonSchema.default("left"),
    click_count: z.number().int().min(1).max(3).default(1)
  }),
  run: async (args, ctx) => {
    ctx.session.history.recordSelector(args.selector);
    const url = await browserStep(
      ctx,
      { type: "click", details: { selector: args.selector, button: args.button, clickCount: args.click_count } },
      async (surface) => {
        await surface.click(args.selector, { button: args.button, clickCount: args.click_count, timeoutMs: ctx.timeoutMs });
        return surface.currentUrl();
      }
    );
    return {
      content: [textContent(`Clicked ${args.selector}; page is ${url}`)],
      structured: { selector: args.selector, url }
    };
  }
});

export const typeTool = defineTool({
  name: "type",
  description: "Type text into the element matching selector, or at the focused element when no selector is given.",
  countsAsStep: true,
  schema: z.object({
    text: z.string(),
    selector: z.string().min(1).optional(),
    submit: z.boolean().default(false)
  }),
  run: async (args, ctx) => {
    if (args.selector !== undefined) {
      ctx.session.history.recordSelector(args.selector);
    }
    await browserStep(
      ctx,
      { type: "type", details: { selector: args.selector ?? null, text: args.text, submit: args.submit } },
      async (surface) => {
        if (args.selector !== undefined) {
          await surface.fill(args.selector, args.text, ctx.timeoutMs);
        } else {
          await surface.typeText(args.text);
        }
        if (args.submit) {
          await surface.pressKey("Enter");
        }
      }
    );
    const target = args.selector ?? "focused element";
    return {
      content: [textContent(`Typed ${args.text.length} characters into ${target}${args.submit ? " and pressed Enter" : ""}`)]
    };
  }
});

export const selectOptionTool = defineTool({
  name: "select_option",
  description: "Choose an option of a <select> element by value or label.",
  countsAsStep: true,
  schema: z.object({
    selector: z.string().min(1),
    value: z.string()
  }),
  run: async (args, ctx) => {
    ctx.session.history.recordSelector(args.selector);
    await browserStep(ctx, { type: "select_option", details: { selector: args.selector, value: args.value } }, (surface) =>
      surface.selectOption(args.selector, args.value, ctx.timeoutMs)
    );
    return { content: [textContent(`Selected ${JSON.stringify(args.value)} in ${args.selector}`)] };
  }
});

export const screenshotTool = defineTool({
  name: "screenshot",
  description: "Capture a PNG screenshot of the current page.",
  countsAsStep: false,
  schema: z.object({
    full_page: z.boolean().default(false)
  }),
  run: async (args, ctx) => {
    const shot = await browserStep(ctx, { type: "screenshot", details: { fullPage: args.full_page } }, async (surface) => ({
      png: await surface.screenshot(args.full_page),
      url: surface.currentUrl()
    }));
    const viewport = ctx.session.viewportSize();
    return {
      content: [textContent(`Screenshot of ${shot.url} (${viewport.width}x${viewport.height} viewport)`), imageContent(shot.png)],
      structured: { url: shot.url, viewport }
    };
  }
});

export const readPageTool = defineTool({
  name: "read_page",
  description: "Return the URL, title and visible text of the current page.",
  countsAsStep: false,
  schema: z.object({
    max_chars: z.number().int().positive().max(200_000).default(20_000)
  }),
  run: async (args, ctx) => {
    const page = await browserStep(ctx, { type: "read_page", details: {} }, async (surface) => ({
      url: surface.currentUrl(),
      title: await surface.title(),
      text: await surface.bodyText()
    }));
    const truncated = page.text.length > args.max_chars;
    const text = truncated ? page.text.slice(0, args.max_chars) : page.text;
    return {
      content: [textContent(`URL: ${page.url}\nTitle: ${page.title}\n\n${text}${truncated ? "\n[truncated]" : ""}`)],
      structured: { url: page.url, title: page.title, truncated }
    };
  }
});

export const resetBrowserTool = defineTool({
  name: "reset_browser",
  description: "Tear down the remote browser session; the next browser step starts a fresh one. Refused while a task is active.",
  countsAsStep: false,
  schema: z.object({}),
  run: async (_args, ctx) => {
    ctx.tasks.assertNoActiveTask("resetting the browser");
    await ctx.session.runExclusive(() => ctx.session.reset());
    return { content: [textContent("Browser session reset.")] };
  }
});

export const BROWSER_TOOLS: RegisteredTool[] = [
  navigateTool,
  clickTool,
  typeTool,
  selectOptionTool,
  screenshotTool,
  readPageTool,
  resetBrowserTool
];
