import express from "express";
import type { Server } from "node:http";
import type { BrowserSession } from "../browser-automation/browserSession";
import type { EventStore, HarnessEvent } from "../observability/eventStore";
import type { TaskManager } from "../tasks/taskManager";
import { errorMessage, reasonCodeOf } from "../../shared/errors";
import { createLogger } from "../../shared/log";

const log = createLogger("state-server");

export interface StateServerDeps {
  session: BrowserSession;
  tasks: TaskManager;
  events: EventStore;
}

export function createStateApp(deps: StateServerDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, status: deps.session.telemetry().status });
  });

  app.get("/state", (_req, res) => {
    res.json(deps.session.summary());
  });

  app.get("/telemetry", (_req, res) => {
    res.json(deps.session.telemetry());
  });

  app.get("/cdp_url", (_req, res) => {
    const cdpUrl = deps.session.telemetry().cdpUrl;
    if (cdpUrl === null) {
      res.status(404).json({ error: "NO_SESSION", message: "No remote browser is running." });
      return;
    }
    res.json({ cdpUrl });
  });

  app.get("/task", (_req, res) => {
    res.json({ task: deps.tasks.current() });
  });

  app.get("/events", (req, res) => {
    res.json({ events: deps.events.listRecent(limitParam(req.query.limit, 200)) });
  });

  app.get("/failures", (req, res) => {
    res.json({
      failures: deps.events.listFailures(limitParam(req.query.limit, 200)),
      reasonCodeHeatmap: deps.events.failureHeatmap(),
      failureTrend: deps.events.failureTrend()
    });
  });

  app.post("/reset", async (_req, res) => {
    try {
      deps.tasks.assertNoActiveTask("resetting the browser");
    } catch (error) {
      res.status(409).json({ error: reasonCodeOf(error, "RESET_REFUSED"), message: errorMessage(error) });
      return;
    }
    try {
      await deps.session.runExclusive(() => deps.session.reset());
      res.json({ ok: true, state: deps.session.summary() });
    } catch (error) {
      res.status(500).json({ error: "RESET_FAILED", message: errorMessage(error) });
    }
  });

  app.get("/stream/events", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const listener = (event: HarnessEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };
    const unsubscribe = deps.events.onEvent(listener);

    req.on("close", () => {
      unsubscribe();
      res.end();
    });
  });

  return app;
}

export async function startHttpServer(input: StateServerDeps & { host: string; port: number }): Promise<Server> {
  const app = createStateApp(input);
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(input.port, input.host, () => resolve(listening));
    listening.once("error", reject);
  });
  log.info(`state server listening on http://${input.host}:${input.port}`);
  return server;
}

function limitParam(value: unknown, fallback: number): number {
  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}
