import type { HarnessConfig } from "../../src/config/types";
import type { TaskDefinition } from "../../src/contracts/task";
import type { DriveUploader } from "../../src/domains/google/driveClient";
import { EventStore } from "../../src/domains/observability/eventStore";
import { createRuntime, type RuntimeHandle } from "../../src/runtime/bootstrapRuntime";
import { FakeConnector, FakeProvider, FakeSurface, TEST_PROVIDERS, testConfig } from "./fakes";

export interface TestRuntime {
  runtime: RuntimeHandle;
  surface: FakeSurface;
  provider: FakeProvider;
  connector: FakeConnector;
}

export function buildTestRuntime(
  options: { config?: HarnessConfig; presets?: TaskDefinition[]; drive?: DriveUploader | null } = {}
): TestRuntime {
  const surface = new FakeSurface();
  const connector = new FakeConnector(surface);
  const provider = new FakeProvider();
  const runtime = createRuntime({
    config: options.config ?? testConfig({ defaultTimeoutMs: 1000 }),
    providers: TEST_PROVIDERS,
    connector,
    createProvider: () => provider,
    drive: options.drive ?? null,
    events: new EventStore(null),
    presets: options.presets
  });
  return { runtime, surface, provider, connector };
}

export function textOf(result: { content: Array<{ type: string; text?: string }> }): string[] {
  return result.content.flatMap((item) => (item.type === "text" && item.text !== undefined ? [item.text] : []));
}
