import test from "node:test";
import assert from "node:assert/strict";
import { createLogger } from "../../src/logger.ts";
import { startServer } from "../../src/server.ts";
import { makeWorkTracker } from "../../src/tracker/service.ts";
import { WorkStateStore } from "../../src/tracker/store.ts";
import { FakeClockifyClient } from "../support/fakeClockify.ts";
import { AUTH_KEY, testServerConfig } from "../support/harness.ts";

function deps(lines: string[]) {
  const logger = createLogger("http", {
    stdout: (line) => {
      lines.push(line);
    },
    stderr: (line) => {
      lines.push(line);
    },
  });
  const tracker = makeWorkTracker({
    client: new FakeClockifyClient(),
    store: new WorkStateStore(),
    tags: new Map(),
    logger,
  });
  return { logger, tracker, authKey: AUTH_KEY, onFatal: () => undefined };
}

test("listen override wins over the configured address", async () => {
  const lines: string[] = [];
  const running = await startServer({
    ...deps(lines),
    server: { ...testServerConfig, host: "0.0.0.0", port: 1 },
    listen: { host: "127.0.0.1", port: 0 },
  });
  try {
    assert.ok(running.port > 0);
    assert.equal(running.address, `127.0.0.1:${running.port}`);
    assert.deepEqual(lines, [
      `[tracker][http] Server is ready to handle requests at 127.0.0.1:${running.port}\n`,
    ]);
  } finally {
    await running.close();
  }
});

test("close marks unhealthy, stops listening and is idempotent", async () => {
  const running = await startServer({ ...deps([]), server: testServerConfig });
  assert.equal(running.health.isHealthy(), true);

  const first = running.close();
  const second = running.close();

  assert.equal(first, second);
  assert.equal(running.health.isHealthy(), false);
  await first;
  assert.equal(running.server.listening, false);
});

test("a taken port rejects startup", async () => {
  const first = await startServer({ ...deps([]), server: testServerConfig });
  try {
    await assert.rejects(
      startServer({
        ...deps([]),
        server: { ...testServerConfig, port: first.port },
      }),
      /EADDRINUSE/
    );
  } finally {
    await first.close();
  }
});
