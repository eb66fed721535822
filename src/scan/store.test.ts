import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { buildUnscorableDecision } from "../committee/aggregator.js";
import { appendRunRecord, buildRunRecord, resolveOpsRunsPath } from "../ops/runs.js";
import {
  appendCommitteeDecisions,
  resolveCommitteeDecisionsPath,
  toStoredDecision,
} from "./store.js";

describe("committee decision store", () => {
  const originalStateDir = process.env.VIRTUAL_COMMITTEE_STATE_DIR;
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
    if (originalStateDir) {
      process.env.VIRTUAL_COMMITTEE_STATE_DIR = originalStateDir;
    } else {
      delete process.env.VIRTUAL_COMMITTEE_STATE_DIR;
    }
  });

  it("appends one line per decision", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "committee-state-"));
    process.env.VIRTUAL_COMMITTEE_STATE_DIR = tempDir;

    const stored = ["AAA", "BBB"].map((id) =>
      toStoredDecision({
        decision: buildUnscorableDecision(id, "No price data"),
        runId: "run-1",
        evaluatedAt: "2024-01-01T00:00:00.000Z",
      }),
    );
    await appendCommitteeDecisions(stored);
    await appendCommitteeDecisions([]);

    const filePath = resolveCommitteeDecisionsPath();
    expect(filePath).toBe(path.join(tempDir, "committee", "decisions.ndjson"));
    const lines = (await fs.promises.readFile(filePath, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    const first: unknown = JSON.parse(lines[0]);
    expect(first).toMatchObject({
      instrumentId: "AAA",
      decision: "SKIP",
      runId: "run-1",
      provenance: { runId: "run-1", agent: "committee_scan" },
    });
  });

  it("records scan runs", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "committee-state-"));
    process.env.VIRTUAL_COMMITTEE_STATE_DIR = tempDir;

    const record = buildRunRecord({
      runId: "run-2",
      job: "committee_scan",
      startedAt: "2024-01-01T00:00:00.000Z",
      finishedAt: "2024-01-01T00:00:01.500Z",
      counts: { scanned: 3 },
    });
    expect(record.durationMs).toBe(1500);
    await appendRunRecord(record);

    const text = await fs.promises.readFile(resolveOpsRunsPath(), "utf8");
    expect(text).toBe(`${JSON.stringify(record)}\n`);
  });

  it("never reports a negative duration", () => {
    const record = buildRunRecord({
      runId: "run-3",
      job: "committee_scan",
      startedAt: "2024-01-01T00:00:05.000Z",
      finishedAt: "2024-01-01T00:00:00.000Z",
    });
    expect(record.durationMs).toBe(0);
  });
});
