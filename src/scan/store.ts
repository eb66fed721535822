import fs from "node:fs";
import path from "node:path";
import type { CommitteeDecision } from "../committee/types.js";
import { resolveStateDir } from "../config/paths.js";
import { VERSION } from "../version.js";

export type StoredCommitteeDecision = CommitteeDecision & {
  runId: string;
  evaluatedAt: string;
  provenance: { runId: string; agent: string; version: string };
};

export const COMMITTEE_DECISIONS_PATH = path.join("committee", "decisions.ndjson");

export function resolveCommitteeDecisionsPath(): string {
  return path.join(resolveStateDir(), COMMITTEE_DECISIONS_PATH);
}

async function ensureDir(filePath: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
}

export function toStoredDecision(params: {
  decision: CommitteeDecision;
  runId: string;
  evaluatedAt: string;
}): StoredCommitteeDecision {
  return {
    ...params.decision,
    runId: params.runId,
    evaluatedAt: params.evaluatedAt,
    provenance: { runId: params.runId, agent: "committee_scan", version: VERSION },
  };
}

export async function appendCommitteeDecisions(
  decisions: StoredCommitteeDecision[],
): Promise<void> {
  if (decisions.length === 0) {
    return;
  }
  const filePath = resolveCommitteeDecisionsPath();
  await ensureDir(filePath);
  const lines = decisions.map((entry) => JSON.stringify(entry)).join("\n");
  await fs.promises.appendFile(filePath, `${lines}\n`, "utf8");
}
