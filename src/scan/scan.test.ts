import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import { resolveCommitteeConfig } from "../config/config.js";
import { formatScanLine, loadScanInput, parseScanInput, scanInstruments } from "./scan.js";

const fixturePath = fileURLToPath(new URL("./fixtures/scan-input.json", import.meta.url));

describe("scanInstruments", () => {
  it("ranks decisions by score and buckets them", async () => {
    const input = await loadScanInput(fixturePath);
    const result = scanInstruments({ ...input, config: resolveCommitteeConfig() });

    expect(result.ranked.map((entry) => entry.decision.instrumentId)).toEqual(["BRK", "FLAT", "GONE"]);
    expect(result.ranked.map((entry) => entry.decision.decision)).toEqual(["BUY", "REJECT", "SKIP"]);
    expect(result.buys.map((entry) => entry.decision.instrumentId)).toEqual(["BRK"]);
    expect(result.watchlist).toEqual([]);
    expect(result.counts).toEqual({
      scanned: 3,
      buys: 1,
      watchlist: 0,
      rejected: 1,
      skipped: 1,
      excluded: 0,
    });
    expect(formatScanLine(result.ranked[0])).toBe("BRK decision=BUY score=100 rr=4");
  });

  it("excludes instruments outside the screening rules before scoring", async () => {
    const input = await loadScanInput(fixturePath);
    const result = scanInstruments({
      ...input,
      config: resolveCommitteeConfig({ screening: { enabled: true } }),
    });

    const flat = result.ranked.find((entry) => entry.decision.instrumentId === "FLAT");
    expect(flat?.exclusionReason).toBe("Beta too low (1.20 < 1.5)");
    expect(flat?.decision.decision).toBe("SKIP");
    expect(flat?.decision.finalScore).toBe(0);
    expect(result.ranked.map((entry) => entry.decision.instrumentId)).toEqual(["BRK", "FLAT", "GONE"]);
    expect(result.counts).toMatchObject({ rejected: 0, skipped: 1, excluded: 1 });
    expect(formatScanLine(result.ranked[1])).toBe(
      'FLAT decision=SKIP score=0 rr=0 excluded="Beta too low (1.20 < 1.5)"',
    );
  });

  it("limits the buy list to the configured size", () => {
    const strong = {
      price: 103,
      high20d: 100,
      volume: 2_000_000,
      avgVolume20d: 1_000_000,
      atr14: 3.09,
      ema20: 100,
      ema50: 95,
      ema200: 90,
      price10dAgo: 95,
    };
    const instruments = ["aaa", "bbb", "ccc"].map((id) => ({
      id,
      ticker: strong,
      catalyst: { type: "earnings", daysToEvent: 5, expectations: "low" },
      entry: 103,
      stop: 97,
      target: 127,
    }));
    const result = scanInstruments({
      market: { vix: 15 },
      instruments,
      config: resolveCommitteeConfig({ scan: { maxBuys: 2 } }),
    });
    expect(result.counts.buys).toBe(3);
    expect(result.buys.map((entry) => entry.decision.instrumentId)).toEqual(["AAA", "BBB"]);
  });
});

describe("parseScanInput", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("rejects instruments without a price", () => {
    expect(() =>
      parseScanInput({ market: {}, instruments: [{ id: "x", ticker: { beta: 2 } }] }),
    ).toThrow(/instruments\.0\.ticker\.price/);
  });

  it("rejects unknown ticker fields", () => {
    expect(() =>
      parseScanInput({ market: {}, instruments: [{ id: "x", ticker: { price: 2, rsi: 70 } }] }),
    ).toThrow(/invalid scan input/);
  });

  it("reports unparseable files", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "committee-scan-"));
    const filePath = path.join(tempDir, "input.json");
    await fs.promises.writeFile(filePath, "{ not json", "utf8");
    await expect(loadScanInput(filePath)).rejects.toThrow(/failed to parse/);
  });
});
