import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import { MAX_ALLOWANCE, PrincipalTokenErrorCode } from "@maturity/principal-token";
import { createLogger } from "../apps/replay/src/logger";
import { parseLogLevel } from "../apps/replay/src/config";
import { replayScenario } from "../apps/replay/src/replay";
import { loadScenario, parseScenario } from "../apps/replay/src/scenario";

const SCENARIO_PATH = fileURLToPath(
  new URL("../apps/replay/scenarios/maturity.json", import.meta.url)
);

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

/** Logger that keeps lines in memory. */
function captureLogger(level: "debug" | "info" | "warn" | "error" = "info") {
  const lines: string[] = [];
  return { lines, logger: createLogger(level, (line) => lines.push(line)) };
}

/** Minimal valid scenario, overridable per test. */
function scenario(overrides: Record<string, unknown> = {}) {
  return parseScenario({
    underlying: "sbtc",
    maturity: 10,
    reserve: 1_000,
    holders: [{ account: "h", balance: 500 }],
    steps: [],
    ...overrides,
  });
}

// -----------------------------------------------------------------------

describe("replay", () => {
  // =====================================================================
  // scenario parsing
  // =====================================================================
  describe("parseScenario", () => {
    it("applies defaults and converts amounts to bigint", () => {
      const parsed = scenario({ steps: [{ op: "redeem", amount: "7", from: "h", to: "h" }] });
      expect(parsed.name).toBe("scenario");
      expect(parsed.start).toBe(0);
      expect(parsed.feeBps).toBe(0);
      expect(parsed.reserve).toBe(1_000n);
      expect(parsed.holders).toEqual([{ account: "h", balance: 500n }]);
      expect(parsed.allowances).toEqual([]);
      expect(parsed.steps).toEqual([{ op: "redeem", amount: 7n, from: "h", to: "h", expect: "ok" }]);
    });

    it("reads \"max\" as the unlimited allowance", () => {
      const parsed = scenario({ allowances: [{ owner: "h", spender: "s", amount: "max" }] });
      expect(parsed.allowances[0]?.amount).toBe(MAX_ALLOWANCE);
    });

    it("accepts error codes as expectations", () => {
      const parsed = scenario({
        steps: [{ op: "withdraw", amount: 1, from: "h", to: "h", expect: "BEFORE_MATURITY" }],
      });
      expect(parsed.steps[0]).toMatchObject({ expect: PrincipalTokenErrorCode.BEFORE_MATURITY });
    });

    it("rejects unknown ops, negative amounts and unknown codes", () => {
      expect(() => scenario({ steps: [{ op: "mint", amount: 1 }] })).toThrow(ZodError);
      expect(() => scenario({ reserve: -1 })).toThrow(ZodError);
      expect(() => scenario({ reserve: "1.5" })).toThrow(ZodError);
      expect(() =>
        scenario({ steps: [{ op: "redeem", amount: 1, from: "h", to: "h", expect: "NOPE" }] })
      ).toThrow(ZodError);
    });

    it("rejects amounts above the Clarity uint range", () => {
      const tooBig = (2n ** 128n).toString();
      expect(() =>
        scenario({
          reserve: tooBig,
          holders: [{ account: "h", balance: tooBig }],
          steps: [{ op: "redeem", amount: tooBig, from: "h", to: "h" }],
        })
      ).toThrow(ZodError);
      expect(scenario({ reserve: (2n ** 128n - 1n).toString() }).reserve).toBe(MAX_ALLOWANCE);
    });

    it("rejects a fee of 100%", () => {
      expect(() => scenario({ feeBps: 10_000 })).toThrow(ZodError);
    });
  });

  // =====================================================================
  // replayScenario
  // =====================================================================
  describe("replayScenario", () => {
    it("gates on maturity and records outcomes", () => {
      const { logger } = captureLogger();
      const report = replayScenario(
        scenario({
          start: 5,
          steps: [
            { op: "redeem", amount: 100, from: "h", to: "h", expect: "BEFORE_MATURITY" },
            { op: "advance", blocks: 5 },
            { op: "redeem", amount: 100, from: "h", to: "h" },
          ],
        }),
        logger
      );

      expect(report.outcomes.map((o) => [o.op, o.at, o.ok, o.matched])).toEqual([
        ["redeem", 5, false, true],
        ["advance", 5, true, true],
        ["redeem", 10, true, true],
      ]);
      expect(report.outcomes[0]?.code).toBe(PrincipalTokenErrorCode.BEFORE_MATURITY);
      expect(report.outcomes[2]?.result).toBe(100n);
      expect(report.balances).toEqual({ h: 400n });
      expect(report.received).toEqual({ h: 100n });
      expect(report.reserve).toBe(900n);
      expect(report.totalSupply).toBe(400n);
      expect(report.failures).toEqual([]);
    });

    it("reports steps whose outcome differs from the expectation", () => {
      const { logger, lines } = captureLogger("warn");
      const report = replayScenario(
        scenario({ steps: [{ op: "redeem", amount: 1, from: "h", to: "h" }] }),
        logger
      );
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]).toMatchObject({
        index: 0,
        ok: false,
        code: PrincipalTokenErrorCode.BEFORE_MATURITY,
        expected: "ok",
        matched: false,
      });
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain("WARN  #0 redeem failed: BEFORE_MATURITY");
    });

    it("applies the fee conversion", () => {
      const { logger } = captureLogger();
      const report = replayScenario(
        scenario({
          start: 10,
          feeBps: 30,
          holders: [{ account: "h", balance: 10_000 }],
          reserve: 10_000,
          steps: [{ op: "redeem", amount: 10_000, from: "h", to: "r" }],
        }),
        logger
      );
      expect(report.outcomes[0]?.result).toBe(9_970n);
      expect(report.received.r).toBe(9_970n);
    });

    it("logs each committed redemption", () => {
      const { logger, lines } = captureLogger();
      replayScenario(
        scenario({ start: 10, steps: [{ op: "withdraw", amount: 3, from: "h", to: "r" }] }),
        logger
      );
      expect(lines.filter((l) => l.includes("Redeem —"))).toHaveLength(1);
      expect(lines.some((l) => l.endsWith("Redeem — from: h, to: r, underlying: 3"))).toBe(true);
    });

    it("logs listener failures without failing the step", () => {
      const { logger, lines } = captureLogger("error");
      const report = replayScenario(
        scenario({ start: 10, steps: [{ op: "redeem", amount: 5, from: "h", to: "r" }] }),
        {
          ...logger,
          info: (message: string) => {
            if (message.startsWith("Redeem —")) throw new Error("sink closed");
            logger.info(message);
          },
        }
      );
      expect(report.failures).toEqual([]);
      expect(report.outcomes[0]?.result).toBe(5n);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain("ERROR Redeem listener failed for h → r: Error: sink closed");
    });

    it("replays the bundled scenario without surprises", async () => {
      const { logger } = captureLogger("error");
      const report = replayScenario(await loadScenario(SCENARIO_PATH), logger);

      expect(report.failures).toEqual([]);
      expect(report.balances).toEqual({
        holder: 660n,
        keeper: 0n,
        payee: 0n,
        spender: 0n,
        vault: 0n,
      });
      expect(report.received).toEqual({
        holder: 100n,
        keeper: 0n,
        payee: 50n,
        spender: 0n,
        vault: 200n,
      });
      expect(report.reserve).toBe(1_650n);
      expect(report.totalSupply).toBe(660n);
      expect(report.events.map((e) => e.value.amount.value)).toEqual(["100", "50", "200"]);
    });
  });

  // =====================================================================
  // logger / config
  // =====================================================================
  describe("logger", () => {
    it("filters below the configured level", () => {
      const { logger, lines } = captureLogger("warn");
      logger.debug("d");
      logger.info("i");
      logger.warn("w");
      logger.error("e");
      expect(lines.map((l) => l.slice(l.indexOf("]") + 2))).toEqual(["WARN  w", "ERROR e"]);
    });

    it("parseLogLevel falls back to info", () => {
      expect(parseLogLevel("DEBUG")).toBe("debug");
      expect(parseLogLevel("verbose")).toBe("info");
      expect(parseLogLevel(undefined)).toBe("info");
    });
  });
});
