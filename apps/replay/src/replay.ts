/**
 * replay.ts
 *
 * Replays a scenario against a fresh principal token:
 *
 *  1. Setup
 *     Mints the listed holder balances, sets allowances and funds the
 *     underlying reserve. The clock starts at `start`.
 *
 *  2. Steps
 *     Runs each step in order. Engine failures are recorded with their
 *     error code and compared with the step's `expect`; any other error
 *     aborts the replay.
 *
 *  3. Report
 *     Final balances, underlying received per account, the remaining
 *     reserve and the Redeem records as Clarity print events.
 */

import type { Account } from "@maturity/types";
import {
  FeeConversion,
  IdentityConversion,
  InMemoryLedger,
  ManualClock,
  PrincipalToken,
  RedeemLog,
  ReserveAssetTransfer,
  isPrincipalTokenError,
  toPrintEvent,
  type PrincipalTokenErrorCode,
} from "@maturity/principal-token";
import type { Logger } from "./logger";
import type { Expectation, Scenario, Step } from "./scenario";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

export interface StepOutcome {
  index: number;
  op: Step["op"];
  /** Clock value when the step ran. */
  at: number;
  ok: boolean;
  /** Underlying released (redeem) or PT burned (withdraw). */
  result?: bigint;
  code?: PrincipalTokenErrorCode;
  expected: Expectation;
  matched: boolean;
}

export interface ReplayReport {
  name: string;
  outcomes: StepOutcome[];
  balances: Record<Account, bigint>;
  received: Record<Account, bigint>;
  reserve: bigint;
  totalSupply: bigint;
  events: ReturnType<typeof toPrintEvent>[];
  failures: StepOutcome[];
}

type LedgerStep = Exclude<Step, { op: "advance" }>;

interface Harness {
  token: PrincipalToken;
  ledger: InMemoryLedger;
  assets: ReserveAssetTransfer;
  clock: ManualClock;
}

// -----------------------------------------------------------------------
// Replay
// -----------------------------------------------------------------------

export function replayScenario(scenario: Scenario, logger: Logger): ReplayReport {
  const harness = setup(scenario, logger);
  const { token, ledger, assets } = harness;

  logger.info(
    `Replaying "${scenario.name}" — underlying: ${token.underlying}, ` +
    `maturity: ${token.maturity}, start: ${scenario.start}, fee: ${scenario.feeBps} bps`
  );

  const unsubscribe = token.events.subscribe((record) => {
    logger.info(`Redeem — from: ${record.from}, to: ${record.to}, underlying: ${record.underlyingAmount}`);
  });

  const outcomes = scenario.steps.map((step, index) => runStep(harness, step, index, logger));
  unsubscribe();

  const accounts = collectAccounts(scenario);
  const failures = outcomes.filter((o) => !o.matched);

  logger.info(
    `Replay finished — ${outcomes.length} steps, ${failures.length} unexpected, ` +
    `${token.records().length} redemptions, reserve left: ${assets.reserve()}`
  );

  return {
    name: scenario.name,
    outcomes,
    balances: Object.fromEntries(accounts.map((a) => [a, ledger.balanceOf(a)] as const)),
    received: Object.fromEntries(accounts.map((a) => [a, assets.received(a)] as const)),
    reserve: assets.reserve(),
    totalSupply: ledger.totalSupply(),
    events: token.records().map(toPrintEvent),
    failures,
  };
}

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

function setup(scenario: Scenario, logger: Logger): Harness {
  const clock = new ManualClock(scenario.start);
  const ledger = new InMemoryLedger();
  const assets = new ReserveAssetTransfer(scenario.reserve);

  for (const { account, balance } of scenario.holders) ledger.mint(account, balance);
  for (const { owner, spender, amount } of scenario.allowances) ledger.approve(owner, spender, amount);

  const token = new PrincipalToken({
    underlying: scenario.underlying,
    maturity: scenario.maturity,
    ledger,
    assets,
    clock,
    events: new RedeemLog({
      onListenerError: (err, record) =>
        logger.error(`Redeem listener failed for ${record.from} → ${record.to}: ${err}`),
    }),
    conversion: scenario.feeBps > 0
      ? new FeeConversion(BigInt(scenario.feeBps))
      : new IdentityConversion(),
  });

  return { token, ledger, assets, clock };
}

function runStep(harness: Harness, step: Step, index: number, logger: Logger): StepOutcome {
  const at = harness.clock.now();

  if (step.op === "advance") {
    harness.clock.mine(step.blocks);
    logger.info(`#${index} advance ${step.blocks} blocks → ${harness.clock.now()}`);
    return { index, op: step.op, at, ok: true, expected: "ok", matched: true };
  }

  try {
    const result = execute(harness, step);
    const matched = step.expect === "ok";
    const log = matched ? logger.info : logger.warn;
    log(`#${index} ${step.op} ok${result === undefined ? "" : ` → ${result}`} (expected ${step.expect})`);
    return { index, op: step.op, at, ok: true, result, expected: step.expect, matched };
  } catch (err) {
    if (!isPrincipalTokenError(err)) throw err;
    const matched = step.expect === err.code;
    const log = matched ? logger.info : logger.warn;
    log(`#${index} ${step.op} failed: ${err.code} — ${err.message} (expected ${step.expect})`);
    return { index, op: step.op, at, ok: false, code: err.code, expected: step.expect, matched };
  }
}

function execute({ token, ledger }: Harness, step: LedgerStep): bigint | undefined {
  switch (step.op) {
    case "redeem":
      return token.redeem(step.amount, step.from, step.to, step.sender ?? step.from);
    case "withdraw":
      return token.withdraw(step.amount, step.from, step.to, step.sender ?? step.from);
    case "approve":
      ledger.approve(step.owner, step.spender, step.amount);
      return undefined;
    case "transfer":
      ledger.transfer(step.from, step.to, step.amount);
      return undefined;
  }
}

/** Every account named by the scenario, sorted. */
function collectAccounts(scenario: Scenario): Account[] {
  const accounts = new Set<Account>();
  for (const { account } of scenario.holders) accounts.add(account);
  for (const { owner, spender } of scenario.allowances) {
    accounts.add(owner);
    accounts.add(spender);
  }
  for (const step of scenario.steps) {
    switch (step.op) {
      case "redeem":
      case "withdraw":
        accounts.add(step.from);
        accounts.add(step.to);
        if (step.sender) accounts.add(step.sender);
        break;
      case "transfer":
        accounts.add(step.from);
        accounts.add(step.to);
        break;
      case "approve":
        accounts.add(step.owner);
        accounts.add(step.spender);
        break;
    }
  }
  return [...accounts].sort();
}
