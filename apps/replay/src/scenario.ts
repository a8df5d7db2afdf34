/**
 * scenario.ts
 *
 * JSON scenario format for the replay CLI. Amounts may be written as
 * integers or decimal strings; allowances also accept "max".
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { MAX_ALLOWANCE, MAX_AMOUNT, PrincipalTokenErrorCode } from "@maturity/principal-token";

const amount = z
  .union([z.string().regex(/^\d+$/, "expected a decimal integer"), z.number().int().nonnegative()])
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_AMOUNT, "exceeds the Clarity uint range");

const allowanceAmount = z.union([z.literal("max").transform(() => MAX_ALLOWANCE), amount]);

const account = z.string().min(1);

const expectation = z
  .union([z.literal("ok"), z.nativeEnum(PrincipalTokenErrorCode)])
  .default("ok");

const redeemStep = z.object({
  op: z.literal("redeem"),
  amount,
  from: account,
  to: account,
  sender: account.optional(),
  expect: expectation,
});

const withdrawStep = z.object({
  op: z.literal("withdraw"),
  amount,
  from: account,
  to: account,
  sender: account.optional(),
  expect: expectation,
});

const approveStep = z.object({
  op: z.literal("approve"),
  owner: account,
  spender: account,
  amount: allowanceAmount,
  expect: expectation,
});

const transferStep = z.object({
  op: z.literal("transfer"),
  from: account,
  to: account,
  amount,
  expect: expectation,
});

const advanceStep = z.object({
  op: z.literal("advance"),
  blocks: z.number().int().positive(),
});

const step = z.discriminatedUnion("op", [
  redeemStep,
  withdrawStep,
  approveStep,
  transferStep,
  advanceStep,
]);

export const scenarioSchema = z.object({
  name: z.string().default("scenario"),
  underlying: z.string().min(1),
  maturity: z.number().int().nonnegative(),
  start: z.number().int().nonnegative().default(0),
  feeBps: z.number().int().min(0).max(9_999).default(0),
  reserve: amount,
  holders: z.array(z.object({ account, balance: amount })).default([]),
  allowances: z
    .array(z.object({ owner: account, spender: account, amount: allowanceAmount }))
    .default([]),
  steps: z.array(step),
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type Step = Scenario["steps"][number];
export type Expectation = z.infer<typeof expectation>;

export function parseScenario(input: unknown): Scenario {
  return scenarioSchema.parse(input);
}

export async function loadScenario(path: string): Promise<Scenario> {
  const raw = await readFile(path, "utf8");
  return parseScenario(JSON.parse(raw));
}
