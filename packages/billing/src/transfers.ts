/**
 * @subledger/billing — Value-transfer collaborator.
 *
 * The ledger never holds funds itself. Deposits are pulled into a
 * custody principal and payouts are pushed out of it through an
 * external ValueTransferService, which may decline any call.
 *
 * Multi-leg movements run as a compensated batch: when a leg fails,
 * the legs already executed are reversed, newest first.
 */

import type { Amount, Principal } from "@subledger/types";
import { TransferError } from "./types.js";
import type { TransferLeg } from "./types.js";

/**
 * External value-transfer service.
 *
 * `transfer` pays from the service's own account (custody);
 * `transferFrom` moves funds between two principals.
 * Resolves `false` (or rejects) when declined.
 */
export interface ValueTransferService {
  transfer(to: Principal, amount: Amount): Promise<boolean>;
  transferFrom(from: Principal, to: Principal, amount: Amount): Promise<boolean>;
}

type Outcome = { readonly ok: true } | { readonly ok: false; readonly cause?: unknown };

async function attempt(
  service: ValueTransferService,
  leg: TransferLeg,
): Promise<Outcome> {
  try {
    const ok = leg.kind === "transfer"
      ? await service.transfer(leg.to, leg.amount)
      : await service.transferFrom(leg.from, leg.to, leg.amount);
    return ok ? { ok: true } : { ok: false };
  } catch (cause: unknown) {
    // A rejection counts as a decline; the cause travels on the TransferError.
    return { ok: false, cause };
  }
}

function describeLeg(leg: TransferLeg): string {
  return leg.kind === "transfer"
    ? `transfer ${leg.amount.toString()} to "${leg.to}"`
    : `transferFrom "${leg.from}" to "${leg.to}" of ${leg.amount.toString()}`;
}

/**
 * The leg that undoes `leg`, given the custody principal.
 */
export function reverseLeg(leg: TransferLeg, custody: Principal): TransferLeg {
  if (leg.kind === "transfer") {
    return { kind: "transferFrom", from: leg.to, to: custody, amount: leg.amount };
  }
  return leg.to === custody
    ? { kind: "transfer", to: leg.from, amount: leg.amount }
    : { kind: "transferFrom", from: leg.to, to: leg.from, amount: leg.amount };
}

/**
 * Execute legs in order. Zero-amount legs are skipped.
 *
 * On the first failure, executed legs are reversed newest first and a
 * TransferError is thrown; legs whose reversal also failed are listed
 * in `unreconciled`.
 */
export async function executeTransfers(
  service: ValueTransferService,
  custody: Principal,
  legs: readonly TransferLeg[],
): Promise<void> {
  const executed: TransferLeg[] = [];

  for (const leg of legs) {
    if (leg.amount <= 0n) continue;

    const outcome = await attempt(service, leg);
    if (outcome.ok) {
      executed.push(leg);
      continue;
    }

    const unreconciled: TransferLeg[] = [];
    for (const done of [...executed].reverse()) {
      const reversal = await attempt(service, reverseLeg(done, custody));
      if (!reversal.ok) {
        unreconciled.push(done);
      }
    }

    throw new TransferError(
      `Value transfer declined: ${describeLeg(leg)}`,
      unreconciled,
      outcome.cause === undefined ? undefined : { cause: outcome.cause },
    );
  }
}

// =============================================================================
// In-process implementation
// =============================================================================

export interface TransferRecord {
  readonly from: Principal;
  readonly to: Principal;
  readonly amount: Amount;
}

/**
 * Principal balances kept in memory. `transfer` pays out of `custody`.
 *
 * Declines any movement that would overdraw the payer. Individual
 * principals can be blocked to simulate an unavailable counterparty.
 */
export class InMemoryValueTransferService implements ValueTransferService {
  private readonly _balances: Map<Principal, Amount> = new Map();
  private readonly _blocked: Set<Principal> = new Set();
  private readonly _log: TransferRecord[] = [];

  constructor(readonly custody: Principal) {}

  /** Credit a principal out of thin air (test and demo funding). */
  mint(principal: Principal, amount: Amount): void {
    this._balances.set(principal, this.balanceOf(principal) + amount);
  }

  balanceOf(principal: Principal): Amount {
    return this._balances.get(principal) ?? 0n;
  }

  /** Decline every movement to or from `principal` until unblocked. */
  block(principal: Principal): void {
    this._blocked.add(principal);
  }

  unblock(principal: Principal): void {
    this._blocked.delete(principal);
  }

  history(): readonly TransferRecord[] {
    return [...this._log];
  }

  transfer(to: Principal, amount: Amount): Promise<boolean> {
    return Promise.resolve(this._move(this.custody, to, amount));
  }

  transferFrom(from: Principal, to: Principal, amount: Amount): Promise<boolean> {
    return Promise.resolve(this._move(from, to, amount));
  }

  private _move(from: Principal, to: Principal, amount: Amount): boolean {
    if (amount < 0n || this._blocked.has(from) || this._blocked.has(to)) {
      return false;
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      return false;
    }
    this._balances.set(from, available - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    this._log.push({ from, to, amount });
    return true;
  }
}
