import { ethers } from "ethers";

/** Moves value to a payee. Rejects when the transfer did not happen. */
export interface PaymentRail {
  transfer(to: string, amount: bigint): Promise<void>;
}

export class TransferRejectedError extends Error {
  constructor(to: string, reason: string) {
    super(`Transfer to ${to} rejected: ${reason}`);
    this.name = "TransferRejectedError";
  }
}

/**
 * Payment rail that credits balances in memory. Recipients can be marked
 * as refusing funds, which is how a payee that cannot receive is modelled.
 */
export class InMemoryPaymentRail implements PaymentRail {
  private readonly balances = new Map<string, bigint>();
  private readonly refusing = new Set<string>();
  private readonly transfers: { to: string; amount: bigint }[] = [];

  /** Only the last `maxHistory` transfers are kept; balances are not affected. */
  constructor(private readonly maxHistory: number = 100) {}

  async transfer(to: string, amount: bigint): Promise<void> {
    const key = normalize(to);
    if (this.refusing.has(key)) {
      throw new TransferRejectedError(to, "recipient refuses funds");
    }
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    this.transfers.push({ to: key, amount });
    if (this.transfers.length > this.maxHistory) {
      this.transfers.splice(0, this.transfers.length - this.maxHistory);
    }
  }

  refuse(address: string): void {
    this.refusing.add(normalize(address));
  }

  accept(address: string): void {
    this.refusing.delete(normalize(address));
  }

  balanceOf(address: string): bigint {
    return this.balances.get(normalize(address)) ?? 0n;
  }

  history(): { to: string; amount: bigint }[] {
    return [...this.transfers];
  }
}

function normalize(address: string): string {
  return ethers.isAddress(address) ? ethers.getAddress(address) : address;
}
