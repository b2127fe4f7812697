import { LedgerError } from "./errors";

/** Input accepted anywhere an amount crosses into the ledger. */
export type MoneyInput = Money | string | number;

const SCALE = 2;
const FACTOR = 10n ** BigInt(SCALE);
const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Exact decimal amount stored as a count of minor units (cents).
 * Instances are immutable; every operation returns a new value.
 */
export class Money {
  private constructor(private readonly minor: bigint) {}

  static zero(): Money {
    return new Money(0n);
  }

  static fromMinorUnits(minor: bigint): Money {
    return new Money(minor);
  }

  static parse(value: MoneyInput): Money {
    if (value instanceof Money) {
      return value;
    }
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new LedgerError("INVALID_AMOUNT", "Amount must be a finite number.", { value: String(value) });
    }
    const text = typeof value === "number" ? String(value) : value.trim();
    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount must be a decimal with at most ${SCALE} fraction digits.`,
        { value: text },
      );
    }
    const [, sign, whole, fraction = ""] = match;
    const minor = BigInt(whole) * FACTOR + BigInt(fraction.padEnd(SCALE, "0"));
    return new Money(sign ? -minor : minor);
  }

  get minorUnits(): bigint {
    return this.minor;
  }

  add(other: Money): Money {
    return new Money(this.minor + other.minor);
  }

  subtract(other: Money): Money {
    return new Money(this.minor - other.minor);
  }

  compare(other: Money): -1 | 0 | 1 {
    if (this.minor === other.minor) {
      return 0;
    }
    return this.minor < other.minor ? -1 : 1;
  }

  greaterThan(other: Money): boolean {
    return this.minor > other.minor;
  }

  isZero(): boolean {
    return this.minor === 0n;
  }

  isNegative(): boolean {
    return this.minor < 0n;
  }

  isPositive(): boolean {
    return this.minor > 0n;
  }

  toString(): string {
    const negative = this.minor < 0n;
    const absolute = negative ? -this.minor : this.minor;
    const whole = absolute / FACTOR;
    const fraction = (absolute % FACTOR).toString().padStart(SCALE, "0");
    return `${negative ? "-" : ""}${whole}.${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export function sumMoney(amounts: Iterable<Money>): Money {
  let total = Money.zero();
  for (const amount of amounts) {
    total = total.add(amount);
  }
  return total;
}

/** Parses an amount that must not be negative. */
export function parseNonNegative(value: MoneyInput, label = "Amount"): Money {
  const amount = Money.parse(value);
  if (amount.isNegative()) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be non-negative.`, {
      value: amount.toString(),
    });
  }
  return amount;
}
