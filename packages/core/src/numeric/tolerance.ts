import { ToleranceError } from "../errors.js";
import { Duration } from "./duration.js";

export type ToleranceMode = "None" | "Linear" | "Percent" | "Ulps";

export type ToleranceAmount = number | bigint | Duration;

function isZeroAmount(amount: ToleranceAmount): boolean {
  if (amount instanceof Duration) return amount.isZero;
  return typeof amount === "bigint" ? amount === 0n : amount === 0;
}

function validate(amount: ToleranceAmount, mode: ToleranceMode): void {
  if (amount instanceof Duration) {
    if (amount.isNegative) {
      throw new ToleranceError(`Tolerance amount must not be negative, got ${amount}`);
    }
    if (mode === "Percent" || mode === "Ulps") {
      throw new ToleranceError(`${mode} tolerance requires a numeric amount, got a Duration`);
    }
    return;
  }

  if (typeof amount === "number" && !Number.isFinite(amount)) {
    throw new ToleranceError(`Tolerance amount must be finite, got ${amount}`);
  }
  if (amount < 0) {
    throw new ToleranceError(`Tolerance amount must not be negative, got ${amount}`);
  }
  if (mode === "Ulps" && typeof amount === "number" && !Number.isInteger(amount)) {
    throw new ToleranceError(`Ulps tolerance requires an integral amount, got ${amount}`);
  }
}

/**
 * The allowed deviation of a comparison and how to read it: as an absolute
 * amount (Linear), a percentage of the expected value (Percent) or a number
 * of representable doubles (Ulps).
 */
export class Tolerance {
  readonly amount: ToleranceAmount;
  readonly mode: ToleranceMode;

  constructor(amount: ToleranceAmount, mode: ToleranceMode = "Linear") {
    validate(amount, mode);
    this.amount = amount;
    this.mode = mode;
  }

  static readonly none = new Tolerance(0, "None");

  static readonly exact = new Tolerance(0, "Linear");

  get hasVariance(): boolean {
    return this.mode !== "None" && !isZeroAmount(this.amount);
  }

  get linear(): Tolerance {
    return new Tolerance(this.amount, "Linear");
  }

  get percent(): Tolerance {
    return new Tolerance(this.amount, "Percent");
  }

  get ulps(): Tolerance {
    return new Tolerance(this.amount, "Ulps");
  }
}
