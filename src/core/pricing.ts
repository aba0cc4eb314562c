/**
 * Pricing Engine
 *
 * Discounts apply one after another against the running total, so 10% then
 * 20% off 10000 gives 9000 then 7200 (2800 off, not 3000). Fulfillment is
 * added after discounts and is never discounted.
 */

import type {
  AppliedDiscount,
  DiscountApplication,
  LineItem,
  PricingResult,
} from "../types/checkout";
import { formatCurrencyDisplay, sumLineItems } from "./currency";

export interface PricingInput {
  lineItems: ReadonlyArray<Pick<LineItem, "price" | "quantity">>;
  discounts: ReadonlyArray<AppliedDiscount>;
  fulfillmentPrice?: number;
  currency: string;
}

export function discountTitle(discount: AppliedDiscount, currency: string): string {
  return discount.type === "percentage"
    ? `${discount.value}% Off`
    : `${formatCurrencyDisplay(discount.value, currency)} Off`;
}

/** Running total after one discount, never below zero. */
export function applyDiscount(running: number, discount: AppliedDiscount): number {
  if (discount.type === "percentage") {
    return Math.max(0, Math.floor((running * (100 - discount.value)) / 100));
  }
  return Math.max(0, running - discount.value);
}

export function recalculate(input: PricingInput): PricingResult {
  const subtotal = sumLineItems(input.lineItems);
  const fulfillmentPrice = Math.max(0, input.fulfillmentPrice ?? 0);

  let running = subtotal;
  const applications: DiscountApplication[] = [];
  for (const discount of input.discounts) {
    const next = applyDiscount(running, discount);
    applications.push({
      ...discount,
      title: discountTitle(discount, input.currency),
      amount: running - next,
    });
    running = next;
  }

  const discountAmount = subtotal - running;
  const total = Math.max(0, Math.max(0, subtotal - discountAmount) + fulfillmentPrice);

  return { subtotal, discountAmount, fulfillmentPrice, total, applications };
}
