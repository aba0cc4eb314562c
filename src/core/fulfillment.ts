/**
 * Fulfillment Resolver
 *
 * Turns the shipping-rate table into the option menu for one destination
 * country. A country-specific rate replaces the "default" rate of the same
 * service level, and an active free-shipping promotion zeroes the standard
 * level only.
 */

import type { ShippingRate } from "../db/schema";
import type { CheckoutStore } from "../db/store";
import type { FulfillmentOption, FulfillmentType } from "../types/checkout";

export const DEFAULT_COUNTRY = "default";
export const STANDARD_LEVEL = "standard";
export const FREE_SUFFIX = " (Free)";

export type RateSource = Pick<
  CheckoutStore,
  "listShippingRates" | "getShippingRate" | "listActivePromotions"
>;

interface RankedRate {
  rate: ShippingRate;
  /** Listing position of the level's first rate, the tie-breaker for equal prices */
  index: number;
}

export class FulfillmentResolver {
  constructor(private readonly rates: RateSource) {}

  /**
   * Options for a destination country, cheapest first. Equal prices keep
   * rate-listing order. An empty country code yields no options.
   */
  calculateOptions(
    countryCode: string,
    productIds: readonly string[],
    subtotal: number,
    type?: FulfillmentType
  ): FulfillmentOption[] {
    const country = countryCode.trim().toUpperCase();
    if (!country) return [];

    const byLevel = new Map<string, RankedRate>();
    this.rates.listShippingRates(country).forEach((rate, index) => {
      if (type && rate.type !== type) return;
      const current = byLevel.get(rate.serviceLevel);
      const overrides =
        current !== undefined &&
        current.rate.countryCode === DEFAULT_COUNTRY &&
        rate.countryCode !== DEFAULT_COUNTRY;
      if (current === undefined) {
        byLevel.set(rate.serviceLevel, { rate, index });
      } else if (overrides) {
        // the level keeps the listing position it was first seen at
        byLevel.set(rate.serviceLevel, { rate, index: current.index });
      }
    });

    const free = this.qualifiesForFreeShipping(productIds, subtotal);
    return [...byLevel.values()]
      .map(({ rate, index }) => ({ option: toOption(rate, free), index }))
      .sort((a, b) => a.option.price - b.option.price || a.index - b.index)
      .map(({ option }) => option);
  }

  /**
   * A single active rate by id, priced with the free-shipping rule.
   * Used when an option is picked without going through a destination.
   */
  resolveRate(
    rateId: string,
    productIds: readonly string[],
    subtotal: number
  ): FulfillmentOption | undefined {
    const rate = this.rates.getShippingRate(rateId);
    if (!rate || !rate.active) return undefined;
    return toOption(rate, this.qualifiesForFreeShipping(productIds, subtotal));
  }

  /** Threshold form (subtotal ≥ min_subtotal) or item form (any eligible product). */
  qualifiesForFreeShipping(productIds: readonly string[], subtotal: number): boolean {
    return this.rates.listActivePromotions().some((promo) => {
      if (promo.type !== "free_shipping") return false;
      if (promo.minSubtotal !== null && subtotal >= promo.minSubtotal) return true;
      const eligible = promo.eligibleItemIds ?? [];
      return productIds.some((id) => eligible.includes(id));
    });
  }
}

function toOption(rate: ShippingRate, freeShipping: boolean): FulfillmentOption {
  const free = freeShipping && rate.serviceLevel === STANDARD_LEVEL;
  return {
    id: rate.id,
    title: free ? `${rate.title}${FREE_SUFFIX}` : rate.title,
    price: free ? 0 : rate.price,
    type: rate.type,
    serviceLevel: rate.serviceLevel,
  };
}
