import { randomUUID } from "crypto";

export type IdPrefix = "checkout" | "order" | "li" | "cust" | "dest" | "addr" | "evt" | "adj";

/** `checkout_1b9d6bcd-...` style identifiers. */
export function newId(prefix: IdPrefix): string {
  return `${prefix}_${randomUUID()}`;
}

/** Short form (`dest_1b9d6bcd`) used for destinations and customers. */
export function newShortId(prefix: IdPrefix): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}
