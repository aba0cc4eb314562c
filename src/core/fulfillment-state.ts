/**
 * Fulfillment State Reconciliation
 *
 * Merges a client fulfillment update into the stored methods/destinations/
 * groups. Methods match by id, then by type; fields an update leaves out
 * keep their stored values. A `null` selection clears it.
 */

import type {
  Address,
  FulfillmentDestination,
  FulfillmentGroup,
  FulfillmentMethod,
  FulfillmentState,
  FulfillmentType,
  LineItem,
} from "../types/checkout";
import type { CheckoutStore } from "../db/store";
import type { CustomerAddress } from "../db/schema";
import { ValidationError } from "./errors";
import { newShortId } from "./ids";

export const DEFAULT_DESTINATION_COUNTRY = "US";

// ---------------------------------------------------------------------------
// Update shapes
// ---------------------------------------------------------------------------

export interface FulfillmentDestinationInput extends Address {
  id?: string;
}

export interface FulfillmentGroupInput {
  id?: string;
  line_item_ids?: string[];
  selected_option_id?: string | null;
}

export interface FulfillmentMethodInput {
  id?: string;
  type?: FulfillmentType;
  line_item_ids?: string[];
  destinations?: FulfillmentDestinationInput[];
  selected_destination_id?: string | null;
  groups?: FulfillmentGroupInput[];
}

export interface FulfillmentInput {
  methods?: FulfillmentMethodInput[];
}

/** Where destination ids come from: the buyer's saved addresses, or new ones. */
export interface DestinationDirectory {
  known: FulfillmentDestination[];
  register(address: Address): string;
}

export const emptyFulfillment = (): FulfillmentState => ({ methods: [] });

// ---------------------------------------------------------------------------
// Destinations
// ---------------------------------------------------------------------------

function norm(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase();
}

/** Same street, postal code and country, ignoring case. */
export function addressesMatch(a: Address, b: Address): boolean {
  return (
    norm(a.street_address) === norm(b.street_address) &&
    norm(a.postal_code) === norm(b.postal_code) &&
    norm(a.address_country) === norm(b.address_country)
  );
}

function fromStoredAddress(row: CustomerAddress): FulfillmentDestination {
  const dest: FulfillmentDestination = { id: row.id };
  if (row.fullName) dest.full_name = row.fullName;
  if (row.streetAddress) dest.street_address = row.streetAddress;
  if (row.addressLocality) dest.address_locality = row.addressLocality;
  if (row.addressRegion) dest.address_region = row.addressRegion;
  if (row.postalCode) dest.postal_code = row.postalCode;
  dest.address_country = row.addressCountry ?? DEFAULT_DESTINATION_COUNTRY;
  return dest;
}

/**
 * Directory backed by the customer tables. New addresses are saved for the
 * buyer when their email is known, creating the customer on first use.
 */
export function createDestinationDirectory(
  store: CheckoutStore,
  buyerEmail: string | undefined
): DestinationDirectory {
  const customer = buyerEmail ? store.findCustomerByEmail(buyerEmail) : undefined;
  const known = customer ? store.listCustomerAddresses(customer.id).map(fromStoredAddress) : [];
  let customerId = customer?.id;

  return {
    known,
    register(address) {
      const match = known.find((k) => addressesMatch(k, address));
      if (match) return match.id;

      const id = newShortId("dest");
      if (buyerEmail) {
        customerId ??= store.createCustomer(buyerEmail).id;
        store.insertCustomerAddress(customerId, { ...address, id });
        known.push({ ...address, id });
      }
      return id;
    },
  };
}

function toDestination(
  input: FulfillmentDestinationInput,
  directory: DestinationDirectory
): FulfillmentDestination {
  const { id, ...address } = input;
  return { ...address, id: id ?? directory.register(address) };
}

// ---------------------------------------------------------------------------
// Reconciliation
// ---------------------------------------------------------------------------

function reconcileGroups(
  methodIndex: number,
  existing: FulfillmentGroup[],
  incoming: FulfillmentGroupInput[]
): FulfillmentGroup[] {
  return incoming.map((input, j) => {
    const id = input.id ?? existing[j]?.id ?? `group_${methodIndex}_${j}`;
    const previous = existing.find((g) => g.id === id);
    const group: FulfillmentGroup = { id };

    const lineItemIds = input.line_item_ids ?? previous?.line_item_ids;
    if (lineItemIds) group.line_item_ids = lineItemIds;

    if (input.selected_option_id === undefined) {
      if (previous?.selected_option_id) {
        group.selected_option_id = previous.selected_option_id;
        group.selected_option_title = previous.selected_option_title;
      }
    } else if (input.selected_option_id !== null) {
      group.selected_option_id = input.selected_option_id;
    }
    return group;
  });
}

function findMethodIndex(methods: FulfillmentMethod[], input: FulfillmentMethodInput): number {
  if (input.id) {
    const byId = methods.findIndex((m) => m.id === input.id);
    if (byId >= 0) return byId;
  }
  return input.type ? methods.findIndex((m) => m.type === input.type) : -1;
}

export function reconcileFulfillment(
  current: FulfillmentState,
  input: FulfillmentInput,
  directory: DestinationDirectory
): FulfillmentState {
  const methods = current.methods.map((m) => ({ ...m }));
  const incoming = input.methods ?? [];

  for (const methodInput of incoming) {
    const index = findMethodIndex(methods, methodInput);
    const existing = index >= 0 ? methods[index] : undefined;
    const position = index >= 0 ? index : methods.length;
    const type = methodInput.type ?? existing?.type ?? "shipping";

    const merged: FulfillmentMethod = {
      id: methodInput.id ?? existing?.id ?? `${type}_method_${position}`,
      type,
      destinations: methodInput.destinations
        ? methodInput.destinations.map((d) => toDestination(d, directory))
        : existing?.destinations ?? [],
      groups: methodInput.groups
        ? reconcileGroups(position, existing?.groups ?? [], methodInput.groups)
        : existing?.groups ?? [],
    };

    const lineItemIds = methodInput.line_item_ids ?? existing?.line_item_ids;
    if (lineItemIds) merged.line_item_ids = lineItemIds;

    const selected =
      methodInput.selected_destination_id === undefined
        ? existing?.selected_destination_id
        : methodInput.selected_destination_id ?? undefined;
    if (selected) merged.selected_destination_id = selected;

    if (existing) methods[index] = merged;
    else methods.push(merged);
  }

  const clientSentDestinations = incoming.some((m) => (m.destinations?.length ?? 0) > 0);
  if (!clientSentDestinations && directory.known.length > 0) {
    for (const method of methods) {
      if (method.type !== "shipping") continue;
      const present = new Set(method.destinations.map((d) => d.id));
      const added = directory.known.filter((k) => !present.has(k.id));
      if (added.length > 0) method.destinations = [...method.destinations, ...added];
    }
  }

  methods.forEach((method, i) => {
    if (
      method.selected_destination_id &&
      !method.destinations.some((d) => d.id === method.selected_destination_id)
    ) {
      throw new ValidationError(
        `Unknown destination ${method.selected_destination_id}`,
        `$.fulfillment.methods[${i}].selected_destination_id`
      );
    }
  });

  return { methods };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function selectedDestination(method: FulfillmentMethod): FulfillmentDestination | undefined {
  if (!method.selected_destination_id) return undefined;
  return method.destinations.find((d) => d.id === method.selected_destination_id);
}

export function hasSelectedDestination(state: FulfillmentState): boolean {
  return state.methods.some((m) => selectedDestination(m) !== undefined);
}

export function hasSelectedOption(state: FulfillmentState): boolean {
  return state.methods.some((m) => m.groups.some((g) => Boolean(g.selected_option_id)));
}

export function destinationCountry(dest: Address): string {
  return dest.address_country || DEFAULT_DESTINATION_COUNTRY;
}

/** Line items a method covers; all current items when it names none. */
export function methodLineItemIds(method: FulfillmentMethod, lineItems: readonly LineItem[]): string[] {
  const current = lineItems.map((li) => li.id);
  if (!method.line_item_ids) return current;
  return method.line_item_ids.filter((id) => current.includes(id));
}

export function groupLineItemIds(
  group: FulfillmentGroup,
  method: FulfillmentMethod,
  lineItems: readonly LineItem[]
): string[] {
  const covered = methodLineItemIds(method, lineItems);
  if (!group.line_item_ids) return covered;
  return group.line_item_ids.filter((id) => covered.includes(id));
}
