/**
 * Catalog Seeding
 *
 * Loads products, stock, discounts, shipping rates, promotions and known
 * customers. Seeds are validated with zod so JSON fixtures can be fed in
 * directly.
 */

import { z } from "zod";
import type { ShopDatabase } from "./index";
import {
  products,
  inventory,
  discounts,
  shippingRates,
  promotions,
  customers,
  customerAddresses,
} from "./schema";
import { newShortId } from "../core/ids";
import type { Logger } from "../core/logger";
import demoCatalog from "./demo-catalog.json";

const addressSchema = z.object({
  id: z.string().optional(),
  full_name: z.string().optional(),
  street_address: z.string().optional(),
  address_locality: z.string().optional(),
  address_region: z.string().optional(),
  postal_code: z.string().optional(),
  address_country: z.string().optional(),
});

export const catalogSeedSchema = z.object({
  products: z
    .array(
      z.object({
        id: z.string().min(1),
        title: z.string().min(1),
        description: z.string().optional(),
        category: z.string().optional(),
        price: z.number().int().nonnegative(),
        currency: z.string().length(3).default("USD"),
        image_url: z.string().optional(),
        sku: z.string().optional(),
        stock: z.number().int().nonnegative().default(0),
      })
    )
    .default([]),
  discounts: z
    .array(
      z.object({
        code: z.string().min(1),
        type: z.enum(["percentage", "fixed"]),
        value: z.number().int().nonnegative(),
        description: z.string().optional(),
        active: z.boolean().default(true),
      })
    )
    .default([]),
  shipping_rates: z
    .array(
      z.object({
        id: z.string().min(1),
        title: z.string().min(1),
        type: z.enum(["shipping", "pickup"]).default("shipping"),
        price: z.number().int().nonnegative(),
        country_code: z.string().default("default"),
        service_level: z.string().default("standard"),
        delivery_days_min: z.number().int().optional(),
        delivery_days_max: z.number().int().optional(),
        active: z.boolean().default(true),
      })
    )
    .default([]),
  promotions: z
    .array(
      z.object({
        id: z.string().min(1),
        type: z.literal("free_shipping"),
        min_subtotal: z.number().int().nonnegative().optional(),
        eligible_item_ids: z.array(z.string()).optional(),
        description: z.string().optional(),
        active: z.boolean().default(true),
      })
    )
    .default([]),
  customers: z
    .array(
      z.object({
        id: z.string().optional(),
        email: z.string().email(),
        full_name: z.string().optional(),
        addresses: z.array(addressSchema).default([]),
      })
    )
    .default([]),
});

export type CatalogSeed = z.input<typeof catalogSeedSchema>;

export function seedCatalog(db: ShopDatabase, seed: CatalogSeed, logger?: Logger): void {
  const data = catalogSeedSchema.parse(seed);

  db.transaction((tx) => {
    for (const p of data.products) {
      tx.insert(products)
        .values({
          id: p.id,
          title: p.title,
          description: p.description,
          category: p.category,
          price: p.price,
          currency: p.currency.toUpperCase(),
          imageUrl: p.image_url,
          sku: p.sku,
        })
        .run();
      tx.insert(inventory).values({ productId: p.id, quantity: p.stock }).run();
    }

    for (const d of data.discounts) {
      tx.insert(discounts).values(d).run();
    }

    for (const r of data.shipping_rates) {
      tx.insert(shippingRates)
        .values({
          id: r.id,
          title: r.title,
          type: r.type,
          price: r.price,
          countryCode: r.country_code,
          serviceLevel: r.service_level,
          deliveryDaysMin: r.delivery_days_min,
          deliveryDaysMax: r.delivery_days_max,
          active: r.active,
        })
        .run();
    }

    for (const promo of data.promotions) {
      tx.insert(promotions)
        .values({
          id: promo.id,
          type: promo.type,
          minSubtotal: promo.min_subtotal,
          eligibleItemIds: promo.eligible_item_ids,
          description: promo.description,
          active: promo.active,
        })
        .run();
    }

    for (const c of data.customers) {
      const customerId = c.id ?? newShortId("cust");
      tx.insert(customers).values({ id: customerId, email: c.email, fullName: c.full_name }).run();
      for (const a of c.addresses) {
        tx.insert(customerAddresses)
          .values({
            id: a.id ?? newShortId("addr"),
            customerId,
            fullName: a.full_name,
            streetAddress: a.street_address,
            addressLocality: a.address_locality,
            addressRegion: a.address_region,
            postalCode: a.postal_code,
            addressCountry: a.address_country,
          })
          .run();
      }
    }
  });

  logger?.info("catalog_seeded", {
    products: data.products.length,
    discounts: data.discounts.length,
    shipping_rates: data.shipping_rates.length,
    promotions: data.promotions.length,
    customers: data.customers.length,
  });
}

/** Small demo catalog for local runs. */
export function seedDemoCatalog(db: ShopDatabase, logger?: Logger): void {
  seedCatalog(db, catalogSeedSchema.parse(demoCatalog), logger);
}
