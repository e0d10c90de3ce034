import { describe, expect, it } from "vitest";
import { buildRecord } from "../../product/record";
import { makeContext } from "../../__tests__/helpers";
import { normalizeLinkedDataProduct } from "../linked-data";

const ctx = makeContext();

const oatDrink = {
  "@type": "Product",
  sku: "OAT-175",
  gtin13: "0627735000017",
  name: "Oat Drink Original",
  brand: { "@type": "Brand", name: "Oat Co" },
  description: "1.75 L",
  category: "Beverages",
  image: ["https://img.shop.test/oat.jpg", "https://img.shop.test/oat-2.jpg"],
  offers: [
    {
      "@type": "Offer",
      price: "4.29",
      priceCurrency: "USD",
      availability: "https://schema.org/InStock",
      url: "/p/oat-drink-original",
    },
  ],
};

describe("normalizeLinkedDataProduct", () => {
  it("reads a Product node with its first offer", () => {
    expect(normalizeLinkedDataProduct(oatDrink, ctx)).toMatchObject({
      externalId: "OAT-175",
      name: "Oat Drink Original",
      brand: "Oat Co",
      sizeText: "1.75 L",
      price: 4.29,
      currency: "USD",
      imageUrl: "https://img.shop.test/oat.jpg",
      categoryPath: "Beverages",
      availability: "in_stock",
      sourceUrl: "https://shop.test/p/oat-drink-original",
    });
  });

  it("never derives a unit price from the description", () => {
    const record = buildRecord(normalizeLinkedDataProduct(oatDrink, ctx), ctx);
    expect(record.size_text).toBe("1.75 L");
    expect(record.unit_price).toBeNull();
    expect(record.unit_price_uom).toBeNull();
    expect(record.currency).toBe("USD");
  });

  it("leaves the unit price null when the description is marketing copy", () => {
    const record = buildRecord(
      normalizeLinkedDataProduct(
        {
          "@type": "Product",
          sku: "BAR-1",
          name: "Protein Bar",
          description: "Only 2 g of sugar per serving.",
          offers: { price: "6.00" },
        },
        ctx,
      ),
      ctx,
    );
    expect(record.price).toBe(6);
    expect(record.unit_price).toBeNull();
    expect(record.unit_price_uom).toBeNull();
  });

  it("handles single offers, low prices and sparse nodes", () => {
    const fields = normalizeLinkedDataProduct(
      {
        name: "Loose Carrots",
        brand: "Field Co",
        image: { url: "https://img.shop.test/carrot.jpg" },
        offers: { lowPrice: 1.19, availability: "OutOfStock" },
      },
      ctx,
    );

    expect(fields).toMatchObject({
      externalId: null,
      brand: "Field Co",
      price: 1.19,
      currency: null,
      imageUrl: "https://img.shop.test/carrot.jpg",
      availability: "out_of_stock",
      sourceUrl: null,
    });
  });
});
