import { describe, expect, it } from "vitest";
import { calculatePrice, formatPrice, type PriceSettings } from "./pricing";

const settings: PriceSettings = {
  pricePerUnit: 2,
  sameDaySurcharge: 3,
  locale: "en-US",
  currency: "USD",
};

const options = ["Mon Oct 19", "Tue Oct 20", "Wed Oct 21", "Thu Oct 22"];

describe("calculatePrice", () => {
  it("adds the surcharge for the first pickup option", () => {
    expect(calculatePrice(5, "Mon Oct 19", options, settings)).toBe("$13.00");
  });

  it("charges only the units for later options", () => {
    expect(calculatePrice(5, "Tue Oct 20", options, settings)).toBe("$10.00");
    expect(calculatePrice(5, "Thu Oct 22", options, settings)).toBe("$10.00");
  });

  it("prices an empty order at zero", () => {
    expect(calculatePrice(0, "", options, settings)).toBe("$0.00");
  });

  it("charges the surcharge even with no units", () => {
    expect(calculatePrice(0, "Mon Oct 19", options, settings)).toBe("$3.00");
  });

  it("scales linearly with quantity", () => {
    for (let quantity = 0; quantity <= 12; quantity++) {
      expect(calculatePrice(quantity, "Wed Oct 21", options, settings)).toBe(
        `$${(quantity * 2).toFixed(2)}`,
      );
    }
  });

  it("uses the configured unit price and surcharge", () => {
    const custom = { ...settings, pricePerUnit: 2.5, sameDaySurcharge: 1 };
    expect(calculatePrice(3, "Tue Oct 20", options, custom)).toBe("$7.50");
    expect(calculatePrice(3, "Mon Oct 19", options, custom)).toBe("$8.50");
  });
});

describe("formatPrice", () => {
  it("formats with the configured locale and currency", () => {
    expect(formatPrice(13, { locale: "de-DE", currency: "EUR" })).toBe("13,00\u00a0€");
  });

  it("keeps the sign of negative totals", () => {
    expect(formatPrice(-4, { locale: "en-US", currency: "USD" })).toBe("-$4.00");
  });
});
