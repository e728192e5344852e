import { ConfigProvider, Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { OrderSettings, OrderSettingsLive } from "./orderSettings";

const load = (env: Record<string, string>) =>
  OrderSettings.pipe(
    Effect.provide(OrderSettingsLive),
    Effect.either,
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    Effect.runPromise,
  );

describe("OrderSettingsLive", () => {
  it("falls back to the default prices and host formatting", async () => {
    const settings = Either.getOrThrow(await load({}));
    const host = Intl.DateTimeFormat().resolvedOptions();

    expect(settings).toEqual({
      pricePerUnit: 2,
      sameDaySurcharge: 3,
      locale: host.locale,
      currency: "USD",
      timeZone: host.timeZone,
      strictInput: false,
    });
  });

  it("reads overrides from the environment", async () => {
    const settings = Either.getOrThrow(
      await load({
        ORDER_PRICE_PER_UNIT: "2.5",
        ORDER_SAME_DAY_SURCHARGE: "0",
        ORDER_LOCALE: "de-DE",
        ORDER_CURRENCY: "EUR",
        ORDER_TIME_ZONE: "Europe/Berlin",
        ORDER_STRICT_INPUT: "true",
      }),
    );

    expect(settings).toEqual({
      pricePerUnit: 2.5,
      sameDaySurcharge: 0,
      locale: "de-DE",
      currency: "EUR",
      timeZone: "Europe/Berlin",
      strictInput: true,
    });
  });

  it.each([
    ["a negative unit price", { ORDER_PRICE_PER_UNIT: "-1" }],
    ["a non-numeric surcharge", { ORDER_SAME_DAY_SURCHARGE: "three" }],
    ["a lowercase currency", { ORDER_CURRENCY: "usd" }],
    ["an unknown time zone", { ORDER_TIME_ZONE: "Mars/Olympus_Mons" }],
    ["a malformed locale", { ORDER_LOCALE: "not a locale" }],
  ])("rejects %s", async (_, env) => {
    expect(Either.isLeft(await load(env))).toBe(true);
  });
});
