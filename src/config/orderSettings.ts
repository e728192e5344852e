import { Config, Context, Effect, Layer } from "effect";

export interface OrderSettingsValues {
  readonly pricePerUnit: number;
  readonly sameDaySurcharge: number;
  readonly locale: string;
  readonly currency: string;
  readonly timeZone: string;
  /** Reject negative quantities and dates that are not pickup options. */
  readonly strictInput: boolean;
}

export class OrderSettings extends Context.Tag("OrderSettings")<
  OrderSettings,
  OrderSettingsValues
>() {}

const host = Intl.DateTimeFormat().resolvedOptions();

const isLocale = (locale: string): boolean => {
  try {
    return Intl.NumberFormat.supportedLocalesOf([locale]).length > 0;
  } catch (e) {
    // malformed tags throw instead of returning an empty list
    if (e instanceof RangeError) return false;
    throw e;
  }
};

const isTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (e) {
    if (e instanceof RangeError) return false;
    throw e;
  }
};

const amount = (name: string, fallback: number) =>
  Config.number(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: "Expected a finite, non-negative amount",
      validation: (value: number) => Number.isFinite(value) && value >= 0,
    }),
  );

export const orderSettingsConfig: Config.Config<OrderSettingsValues> = Config.all({
  pricePerUnit: amount("ORDER_PRICE_PER_UNIT", 2),
  sameDaySurcharge: amount("ORDER_SAME_DAY_SURCHARGE", 3),
  locale: Config.string("ORDER_LOCALE").pipe(
    Config.withDefault(host.locale),
    Config.validate({ message: "Unsupported locale", validation: isLocale }),
  ),
  currency: Config.string("ORDER_CURRENCY").pipe(
    Config.withDefault("USD"),
    Config.validate({
      message: "Expected an ISO 4217 currency code",
      validation: (code: string) => /^[A-Z]{3}$/.test(code),
    }),
  ),
  timeZone: Config.string("ORDER_TIME_ZONE").pipe(
    Config.withDefault(host.timeZone),
    Config.validate({ message: "Unknown time zone", validation: isTimeZone }),
  ),
  strictInput: Config.boolean("ORDER_STRICT_INPUT").pipe(Config.withDefault(false)),
});

export const OrderSettingsLive = Layer.effect(
  OrderSettings,
  Effect.gen(function* () {
    const settings = yield* orderSettingsConfig;
    yield* Effect.logDebug("Order settings loaded").pipe(
      Effect.annotateLogs({
        locale: settings.locale,
        currency: settings.currency,
        timeZone: settings.timeZone,
      }),
    );
    return settings;
  }),
);
