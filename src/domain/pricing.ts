import type { OrderSettingsValues } from "../config/orderSettings";

export type PriceSettings = Pick<
  OrderSettingsValues,
  "pricePerUnit" | "sameDaySurcharge" | "locale" | "currency"
>;

export const formatPrice = (
  amount: number,
  settings: Pick<OrderSettingsValues, "locale" | "currency">,
): string =>
  new Intl.NumberFormat(settings.locale, {
    style: "currency",
    currency: settings.currency,
  }).format(amount);

/**
 * Total for `quantity` units, plus the same-day surcharge when `date` is the
 * first pickup option.
 */
export const calculatePrice = (
  quantity: number,
  date: string,
  pickupOptions: ReadonlyArray<string>,
  settings: PriceSettings,
): string => {
  let total = quantity * settings.pricePerUnit;
  if (pickupOptions[0] === date) {
    total += settings.sameDaySurcharge;
  }
  return formatPrice(total, settings);
};
