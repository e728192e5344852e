// src/types/orderTypes.ts
export type Order = {
  readonly quantity: number;
  readonly flavor: string;
  readonly date: string;
  readonly price: string;
  readonly pickupOptions: ReadonlyArray<string>;
};

export type OrderMessage =
  | { _tag: "SetQuantity"; quantity: number }
  | { _tag: "SetFlavor"; flavor: string }
  | { _tag: "SetDate"; date: string };
