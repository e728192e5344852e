import { Data } from "effect";

export class InvalidQuantityError extends Data.TaggedError("InvalidQuantityError")<{
  readonly quantity: number;
}> {}

export class UnknownPickupDateError extends Data.TaggedError("UnknownPickupDateError")<{
  readonly date: string;
  readonly pickupOptions: ReadonlyArray<string>;
}> {}

export type OrderInputError = InvalidQuantityError | UnknownPickupDateError;
