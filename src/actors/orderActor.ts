import { Clock, Effect, Stream } from "effect";
import { OrderSettings, type OrderSettingsValues } from "../config/orderSettings";
import {
  InvalidQuantityError,
  UnknownPickupDateError,
  type OrderInputError,
} from "../domain/errors";
import { pickupOptions } from "../domain/pickupOptions";
import { calculatePrice } from "../domain/pricing";
import type { Order, OrderMessage } from "../types/orderTypes";
import { createStateActor } from "./stateActor";

export interface OrderState {
  setQuantity: (quantity: number) => Effect.Effect<Order, OrderInputError>;
  setFlavor: (flavor: string) => Effect.Effect<Order>;
  setDate: (date: string) => Effect.Effect<Order, OrderInputError>;
  resetOrder: () => Effect.Effect<Order>;
  currentState: () => Effect.Effect<Order>;
  changes: Stream.Stream<Order>;
}

const priced = (order: Omit<Order, "price">, settings: OrderSettingsValues): Order => ({
  ...order,
  price: calculatePrice(order.quantity, order.date, order.pickupOptions, settings),
});

/** A blank order with pickup options starting at the clock's current day. */
export const initialOrder = (settings: OrderSettingsValues): Effect.Effect<Order> =>
  Effect.map(Clock.currentTimeMillis, (now) =>
    priced({ quantity: 0, flavor: "", date: "", pickupOptions: pickupOptions(now, settings) }, settings),
  );

export const orderHandler =
  (settings: OrderSettingsValues) =>
  (state: Order, message: OrderMessage): Effect.Effect<Order, OrderInputError> => {
    switch (message._tag) {
      case "SetQuantity": {
        const { quantity } = message;
        if (settings.strictInput && !(Number.isInteger(quantity) && quantity >= 0)) {
          return Effect.fail(new InvalidQuantityError({ quantity }));
        }
        return Effect.succeed(priced({ ...state, quantity }, settings));
      }

      case "SetFlavor":
        return Effect.succeed({ ...state, flavor: message.flavor });

      case "SetDate": {
        const { date } = message;
        if (settings.strictInput && !state.pickupOptions.includes(date)) {
          return Effect.fail(new UnknownPickupDateError({ date, pickupOptions: state.pickupOptions }));
        }
        return Effect.succeed(priced({ ...state, date }, settings));
      }
    }
  };

export const makeOrderState: Effect.Effect<OrderState, never, OrderSettings> = Effect.gen(
  function* () {
    const settings = yield* OrderSettings;
    const actor = yield* createStateActor("OrderState", initialOrder(settings), orderHandler(settings));

    return {
      setQuantity: (quantity: number) => actor.send({ _tag: "SetQuantity", quantity }),
      // the handler never rejects a flavor
      setFlavor: (flavor: string) => Effect.orDie(actor.send({ _tag: "SetFlavor", flavor })),
      setDate: (date: string) => actor.send({ _tag: "SetDate", date }),
      resetOrder: () => actor.restart(),
      currentState: () => actor.getState(),
      changes: actor.changes,
    };
  },
);
