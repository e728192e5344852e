import { Effect, Stream, SubscriptionRef } from "effect";

export type ActorMessage<Message> =
  | { _tag: "Message"; payload: Message }
  | { _tag: "Restart" };

export interface StateActor<State, Message, E> {
  send: (message: Message) => Effect.Effect<State, E>;
  restart: () => Effect.Effect<State>;
  getState: () => Effect.Effect<State>;
  /** Current state on subscription, then every applied update in order. */
  changes: Stream.Stream<State>;
}

export const createStateActor = <State, Message, E>(
  name: string,
  initialState: Effect.Effect<State>,
  handler: (state: State, message: Message) => Effect.Effect<State, E>,
): Effect.Effect<StateActor<State, Message, E>> =>
  Effect.gen(function* () {
    const stateRef = yield* SubscriptionRef.make(yield* initialState);
    yield* Effect.logDebug("Actor started").pipe(Effect.annotateLogs("actor", name));

    const next = (msg: ActorMessage<Message>, current: State): Effect.Effect<State, E> => {
      switch (msg._tag) {
        case "Message":
          return handler(current, msg.payload);
        case "Restart":
          return initialState;
      }
    };

    // The ref's permit serializes updates; a failed handler leaves the state untouched.
    function receive(msg: { _tag: "Restart" }): Effect.Effect<State>;
    function receive(msg: ActorMessage<Message>): Effect.Effect<State, E>;
    function receive(msg: ActorMessage<Message>): Effect.Effect<State, E> {
      return Effect.logDebug(msg._tag === "Restart" ? "Restarting to initial state" : "Message received").pipe(
        Effect.zipRight(SubscriptionRef.updateAndGetEffect(stateRef, (current) => next(msg, current))),
        Effect.tapError((error) => Effect.logDebug("Message rejected", error)),
        Effect.annotateLogs("actor", name),
      );
    }

    return {
      send: (message: Message) => receive({ _tag: "Message", payload: message }),
      restart: () => receive({ _tag: "Restart" }),
      getState: () => SubscriptionRef.get(stateRef),
      changes: stateRef.changes,
    };
  });
