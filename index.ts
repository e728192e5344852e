import { Config, Console, Effect, Logger, LogLevel } from "effect"
import { makeOrderState } from "./src/actors/orderActor"
import { OrderSettingsLive } from "./src/config/orderSettings"
import type { Order } from "./src/types/orderTypes"

// ============================================================================
// CUPCAKE ORDER WALKTHROUGH
// ============================================================================

const FLAVORS = ["Vanilla", "Chocolate", "Red Velvet", "Salted Caramel", "Coffee"] as const

// Pretty print helpers
const printBox = (title: string, content: string[]) => {
  const width = 60
  const line = "─".repeat(width)
  console.log(`┌${line}┐`)
  console.log(`│ ${title.padEnd(width - 2)} │`)
  console.log(`├${line}┤`)
  content.forEach(c => console.log(`│ ${c.padEnd(width - 2)} │`))
  console.log(`└${line}┘`)
}

const printOrder = (title: string, order: Order) =>
  printBox(title, [
    `Quantity: ${order.quantity}`,
    `Flavor:   ${order.flavor || "(none)"}`,
    `Pickup:   ${order.date || "(none)"}`,
    `Price:    ${order.price}`,
  ])

const program = Effect.gen(function* () {
  printBox("🧁 CUPCAKE ORDER DEMO", [
    "Each step below updates the order and re-derives the price.",
    ""
  ])

  const order = yield* makeOrderState
  const fresh = yield* order.currentState()
  printOrder("NEW ORDER", fresh)
  printBox("PICKUP OPTIONS", fresh.pickupOptions.map((option, i) => `${i + 1}. ${option}`))
  yield* Console.log(`Menu: ${FLAVORS.join(", ")}`)

  printOrder("STEP 1: six cupcakes", yield* order.setQuantity(6))
  printOrder("STEP 2: red velvet", yield* order.setFlavor(FLAVORS[2]))
  printOrder("STEP 3: pick up today (surcharge)", yield* order.setDate(fresh.pickupOptions[0]))
  printOrder("STEP 4: pick up tomorrow instead", yield* order.setDate(fresh.pickupOptions[1]))
  printOrder("STEP 5: cancel and start over", yield* order.resetOrder())

  yield* Effect.logInfo("Walkthrough complete")
})

const main = Effect.gen(function* () {
  const level = yield* Config.logLevel("ORDER_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
  yield* program.pipe(Logger.withMinimumLogLevel(level))
})

// Run it!
Effect.runPromise(main.pipe(Effect.provide(OrderSettingsLive))).catch(console.error)
