/**
 * GPU Race - Entry Point
 *
 * The agent is asked to "Buy ALL GPUs". A rival shopper (SIMULATE_RACE)
 * buys some of them during the first checkout, so the agent has to notice
 * the inventory error, trim its basket and try again.
 *
 * Usage:
 *   npm run example              # Scripted mock model (deterministic)
 *   npm run example:rules        # Rule-based proposer
 *   npm run example:openrouter   # Real model (requires OPENROUTER_API_KEY)
 */

import { EventStore } from '../patterns/08-event-sourced-state.js';
import { ConfigError, loadConfig, loadEnvFiles } from './config.js';
import { createProposer } from './planner/index.js';
import { renderStep } from './render.js';
import { TaskSession } from './session.js';
import { describeStoreTools } from './tools/dispatcher.js';
import type { ResourceStore } from './tools/resource-store.js';

const TASK = 'Buy ALL GPUs';

/** Units the rival buys on our first checkout. */
const RIVAL_PURCHASE = { 'gpu-h100': 2, 'gpu-a100': 1 };

function printInventory(store: ResourceStore): void {
  for (const product of store.products()) {
    const marker = product.category === 'gpu' ? '*' : ' ';
    console.log(
      `${marker} ${product.sku.padEnd(12)} | ${product.name.padEnd(20)} | ` +
        `Available: ${String(store.available(product.sku)).padStart(2)} | ${product.price}`
    );
  }
}

async function main(): Promise<number> {
  loadEnvFiles();
  const config = loadConfig();

  const eventStore = new EventStore(config.eventLogPath);

  console.log('\n' + '='.repeat(60));
  console.log('GPU RACE - BUY ALL GPUS');
  console.log('='.repeat(60));
  if (config.simulateRace) {
    console.log('Rival shopper enabled: some GPUs will vanish at the first checkout.');
  }

  const session = new TaskSession({
    proposer: createProposer(config, describeStoreTools()),
    stepBudget: config.stepBudget,
    storeOptions: config.simulateRace ? { rivalPurchase: RIVAL_PURCHASE } : {},
    verbose: config.verbose,
    eventStore,
    onStep: (step) => {
      console.log('');
      for (const line of renderStep(step)) console.log(line);
    },
  });

  console.log('\n[Initial Catalog]');
  printInventory(session.store);

  console.log(`\n[Task] ${TASK}`);
  const outcome = await session.run(TASK);

  console.log('\n' + '='.repeat(60));
  console.log(
    outcome.status === 'done'
      ? `Task completed in ${outcome.stepsUsed} steps (${outcome.reason}).`
      : `Step budget (${outcome.stepBudget}) exhausted without completing the task.`
  );
  if (outcome.finalRationale) console.log(outcome.finalRationale);

  console.log('\n[Final Inventory]');
  printInventory(session.store);

  console.log('\n[Final Basket]');
  const basket = Object.entries(session.store.basketContents());
  if (basket.length === 0) {
    console.log('  (empty)');
  } else {
    for (const [sku, quantity] of basket) console.log(`  ${sku}: ${quantity}`);
  }

  console.log('\n[Event Log Summary]');
  console.log(eventStore.getSummary());
  console.log('='.repeat(60));

  return outcome.status === 'done' ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      console.error('Error:', error);
    }
    process.exitCode = 1;
  }
);
