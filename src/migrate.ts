import { config } from "./shared/config.js";
import { contracts } from "./shared/contracts.js";
import { createPool } from "./shared/db.js";
import { ensureTable } from "./pipeline/load.js";
import { createPgStore } from "./store/pgStore.js";

const run = async () => {
  const store = createPgStore(createPool(config.db));
  try {
    for (const contract of contracts) {
      const state = await ensureTable(store, contract);
      console.log(`${contract.table}: ${state === "created" ? "created" : "already present"}`);
    }
  } finally {
    await store.close();
  }
  console.log("Schema applied.");
};

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exitCode = 1;
});
