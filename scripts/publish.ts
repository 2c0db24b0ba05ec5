/** Regenerate events.json and index.html from the stored upcoming events. */
import { loadRuntimeConfig } from "@/lib/config/env";
import { buildSite } from "@/lib/publish/buildSite";
import { FirestoreEventStore } from "@/lib/store/firestoreStore";
import { StoreUnavailableError } from "@/lib/store/types";

async function main(): Promise<number> {
  const config = loadRuntimeConfig();
  const store = new FirestoreEventStore({ timeZone: config.timeZone });
  try {
    await store.init();
  } catch (e) {
    if (e instanceof StoreUnavailableError) {
      console.error(`[store] ${e.message}`);
      return 1;
    }
    throw e;
  }

  const summary = await buildSite({ store, siteDir: config.siteDir, timeZone: config.timeZone });
  console.info(`[publish] output in ${summary.siteDir}`);
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[publish] fatal:", e);
    process.exitCode = 1;
  }
);
