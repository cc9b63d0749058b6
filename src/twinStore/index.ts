import { Pool } from "pg";
import { parseTwinStoreKind } from "../config/config";
import type { Config } from "../config/config";
import { ConfigError } from "../errors";
import { createAzureTwinStore } from "./azureTwinStore";
import { PostgresTwinStore } from "./postgresTwinStore";
import type { TwinStore } from "./types";

export async function createTwinStore(config: Config): Promise<TwinStore> {
  const kind = parseTwinStoreKind(config.twinStore);

  if (kind === "azure") {
    if (!config.adtUrl) throw new ConfigError("ADT_URL is required when TWIN_STORE=azure");
    console.log(`✅ Using Azure Digital Twins at ${config.adtUrl}`);
    return createAzureTwinStore(config.adtUrl);
  }

  const store = new PostgresTwinStore(new Pool(config.postgres));
  await store.init();
  console.log("✅ Connected to Postgres, digital_twins table ready");
  return store;
}
