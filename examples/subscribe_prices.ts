import { config } from "dotenv";
import { api, configFromEnv } from "../src";

config();

const DURATION_MS = 30_000;

async function main(): Promise<void> {
  const reader = new api.ReadClient(configFromEnv());

  const markets = await reader.getMarkets();
  console.log(`Markets: ${markets.map((m) => m.market_name).join(", ")}`);

  const sub = reader.subscribeAllMarketPrices(({ prices }) => {
    for (const price of prices) {
      console.log(`${price.market} mark=${price.mark_px} funding=${price.funding_rate_bps}bps`);
    }
  });

  await new Promise((resolve) => setTimeout(resolve, DURATION_MS));
  sub.unsubscribe();
  reader.close();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
