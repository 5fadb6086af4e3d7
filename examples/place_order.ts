import { config } from "dotenv";
import { configFromEnv, transaction, write } from "../src";

// Load DEX_* settings and the private key from .env
config();

async function main(): Promise<void> {
  const privateKey = process.env.DEX_PRIVATE_KEY;
  if (!privateKey) {
    throw new Error("DEX_PRIVATE_KEY not set");
  }

  const dex = configFromEnv();
  const account = transaction.Ed25519Account.fromPrivateKey(privateKey);
  const writer = new write.WriteClient(dex, account);
  console.log("Trading from", account.address.toString());

  const result = await writer.placeOrder({
    marketName: "BTC/USD",
    price: 60_000_000_000,
    size: 1_000,
    isBuy: true,
    timeInForce: write.TimeInForce.PostOnly,
    isReduceOnly: false,
    tickSize: 1_000_000,
  });

  if (!result.success) {
    console.error("Order rejected:", result.error);
    return;
  }
  console.log("Order placed:", result.orderId, result.transactionHash);

  if (result.orderId !== null) {
    await writer.cancelOrder({ orderId: result.orderId, marketName: "BTC/USD" });
    console.log("Order cancelled");
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
