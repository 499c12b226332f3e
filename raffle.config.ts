import * as dotenv from "dotenv";
import { defineConfig } from "./contracts/config.js";

dotenv.config();

export default defineConfig({
  prizeChain: { name: process.env.PRIZE_CHAIN_NAME?.trim() || "ethereum-sepolia" },
  ticketChain: { name: process.env.TICKET_CHAIN_NAME?.trim() || "arbitrum-sepolia" },
});
