import { Connection } from "@solana/web3.js";
import { loadEnv } from "../config/env.js";
import { logger } from "../observability/logger.js";

/**
 * Shared Solana Connection, created from RPC_PRIMARY on first use.
 */

let connectionInstance: Connection | null = null;

export function getConnection(): Connection {
  if (!connectionInstance) {
    const env = loadEnv();
    connectionInstance = new Connection(env.RPC_PRIMARY, "confirmed");
    logger.info({ event: "connection_init", rpc: env.RPC_PRIMARY }, "initialized shared connection");
  }
  return connectionInstance;
}
