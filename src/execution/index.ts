import type { AgentConfig } from "../config/schema";
import type { Logger } from "../utils/logger.util";
import {
  ClobExecutor,
  createClobClient,
  createClobGateway,
} from "./clob-executor";
import type { Executor } from "./executor";
import { PaperExecutor } from "./paper-executor";

export type { Executor } from "./executor";
export { PaperExecutor, type PaperExecutorConfig } from "./paper-executor";
export {
  ClobExecutor,
  createClobClient,
  createClobGateway,
  parseOrderResponse,
  resolveChain,
  resolveSignatureType,
  type OrderGateway,
} from "./clob-executor";

/**
 * Pick the simulated or live executor once, at startup
 */
export async function createExecutor(
  config: AgentConfig,
  logger: Logger,
): Promise<Executor> {
  if (config.paperTrading) {
    logger.info("[Executor] 📝 Paper trading: fills are simulated");
    return new PaperExecutor(
      { slippageBps: config.execution.paperSlippageBps },
      logger,
    );
  }

  logger.warn("[Executor] 💸 LIVE trading: orders go to the Polymarket CLOB");
  const client = await createClobClient(config.clob, logger);
  return new ClobExecutor(createClobGateway(client), logger);
}
