/**
 * EVM Configuration
 *
 * Holds the RPC endpoint and chain id of the execution environment and
 * hands out a cached viem PublicClient for contract reads.
 */

import { createPublicClient, defineChain, http, type Chain, type PublicClient } from 'viem';
import { evmEnvSchema, parseEnv, ConfigError, type EvmEnv } from './env.js';

export class EvmConfig {
  private static instance: EvmConfig | null = null;

  private readonly env: EvmEnv;
  private client: PublicClient | null = null;

  /**
   * @param env - Environment record, defaults to process.env
   * @throws ConfigError if a variable fails validation
   */
  constructor(env: Record<string, string | undefined> = process.env) {
    this.env = parseEnv(evmEnvSchema, env);
  }

  /**
   * Get the process-wide instance, created on first use from process.env
   */
  static getInstance(): EvmConfig {
    if (!EvmConfig.instance) {
      EvmConfig.instance = new EvmConfig();
    }
    return EvmConfig.instance;
  }

  /**
   * Drop the process-wide instance (tests)
   */
  static resetInstance(): void {
    EvmConfig.instance = null;
  }

  get chainId(): number {
    return this.env.EVM_CHAIN_ID;
  }

  get rpcUrl(): string | undefined {
    return this.env.EVM_RPC_URL;
  }

  isRpcConfigured(): boolean {
    return this.env.EVM_RPC_URL !== undefined;
  }

  /**
   * Get a viem client for the configured chain
   *
   * @throws ConfigError if EVM_RPC_URL is not set
   */
  getPublicClient(): PublicClient {
    if (this.client) {
      return this.client;
    }

    const rpcUrl = this.env.EVM_RPC_URL;
    if (!rpcUrl) {
      throw new ConfigError('EVM_RPC_URL is not configured');
    }

    const chain: Chain = defineChain({
      id: this.env.EVM_CHAIN_ID,
      name: `evm-${this.env.EVM_CHAIN_ID}`,
      nativeCurrency: { name: 'Native', symbol: 'NATIVE', decimals: 18 },
      rpcUrls: { default: { http: [rpcUrl] } },
    });

    this.client = createPublicClient({ chain, transport: http(rpcUrl) });
    return this.client;
  }
}
