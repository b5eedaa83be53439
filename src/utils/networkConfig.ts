import { ethers } from "ethers";
import networkConfig from "../constants/networkConfig.json";
import { RaffleConfig } from "../types/raffle";
import { Env } from "./loadEnv";

export interface NetworkDefaults {
  chainId: number;
  entranceFee: string;
  gasLane: string;
  subscriptionId: string;
  requestConfirmations: number;
  callbackGasLimit: number;
  interval: number;
}

const networks: Record<string, NetworkDefaults> = networkConfig.networks;

export const developmentNetworks: readonly string[] =
  networkConfig.developmentNetworks;

export function isDevelopmentNetwork(name: string): boolean {
  return developmentNetworks.includes(name);
}

export function getNetworkDefaults(name: string): NetworkDefaults {
  const defaults = networks[name];
  if (!defaults) {
    throw new Error(`Unknown network: ${name}`);
  }
  return defaults;
}

function toInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

function toBigInt(name: string, value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return BigInt(value);
}

/**
 * Raffle configuration for the selected network: JSON defaults, with any
 * RAFFLE_* / VRF_* environment overrides applied on top.
 */
export function resolveRaffleConfig(
  env: Pick<
    Env,
    | "NETWORK"
    | "RAFFLE_ENTRANCE_FEE"
    | "RAFFLE_INTERVAL_SEC"
    | "VRF_KEY_HASH"
    | "VRF_SUBSCRIPTION_ID"
    | "VRF_REQUEST_CONFIRMATIONS"
    | "VRF_CALLBACK_GAS_LIMIT"
  >
): RaffleConfig {
  const defaults = getNetworkDefaults(env.NETWORK);

  return {
    entranceFee: ethers.parseEther(env.RAFFLE_ENTRANCE_FEE ?? defaults.entranceFee),
    interval: toInt("RAFFLE_INTERVAL_SEC", env.RAFFLE_INTERVAL_SEC, defaults.interval),
    keyHash: env.VRF_KEY_HASH ?? defaults.gasLane,
    subscriptionId: toBigInt(
      "VRF_SUBSCRIPTION_ID",
      env.VRF_SUBSCRIPTION_ID ?? defaults.subscriptionId
    ),
    requestConfirmations: toInt(
      "VRF_REQUEST_CONFIRMATIONS",
      env.VRF_REQUEST_CONFIRMATIONS,
      defaults.requestConfirmations
    ),
    callbackGasLimit: toInt(
      "VRF_CALLBACK_GAS_LIMIT",
      env.VRF_CALLBACK_GAS_LIMIT,
      defaults.callbackGasLimit
    ),
    numWords: 1,
  };
}

export function logNetworkConfig(name: string, config: RaffleConfig): void {
  const defaults = getNetworkDefaults(name);
  console.log(`🌐 Network: ${name} (Chain ID: ${defaults.chainId})`);
  console.log(`🎟️ Entrance fee: ${ethers.formatEther(config.entranceFee)} ETH`);
  console.log(`⏱️ Draw interval: ${config.interval}s`);
  console.log(`🔑 VRF Key Hash: ${config.keyHash}`);
  console.log(`📋 VRF Subscription ID: ${config.subscriptionId}`);
  console.log(`✅ Request confirmations: ${config.requestConfirmations}`);
  console.log(`⛽ Callback gas limit: ${config.callbackGasLimit}`);
}
