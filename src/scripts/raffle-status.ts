import axios from "axios";
import { ethers } from "ethers";
import { RaffleStatusView } from "../types";
import { describeApiError, loadScriptEnv } from "./scriptEnv";

interface RaffleResponse {
  success: boolean;
  data: RaffleStatusView & { players: string[] };
}

interface UpkeepResponse {
  success: boolean;
  data: { upkeepNeeded: boolean; performData: string; failedChecks: string[] };
}

async function printStatus() {
  const { BACKEND_URL } = loadScriptEnv();

  console.log("🎟️ Raffle Status");
  console.log("================================\n");

  const [raffleRes, upkeepRes] = await Promise.all([
    axios.get<RaffleResponse>(`${BACKEND_URL}/api/raffle`, { timeout: 15000 }),
    axios.get<UpkeepResponse>(`${BACKEND_URL}/api/raffle/upkeep`, { timeout: 15000 }),
  ]);
  const raffle = raffleRes.data.data;
  const upkeep = upkeepRes.data.data;

  const currentTime = Math.floor(Date.now() / 1000);
  const nextDrawAt = raffle.latestTimestamp + raffle.interval;
  const timeUntilNext = Math.max(0, nextDrawAt - currentTime);

  console.log("🎲 CYCLE:");
  console.log(`   State: ${raffle.raffleState}`);
  console.log(`   Entrance Fee: ${ethers.formatEther(raffle.entranceFee)} ETH`);
  console.log(`   Pooled Balance: ${ethers.formatEther(raffle.pooledBalance)} ETH`);
  console.log(`   Recent Winner: ${raffle.recentWinner ?? "none yet"}`);
  if (raffle.pendingRequestId) {
    console.log(`   Pending Request: ${raffle.pendingRequestId}`);
  }
  console.log();

  console.log(`📋 ENTRANTS (${raffle.numberOfPlayers}):`);
  raffle.players.forEach((player, index) => {
    console.log(`   #${index} ${player}`);
  });
  console.log();

  console.log("🤖 UPKEEP:");
  console.log(`   Upkeep Needed: ${upkeep.upkeepNeeded ? "YES ✅" : "NO ❌"}`);
  if (!upkeep.upkeepNeeded) {
    console.log(`   Reason: ${upkeep.failedChecks.join(", ") || "unknown"}`);
  }
  if (timeUntilNext > 0) {
    const minutes = Math.floor(timeUntilNext / 60);
    const seconds = timeUntilNext % 60;
    console.log(`   Interval elapses in: ${minutes}m ${seconds}s`);
  }
}

// Run if called directly
if (require.main === module) {
  printStatus()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error("❌ Error checking status:", describeApiError(error));
      process.exit(1);
    });
}
