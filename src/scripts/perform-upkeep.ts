import axios from "axios";
import { describeApiError, loadScriptEnv } from "./scriptEnv";

interface UpkeepStatusResponse {
  success: boolean;
  data: {
    upkeepNeeded: boolean;
    performData: string;
    failedChecks: string[];
  };
}

interface PerformUpkeepResponse {
  success: boolean;
  data: { requestId: string };
}

//npm run perform-upkeep

/**
 * Check whether a draw is due and, if so, start it through the keeper endpoint
 */
async function performUpkeepViaApi(): Promise<void> {
  const { BACKEND_URL, KEEPER_API_KEY, ADMIN_API_KEY } = loadScriptEnv();
  const apiKey = KEEPER_API_KEY ?? ADMIN_API_KEY;

  console.log("🤖 [PERFORM UPKEEP] Checking upkeep...");
  console.log(`🔗 [PERFORM UPKEEP] Backend URL: ${BACKEND_URL}`);

  if (!apiKey) {
    throw new Error("KEEPER_API_KEY or ADMIN_API_KEY environment variable is required");
  }

  const status = await axios.get<UpkeepStatusResponse>(
    `${BACKEND_URL}/api/raffle/upkeep`,
    { timeout: 15000 }
  );

  const { upkeepNeeded, performData, failedChecks } = status.data.data;
  if (!upkeepNeeded) {
    console.log(`💤 [PERFORM UPKEEP] Not due: ${failedChecks.join(", ")}`);
    return;
  }

  const response = await axios.post<PerformUpkeepResponse>(
    `${BACKEND_URL}/api/raffle/perform-upkeep`,
    { performData },
    {
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
        "User-Agent": "perform-upkeep-script/1.0",
      },
      timeout: 60000,
    }
  );

  console.log(
    `✅ [PERFORM UPKEEP] Draw requested (requestId: ${response.data.data.requestId})`
  );
}

// Run if called directly
if (require.main === module) {
  performUpkeepViaApi()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error("❌ [PERFORM UPKEEP] Failed:", describeApiError(error));
      process.exit(1);
    });
}
