// backend/index.ts
import "dotenv/config";

// Boot the API + upkeep keeper
import "./src/server";
