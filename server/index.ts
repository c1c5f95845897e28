import express from "express";
import { initializeDatabase, closeDatabase } from "./db/index.js";
import { createMappingStores } from "./db/mappingQueries.js";
import { createConvertRouter } from "./routes/convert.js";
import { createMappingsRouter } from "./routes/mappings.js";
import { cleanupExpiredConversions } from "./services/pendingConversions.js";
import { renderHomePage } from "./templates/home.js";

const PORT = process.env.PORT || 3000;

/** How often expired pending conversions are dropped */
const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

function shutdown() {
  console.log("\nShutting down...");
  closeDatabase();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

try {
  const stores = createMappingStores(initializeDatabase());

  const app = express();
  app.use(express.urlencoded({ extended: true }));

  app.get("/", (_req, res) => {
    res.send(renderHomePage());
  });

  app.use("/convert", createConvertRouter(stores));
  app.use("/mappings", createMappingsRouter(stores));

  setInterval(() => {
    const cleaned = cleanupExpiredConversions();
    if (cleaned > 0) {
      console.log(`Dropped ${cleaned} expired conversion(s)`);
    }
  }, CLEANUP_INTERVAL_MS).unref();

  app.listen(PORT, () => {
    console.log(`Server running on http://localhost:${PORT}`);
  });
} catch (error) {
  console.error("Failed to start server:", error);
  process.exit(1);
}
