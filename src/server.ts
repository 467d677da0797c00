// Load environment variables FIRST before any other imports
import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig } from "./config/index.js";

const config = loadConfig();
const app = createApp({ config });

// Start server
const server = app.listen(config.port, () => {
  console.log(`🚀 Server is running on port ${config.port}`);
  console.log(`📝 Environment: ${config.nodeEnv}`);
  console.log(`🔗 Health check: http://localhost:${config.port}/health`);
});

// Graceful shutdown
process.on("SIGTERM", () => {
  console.log("SIGTERM signal received: closing HTTP server");
  server.close(() => process.exit(0));
});

export default app;
