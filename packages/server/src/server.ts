import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`\nSurface route API server running at http://localhost:${config.port}`);
  console.log(`Optimal route: POST http://localhost:${config.port}/api/routes/optimal\n`);
});
