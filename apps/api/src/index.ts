import "dotenv/config";
import { serverConfig } from "./config.js";
import { createApp } from "./app.js";

const { PORT } = serverConfig();
createApp().listen(PORT, () => console.log(`[api] listening on :${PORT}`));
