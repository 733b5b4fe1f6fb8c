import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { logger } from "./utils/logger.js";

const app = createApp();

app.listen(appConfig.PORT, () => {
  logger.info(`Plainlex backend is running on http://localhost:${appConfig.PORT}`);
});
