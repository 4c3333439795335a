import { createApp } from "./app.js";
import { BuildService } from "./services/build.service.js";
import { config } from "./utils/config.js";
import { logger } from "./utils/logger.js";

const app = createApp(new BuildService());
const port = config.server.port;

app.listen(port, () => {
    logger.info(`Build API listening on port ${port} (scripts from ${config.inputPath})`);
});
