import { loadConfig } from "../core/config.js";
import { createApp } from "./app.js";

const config = loadConfig();
const app = createApp({ config });

app.listen(config.port, config.host, () => {
  console.log(`\nDate renamer running at http://${config.host}:${config.port}\n`);
  console.log(`  Uploads: ${config.uploadDir}`);
  console.log(`  Output:  ${config.outputDir}\n`);
});
