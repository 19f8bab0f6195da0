import { loadConfig, loadEnvFile } from './config/env.js';
import { createApp } from './app.js';
import { buildOrchestrator } from './bootstrap.js';

// Load environment variables before reading the config
loadEnvFile();

const config = loadConfig();
const app = createApp({
  orchestrator: buildOrchestrator(config),
  frontendUrl: config.frontendUrl
});

// Start server
app.listen(config.port, () => {
  console.log(`
╔═══════════════════════════════════════════════════╗
║                                                   ║
║   📚 LearnPath Backend Server                     ║
║   Prerequisites, resources and study helpers      ║
║                                                   ║
║   Server running on port ${config.port}                    ║
║   API: http://localhost:${config.port}/api                 ║
║                                                   ║
╚═══════════════════════════════════════════════════╝
  `);
});

export default app;
