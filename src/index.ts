// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

import { start } from './server.js';
import { getLogger } from './logging/index.js';

start().catch((error: unknown) => {
  getLogger({ component: 'server' }).fatal('Server failed to start', error);
  process.exit(1);
});
