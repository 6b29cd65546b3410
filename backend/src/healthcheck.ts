/**
 * Container HEALTHCHECK entry
 * Exits 0 when the local service answers GET /check, 1 otherwise
 */

import 'dotenv/config';
import { config } from './config/index.js';
import { probeHealth } from './lib/health-probe.js';

const healthy = await probeHealth(`http://127.0.0.1:${config.server.port}`);
process.exit(healthy ? 0 : 1);
