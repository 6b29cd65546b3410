/**
 * Render the default image recipe to ./Dockerfile (or the path given as first argument)
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { renderDefaultDockerfile } from '../container/recipe.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('dockerfile');

const target = path.resolve(process.argv[2] ?? 'Dockerfile');
await writeFile(target, renderDefaultDockerfile(), 'utf8');

log.info(`Wrote ${target}`);
