/**
 * Side-effect module: merges the environment-specific .env file into
 * process.env. Imported first by the entry point so modules that read the
 * environment while loading (the logger) see the merged values.
 */

import { loadEnv } from '@src/lib/env/load-env.js';

loadEnv({ path: process.env.NODE_ENV ? `.env.${process.env.NODE_ENV}` : '.env' });
